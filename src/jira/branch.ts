import type { ParseResult } from '../types.js';

/** `issue/jira/<PROJECT>-<NUMBER>`, e.g. issue/jira/ABC-42 */
export const ISSUE_BRANCH_PATTERN = /^issue\/jira\/([A-Z0-9]+-\d+)$/;

export function parseBranch(branch: string): ParseResult {
  const match = ISSUE_BRANCH_PATTERN.exec(branch.replace(/\n$/, ''));
  if (!match) {
    return { ok: false, error: 'NoMatch' };
  }
  return { ok: true, issueKey: match[1] };
}
