/**
 * Git integration
 *
 * Reads the current branch and the working tree's top-level path by
 * shelling out to git.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { GitError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface GitService {
  /** Current branch name ("HEAD" when detached) */
  currentBranch(): Promise<string>;
  /** Stable identifier for the working tree: its top-level directory */
  projectId(): Promise<string>;
}

async function git(args: string[], cwd: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd, timeout: 2000, windowsHide: true });
    return stdout.trim();
  } catch (error) {
    throw new GitError('Not in a git repository.', { cause: error });
  }
}

export function createGitService(cwd: string = process.cwd()): GitService {
  return {
    currentBranch: () => git(['rev-parse', '--abbrev-ref', 'HEAD'], cwd),
    projectId: () => git(['rev-parse', '--show-toplevel'], cwd),
  };
}
