export interface Credential {
  domain: string;
  email: string;
  apiKey: string;
  /** Atlassian cloud id, resolved from tenant_info at registration */
  cloudId?: string;
}

export interface ProjectBinding {
  projectId: string;
  domain: string;
  registeredAt: string;
}

export interface CacheEntry {
  issueKey: string;
  summary: string;
  fetchedAt: number; // epoch ms
}

export type ParseResult =
  | { ok: true; issueKey: string }
  | { ok: false; error: 'NoMatch' };

export interface CommandResult {
  exitCode: number;
  /** Written to stdout as-is (prompt output) */
  stdout?: string;
}
