// Issue summary cache
// Summaries are served from disk until they are older than the TTL

import { z } from 'zod';
import type { CacheEntry } from '../types.js';
import { RecordStore } from './records.js';

export const ISSUES_FILE = 'issues.json';

const entrySchema = z.object({
  issueKey: z.string(),
  summary: z.string(),
  fetchedAt: z.number(),
});

export class IssueCache {
  private readonly store: RecordStore<CacheEntry>;

  constructor(
    dir: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.store = new RecordStore({ dir, fileName: ISSUES_FILE, schema: entrySchema });
  }

  /**
   * Cached summary, or undefined when missing or expired
   */
  async get(issueKey: string): Promise<string | undefined> {
    const entry = await this.store.get(issueKey);
    if (!entry) return undefined;

    const age = this.now() - entry.fetchedAt;
    if (age >= this.ttlMs) {
      return undefined;
    }
    return entry.summary;
  }

  async put(issueKey: string, summary: string): Promise<void> {
    await this.store.put(issueKey, { issueKey, summary, fetchedAt: this.now() });
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }
}
