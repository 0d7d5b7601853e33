import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { IssueCache, ISSUES_FILE } from './issues.js';

const TTL = 60 * 60 * 1000;

describe('IssueCache', () => {
  let dir: string;
  let now: number;
  let cache: IssueCache;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jira-git-issue-issues-'));
    now = 1_700_000_000_000;
    cache = new IssueCache(dir, TTL, () => now);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns what was just stored', async () => {
    await cache.put('ABC-42', 'Fix login bug');
    expect(await cache.get('ABC-42')).toBe('Fix login bug');
  });

  it('misses unknown keys', async () => {
    expect(await cache.get('ABC-1')).toBeUndefined();
  });

  it('serves entries until the TTL elapses', async () => {
    await cache.put('ABC-42', 'Fix login bug');
    now += TTL - 1;
    expect(await cache.get('ABC-42')).toBe('Fix login bug');
    now += 1;
    expect(await cache.get('ABC-42')).toBeUndefined();
  });

  it('keeps the expired record on disk', async () => {
    await cache.put('ABC-42', 'Fix login bug');
    now += TTL * 2;
    expect(await cache.get('ABC-42')).toBeUndefined();

    const content = JSON.parse(await readFile(join(dir, ISSUES_FILE), 'utf-8'));
    expect(content.records['ABC-42']).toEqual({
      issueKey: 'ABC-42',
      summary: 'Fix login bug',
      fetchedAt: 1_700_000_000_000,
    });
  });

  it('refreshes the timestamp on overwrite', async () => {
    await cache.put('ABC-42', 'Old title');
    now += TTL * 2;
    await cache.put('ABC-42', 'New title');
    expect(await cache.get('ABC-42')).toBe('New title');
  });

  it('clears all entries', async () => {
    await cache.put('ABC-42', 'Fix login bug');
    await cache.clear();
    expect(await cache.get('ABC-42')).toBeUndefined();
  });
});
