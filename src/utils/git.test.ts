import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createGitService } from './git.js';
import { GitError } from '../errors.js';

describe('createGitService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jira-git-issue-git-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('raises GitError outside a working tree', async () => {
    // a missing cwd fails whether or not git is installed
    const git = createGitService(join(dir, 'missing'));
    await expect(git.projectId()).rejects.toBeInstanceOf(GitError);
    await expect(git.currentBranch()).rejects.toThrow('Not in a git repository.');
  });
});
