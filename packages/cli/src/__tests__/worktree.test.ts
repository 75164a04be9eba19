import { describe, it, expect, beforeEach } from 'vitest';
import { WorktreeFailure } from '../errors';
import type { VersionControl } from '../services/git.service';
import { WorktreeManager } from '../services/worktree.service';

class WorktreeGit implements VersionControl {
  branches = new Map<string, string>();
  added: string[] = [];
  pulled: string[] = [];
  pullError: Error | null = null;

  async currentBranch(dir?: string): Promise<string | null> {
    return dir ? this.branches.get(dir) ?? null : 'develop';
  }

  async topLevel(): Promise<string | null> {
    return '/work/shop';
  }

  async checkout(): Promise<void> {}

  async addWorktree(dir: string, branch: string): Promise<void> {
    this.added.push(dir);
    this.branches.set(dir, branch);
  }

  async pull(dir: string, branch: string): Promise<void> {
    if (this.pullError) {
      throw this.pullError;
    }
    this.pulled.push(`${dir}:${branch}`);
  }
}

describe('WorktreeManager', () => {
  let git: WorktreeGit;
  let existing: Set<string>;

  beforeEach(() => {
    git = new WorktreeGit();
    existing = new Set();
  });

  function manager(): WorktreeManager {
    return new WorktreeManager({ root: '/work/shop', git, exists: (file) => existing.has(file) });
  }

  it('should need both the directory and its .git entry', () => {
    existing.add('/work/shop-production');
    expect(manager().worktreeExists('../shop-production')).toBe(false);

    existing.add('/work/shop-production/.git');
    expect(manager().worktreeExists('../shop-production')).toBe(true);
  });

  it('should create a missing worktree and pull it', async () => {
    const outcome = await manager().ensureReady('../shop-staging', 'develop');

    expect(outcome).toBe('created');
    expect(git.added).toEqual(['../shop-staging']);
    expect(git.pulled).toEqual(['../shop-staging:develop']);
  });

  it('should only pull an existing worktree', async () => {
    existing.add('/work/shop-staging');
    existing.add('/work/shop-staging/.git');
    git.branches.set('../shop-staging', 'develop');

    const outcome = await manager().ensureReady('../shop-staging', 'develop');

    expect(outcome).toBe('synced');
    expect(git.added).toEqual([]);
  });

  it('should refuse a worktree on another branch', async () => {
    existing.add('/work/shop-production');
    existing.add('/work/shop-production/.git');
    git.branches.set('../shop-production', 'hotfix/login');

    await expect(manager().ensureReady('../shop-production', 'main')).rejects.toThrow(
      new WorktreeFailure('../shop-production', 'is on hotfix/login (expected main)')
    );
    expect(git.pulled).toEqual([]);
  });

  it('should wrap a failed pull', async () => {
    git.pullError = Object.assign(new Error('Command failed'), { stderr: 'CONFLICT (content)\n' });

    await expect(manager().ensureReady('../shop-staging', 'develop')).rejects.toThrow(
      'Worktree ../shop-staging: could not pull develop; resolve conflicts manually: CONFLICT (content)'
    );
  });
});
