// __tests__/repo-sync.test.ts

import * as os from 'os';
import { createGitClient, GitClient, GitRepoSync } from '../src/repo-sync';

function client(overrides: Partial<GitClient> = {}): GitClient {
  return {
    checkIsRepo: jest.fn(async () => true),
    pull: jest.fn(async () => ({ summary: { changes: 0 } })),
    ...overrides
  };
}

describe('GitRepoSync', () => {
  it('should skip a directory that is not a working copy', async () => {
    const git = client({ checkIsRepo: jest.fn(async () => false) });
    const sync = new GitRepoSync(() => git);

    await expect(sync.sync('/repo')).resolves.toEqual({ status: 'skipped', reason: 'Not a git repository' });
    expect(git.pull).not.toHaveBeenCalled();
  });

  it('should report the number of changed files after a pull', async () => {
    const git = client({ pull: jest.fn(async () => ({ summary: { changes: 3 } })) });
    const factory = jest.fn((_baseDir: string) => git);

    await expect(new GitRepoSync(factory).sync('/repo')).resolves.toEqual({ status: 'updated', changes: 3 });
    expect(factory).toHaveBeenCalledWith('/repo');
  });

  it('should turn a failed pull into a failed outcome', async () => {
    const git = client({ pull: jest.fn(async () => { throw new Error('Could not resolve host'); }) });

    await expect(new GitRepoSync(() => git).sync('/repo')).resolves.toEqual({
      status: 'failed',
      reason: 'Could not resolve host'
    });
  });

  it('should pull only once when the pull fails', async () => {
    const pull = jest.fn(async (): Promise<{ summary: { changes: number } }> => { throw new Error('merge conflict'); });

    await new GitRepoSync(() => client({ pull })).sync('/repo');

    expect(pull).toHaveBeenCalledTimes(1);
  });

  it('should treat a failing repository check as a failed outcome', async () => {
    const git = client({ checkIsRepo: jest.fn(async () => { throw new Error('spawn git ENOENT'); }) });

    await expect(new GitRepoSync(() => git).sync('/repo')).resolves.toEqual({
      status: 'failed',
      reason: 'spawn git ENOENT'
    });
  });

  it('should treat a client that cannot be created as a failed outcome', async () => {
    const sync = new GitRepoSync(() => { throw new Error('Cannot use simple-git on a directory that does not exist'); });

    await expect(sync.sync('/missing')).resolves.toEqual({
      status: 'failed',
      reason: 'Cannot use simple-git on a directory that does not exist'
    });
  });
});

describe('createGitClient', () => {
  it('should build a client without running git', () => {
    const git = createGitClient(os.tmpdir());

    expect(typeof git.checkIsRepo).toBe('function');
    expect(typeof git.pull).toBe('function');
  });
});
