import { simpleGit } from 'simple-git';
import { SYNC_TIMEOUT_MS } from './constants';
import { errorMessage } from './errors';
import { RepoSyncer, SyncOutcome } from './types';

/** The part of simple-git the sync step needs. */
export interface GitClient {
  checkIsRepo(): Promise<boolean>;
  pull(): Promise<{ summary: { changes: number } }>;
}

export type GitClientFactory = (baseDir: string) => GitClient;

export const createGitClient: GitClientFactory = (baseDir) =>
  simpleGit({ baseDir, timeout: { block: SYNC_TIMEOUT_MS } })
    .env({ ...process.env, GIT_TERMINAL_PROMPT: '0' });

/**
 * Pulls the repository the installer lives in. Never throws: every problem
 * becomes a `failed` or `skipped` outcome and the install goes on.
 */
export class GitRepoSync implements RepoSyncer {
  constructor(private readonly createClient: GitClientFactory = createGitClient) {}

  async sync(repoRoot: string): Promise<SyncOutcome> {
    let git: GitClient;
    try {
      git = this.createClient(repoRoot);
      if (!await git.checkIsRepo()) {
        return { status: 'skipped', reason: 'Not a git repository' };
      }
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    }

    try {
      const result = await git.pull();
      return { status: 'updated', changes: result.summary.changes };
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    }
  }
}
