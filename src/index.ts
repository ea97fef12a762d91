export { CommandInstaller, exitCodeFor } from './command-installer';
export { default } from './command-installer';
export { GitRepoSync, createGitClient } from './repo-sync';
export type { GitClient, GitClientFactory } from './repo-sync';
export { loadManifest, resolveRepoRoot, resolveDestination } from './manifest';
export { InstallerError } from './errors';
export { createProgram } from './cli';
export * from './types';
export * from './constants';
