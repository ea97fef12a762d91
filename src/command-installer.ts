import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import chalk from 'chalk';
import { RULE, TEMP_SUFFIX } from './constants';
import { errorMessage, InstallerError } from './errors';
import { loadManifest, resolveRepoRoot } from './manifest';
import { GitRepoSync } from './repo-sync';
import {
  EntryResult,
  InstallerOptions,
  InstallReport,
  InstalledState,
  Manifest,
  ManifestEntry,
  RepoSyncer,
  StatusLine,
  SyncOutcome,
  UninstallResult
} from './types';

export class CommandInstaller {
  private manifest: Manifest | null = null;
  private repoRoot: string | null;
  private readonly destination: string;
  private readonly syncer: RepoSyncer;
  private cancelled = false;

  constructor(options: InstallerOptions) {
    this.destination = path.resolve(options.destination);
    this.repoRoot = options.repoRoot ? path.resolve(options.repoRoot) : null;
    this.syncer = options.sync ?? new GitRepoSync();
  }

  get destinationDir(): string {
    return this.destination;
  }

  async init(): Promise<void> {
    this.repoRoot = this.repoRoot ?? await resolveRepoRoot();
    this.manifest = await loadManifest(this.repoRoot);
  }

  /** Stops the copy loop before the next entry. The entry in flight still completes. */
  cancel(): void {
    this.cancelled = true;
  }

  async syncRepository(): Promise<SyncOutcome> {
    const root = this.requireRoot();
    console.log(chalk.blue('→'), 'Updating from the remote repository...');

    const outcome = await this.syncer.sync(root);
    switch (outcome.status) {
      case 'updated':
        console.log(chalk.green('✓'), `Successfully updated (${outcome.changes} file(s) changed)`);
        break;
      case 'failed':
        console.warn(chalk.yellow('⚠'), `Warning: Failed to update: ${outcome.reason}`);
        console.warn(chalk.yellow('  Continuing with the current working copy'));
        break;
      case 'skipped':
        console.warn(chalk.yellow('⚠'), `Warning: ${outcome.reason}. Skipping update.`);
        console.warn(chalk.yellow('  To enable updates, install from a git clone of this repository'));
        break;
    }
    return outcome;
  }

  async ensureDestination(): Promise<void> {
    if (await fs.pathExists(this.destination)) {
      const stats = await fs.stat(this.destination);
      if (!stats.isDirectory()) {
        throw new InstallerError(
          `Destination ${this.destination} exists and is not a directory`,
          'DESTINATION_UNAVAILABLE'
        );
      }
      return;
    }

    console.log(chalk.yellow(`Creating ${this.destination}...`));
    try {
      await fs.ensureDir(this.destination);
    } catch (error) {
      throw new InstallerError(
        `Cannot create destination ${this.destination}: ${errorMessage(error)}`,
        'DESTINATION_UNAVAILABLE'
      );
    }
  }

  async findSource(entry: ManifestEntry): Promise<string | null> {
    const root = this.requireRoot();
    for (const candidate of entry.sources) {
      const sourcePath = path.join(root, candidate);
      if (await this.isFile(sourcePath)) {
        return sourcePath;
      }
    }
    return null;
  }

  async installEntry(entry: ManifestEntry): Promise<EntryResult> {
    const destination = path.join(this.destination, entry.target);
    const source = await this.findSource(entry);

    if (!source) {
      console.warn(chalk.yellow('⚠'), `Warning: ${entry.target} not found (${entry.name})`);
      return { entry, status: 'missing', destination };
    }

    // Copy beside the target, then rename over it.
    const tempPath = `${destination}.${process.pid}${TEMP_SUFFIX}`;
    try {
      await fs.copy(source, tempPath, { overwrite: true, preserveTimestamps: true, dereference: true });
      await fs.rename(tempPath, destination);
    } catch (error) {
      await fs.remove(tempPath);
      const message = errorMessage(error);
      console.error(chalk.red('✗'), `Failed to install ${entry.target}: ${message}`);
      return { entry, status: 'failed', source, destination, error: message };
    }

    console.log(chalk.green('✓'), `Installed ${entry.target}`);
    return { entry, status: 'installed', source, destination };
  }

  async install(options: { update?: boolean } = {}): Promise<InstallReport> {
    this.requireManifest();

    let sync: SyncOutcome | undefined;
    if (options.update) {
      sync = await this.syncRepository();
      // A pull may have changed the manifest itself.
      await this.init();
    }

    await this.ensureDestination();

    console.log(chalk.blue('→'), 'Copying command files...');
    const results: EntryResult[] = [];
    for (const entry of this.requireManifest().entries) {
      if (this.cancelled) {
        results.push({ entry, status: 'cancelled', destination: path.join(this.destination, entry.target) });
        continue;
      }
      results.push(await this.installEntry(entry));
    }

    const report: InstallReport = {
      repoRoot: this.requireRoot(),
      destination: this.destination,
      sync,
      results
    };
    this.printSummary(report);
    return report;
  }

  printSummary(report: InstallReport): void {
    const byStatus = (status: EntryResult['status']) => report.results.filter((r) => r.status === status);
    const installed = byStatus('installed');
    const missing = byStatus('missing');
    const failed = byStatus('failed');
    const cancelled = byStatus('cancelled');
    const clean = failed.length === 0 && cancelled.length === 0;

    const color = clean ? chalk.green : chalk.yellow;
    console.log('');
    console.log(color(RULE));
    console.log(color(clean ? 'Installation complete!' : 'Installation finished with problems'));
    console.log(color(RULE));

    if (installed.length > 0) {
      console.log(chalk.bold(`\nInstalled to ${report.destination}:`));
      for (const result of installed) {
        console.log(`  ${result.destination}`);
      }
    }

    if (missing.length > 0) {
      console.log(chalk.bold('\nSkipped (source not found):'));
      for (const result of missing) {
        console.log(chalk.gray(`  ${result.entry.target} (${result.entry.name})`));
      }
    }

    if (failed.length > 0) {
      console.log(chalk.bold('\nFailed:'));
      for (const result of failed) {
        console.log(chalk.red(`  ${result.entry.target}: ${result.error ?? 'unknown error'}`));
      }
    }

    if (cancelled.length > 0) {
      console.log(chalk.bold('\nNot attempted (interrupted):'));
      for (const result of cancelled) {
        console.log(chalk.gray(`  ${result.entry.target}`));
      }
    }

    const commands = installed
      .map((result) => result.entry.command)
      .filter((command): command is string => command !== undefined);

    if (commands.length > 0) {
      console.log(chalk.bold('\nUsage:'));
      console.log('  1. Open Claude Code in any directory');
      console.log(`  2. Type one of: ${commands.map((command) => chalk.green(command)).join(', ')}`);
      for (const result of installed) {
        if (result.entry.command && result.entry.description) {
          console.log(chalk.gray(`     ${result.entry.command}  ${result.entry.description}`));
        }
      }
    }

    console.log('');
    console.log(color('✓'), `Successfully installed ${installed.length} of ${report.results.length} file(s)`);
  }

  async checkStatus(): Promise<StatusLine[]> {
    const manifest = this.requireManifest();

    console.log(chalk.bold('\nCommand Status\n'));
    console.log(chalk.cyan('Repository:'), this.requireRoot());
    console.log(chalk.cyan('Destination:'), this.destination);
    console.log(chalk.cyan('Manifest version:'), manifest.version);
    console.log('');

    const lines: StatusLine[] = [];
    for (const entry of manifest.entries) {
      const destination = path.join(this.destination, entry.target);
      const source = await this.findSource(entry);
      const state = await this.compare(source, destination);
      lines.push({ entry, state, destination });

      const mark = state === 'up to date' ? chalk.green('✓') : chalk.yellow('⚠');
      const label = entry.command ? `${entry.target} (${entry.command})` : entry.target;
      console.log(`  ${mark} ${label} - ${state}`);
    }
    console.log('');
    return lines;
  }

  async uninstall(): Promise<UninstallResult[]> {
    const manifest = this.requireManifest();
    const results: UninstallResult[] = [];

    for (const entry of manifest.entries) {
      const destination = path.join(this.destination, entry.target);
      if (await fs.pathExists(destination)) {
        await fs.remove(destination);
        console.log(chalk.gray(`  Removed: ${destination}`));
        results.push({ entry, destination, removed: true });
      } else {
        results.push({ entry, destination, removed: false });
      }
    }

    const removed = results.filter((result) => result.removed).length;
    console.log(chalk.green('✓'), `Removed ${removed} file(s) from ${this.destination}`);
    return results;
  }

  private async compare(source: string | null, destination: string): Promise<InstalledState> {
    const installedHash = await this.fileHash(destination);
    if (!source) return 'source missing';
    if (!installedHash) return 'not installed';
    return installedHash === await this.fileHash(source) ? 'up to date' : 'outdated';
  }

  /** Follows symlinks; a dangling link is not a file. */
  private async isFile(filePath: string): Promise<boolean> {
    if (!await fs.pathExists(filePath)) {
      return false;
    }
    const stats = await fs.stat(filePath);
    return stats.isFile();
  }

  private async fileHash(filePath: string): Promise<string | null> {
    if (!await this.isFile(filePath)) {
      return null;
    }
    return crypto.createHash('sha256').update(await fs.readFile(filePath)).digest('hex');
  }

  private requireRoot(): string {
    if (!this.repoRoot) throw new InstallerError('Repository root not resolved', 'ROOT_NOT_FOUND');
    return this.repoRoot;
  }

  private requireManifest(): Manifest {
    if (!this.manifest) throw new InstallerError('Installer not initialized', 'MANIFEST_INVALID');
    return this.manifest;
  }
}

export function exitCodeFor(report: InstallReport): number {
  if (report.results.some((result) => result.status === 'cancelled')) return 130;
  if (report.results.some((result) => result.status === 'failed')) return 1;
  return 0;
}

export default CommandInstaller;
