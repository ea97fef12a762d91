export interface ManifestEntry {
  name: string;
  sources: string[];
  target: string;
  command?: string;
  description?: string;
}

export interface Manifest {
  version: string;
  entries: ManifestEntry[];
}

/** Manifest as written on disk, before targets are defaulted. */
export interface RawManifest {
  version: string;
  entries: Array<Omit<ManifestEntry, 'target'> & { target?: string }>;
}

export type SyncOutcome =
  | { status: 'updated'; changes: number }
  | { status: 'failed'; reason: string }
  | { status: 'skipped'; reason: string };

export type EntryStatus = 'installed' | 'missing' | 'failed' | 'cancelled';

export interface EntryResult {
  entry: ManifestEntry;
  status: EntryStatus;
  source?: string;
  destination: string;
  error?: string;
}

export interface InstallReport {
  repoRoot: string;
  destination: string;
  sync?: SyncOutcome;
  results: EntryResult[];
}

export type InstalledState = 'up to date' | 'outdated' | 'not installed' | 'source missing';

export interface StatusLine {
  entry: ManifestEntry;
  state: InstalledState;
  destination: string;
}

export interface UninstallResult {
  entry: ManifestEntry;
  destination: string;
  removed: boolean;
}

export interface InstallerOptions {
  destination: string;
  repoRoot?: string;
  sync?: RepoSyncer;
}

export interface RepoSyncer {
  sync(repoRoot: string): Promise<SyncOutcome>;
}
