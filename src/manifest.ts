import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_COMMANDS_DIR, DESTINATION_ENV, MANIFEST_FILE, manifestSchema } from './constants';
import { errorMessage, InstallerError } from './errors';
import { Manifest, ManifestEntry } from './types';

/**
 * Walks up from `startDir` to the first directory holding the manifest.
 * Works from both `src/` (tests) and `dist/` (installed package).
 */
export async function resolveRepoRoot(startDir: string = path.resolve(__dirname, '..')): Promise<string> {
  let current = path.resolve(startDir);

  for (;;) {
    if (await fs.pathExists(path.join(current, MANIFEST_FILE))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new InstallerError(
        `Could not locate the repository root: no ${MANIFEST_FILE} found above ${startDir}`,
        'ROOT_NOT_FOUND'
      );
    }
    current = parent;
  }
}

export async function loadManifest(repoRoot: string): Promise<Manifest> {
  const manifestPath = path.join(repoRoot, MANIFEST_FILE);

  let data: unknown;
  try {
    data = await fs.readJson(manifestPath);
  } catch (error) {
    throw new InstallerError(`Failed to read ${MANIFEST_FILE}: ${errorMessage(error)}`, 'MANIFEST_INVALID');
  }

  const result = manifestSchema.validate(data);
  if (result.error) {
    throw new InstallerError(`Manifest validation failed: ${result.error.message}`, 'MANIFEST_INVALID');
  }

  const value = result.value;
  const entries: ManifestEntry[] = value.entries.map((entry) => ({
    ...entry,
    target: entry.target ?? path.basename(entry.sources[0])
  }));

  const seen = new Map<string, string>();
  for (const entry of entries) {
    if (entry.target === '.' || entry.target === '..' || entry.target === '') {
      throw new InstallerError(
        `Manifest entry '${entry.name}' has no usable target file name`,
        'MANIFEST_INVALID'
      );
    }
    const owner = seen.get(entry.target);
    if (owner) {
      throw new InstallerError(
        `Manifest entries '${owner}' and '${entry.name}' both install ${entry.target}`,
        'MANIFEST_INVALID'
      );
    }
    seen.set(entry.target, entry.name);
  }

  return { version: value.version, entries };
}

function expandHome(dir: string, home: string): string {
  if (dir === '~') return home;
  if (dir.startsWith('~/') || dir.startsWith('~\\')) {
    return path.join(home, dir.slice(2));
  }
  return dir;
}

/** `--dest` wins over the environment, which wins over `~/.claude/commands`. */
export function resolveDestination(
  flag?: string,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  const configured = flag || env[DESTINATION_ENV];
  if (configured) {
    return path.resolve(expandHome(configured, home));
  }
  return path.join(home, ...DEFAULT_COMMANDS_DIR);
}
