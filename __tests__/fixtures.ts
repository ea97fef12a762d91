import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { MANIFEST_FILE } from '../src/constants';
import { RawManifest, RepoSyncer, SyncOutcome } from '../src/types';

export const TEST_MANIFEST: RawManifest = {
  version: '1.0.0',
  entries: [
    { name: 'dbapps', sources: ['commands/dbapps.md'], command: '/dbapps', description: 'Create an app' },
    { name: 'dbapps-deploy', sources: ['commands/deploy_template.py'] },
    { name: 'dbaiassistant', sources: ['commands/dbaiassistant.md'], command: '/dbaiassistant' },
    { name: 'dbgeniespaces', sources: ['commands/dbgeniespaces.md'], command: '/dbgeniespaces' },
    { name: 'dbtestrunner', sources: ['commands/dbtestrunner.md', 'dbtestrunner.md'], command: '/dbtestrunner' }
  ]
};

export const TARGETS = [
  'dbapps.md',
  'deploy_template.py',
  'dbaiassistant.md',
  'dbgeniespaces.md',
  'dbtestrunner.md'
];

export async function createWorkspace(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'dbapps-install-test-'));
}

export function sourceContent(relativePath: string): string {
  return `# ${relativePath}\n\nTemplate body for ${relativePath}.\n`;
}

/** Writes a manifest and the first source of every entry not listed in `omit`. */
export async function createRepo(
  root: string,
  options: { omit?: string[]; manifest?: RawManifest } = {}
): Promise<void> {
  const manifest = options.manifest ?? TEST_MANIFEST;
  const omit = options.omit ?? [];

  await fs.ensureDir(root);
  await fs.writeJson(path.join(root, MANIFEST_FILE), manifest, { spaces: 2 });

  for (const entry of manifest.entries) {
    if (omit.includes(entry.name)) continue;
    const source = entry.sources[0];
    await fs.ensureDir(path.dirname(path.join(root, source)));
    await fs.writeFile(path.join(root, source), sourceContent(source));
  }
}

export function fakeSync(outcome: SyncOutcome): RepoSyncer & { sync: jest.Mock<Promise<SyncOutcome>, [string]> } {
  return { sync: jest.fn(async (_repoRoot: string) => outcome) };
}
