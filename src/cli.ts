#!/usr/bin/env node

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { CommandInstaller, exitCodeFor } from './command-installer';
import { RULE } from './constants';
import { errorMessage } from './errors';
import { resolveDestination } from './manifest';
import { RepoSyncer } from './types';

export interface ProgramDeps {
  repoRoot?: string;
  sync?: RepoSyncer;
}

async function createInstaller(dest: string | undefined, deps: ProgramDeps): Promise<CommandInstaller> {
  const installer = new CommandInstaller({
    destination: resolveDestination(dest),
    repoRoot: deps.repoRoot,
    sync: deps.sync
  });
  await installer.init();
  return installer;
}

function fail(error: unknown, label = 'Installation failed:'): never {
  console.error(chalk.red(label), errorMessage(error));
  process.exit(1);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name('dbapps-install')
    .description('Install the /dbapps slash commands into the Claude Code commands directory')
    .version('1.0.0');

  program
    .command('install', { isDefault: true })
    .description('Copy the command templates into the commands directory')
    .option('-u, --update', 'pull the latest changes from the repository before installing')
    .option('-d, --dest <dir>', 'destination directory (default: ~/.claude/commands)')
    .allowExcessArguments(false)
    .action(async (options: { update?: boolean; dest?: string }) => {
      let code = 0;
      try {
        const installer = await createInstaller(options.dest, deps);

        console.log(chalk.blue(RULE));
        console.log(chalk.blue(options.update
          ? 'Updating and installing /dbapps commands'
          : 'Installing /dbapps commands for Claude Code'));
        console.log(chalk.blue(RULE));

        const onInterrupt = () => installer.cancel();
        process.once('SIGINT', onInterrupt);
        try {
          code = exitCodeFor(await installer.install({ update: options.update }));
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      } catch (error) {
        fail(error);
      }

      if (code !== 0) {
        process.exit(code);
      }
    });

  program
    .command('status')
    .description('Show which commands are installed and whether they are up to date')
    .option('-d, --dest <dir>', 'destination directory (default: ~/.claude/commands)')
    .action(async (options: { dest?: string }) => {
      try {
        const installer = await createInstaller(options.dest, deps);
        await installer.checkStatus();
      } catch (error) {
        fail(error, 'Status failed:');
      }
    });

  program
    .command('uninstall')
    .description('Remove the installed command files')
    .option('-d, --dest <dir>', 'destination directory (default: ~/.claude/commands)')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (options: { dest?: string; yes?: boolean }) => {
      try {
        const installer = await createInstaller(options.dest, deps);

        if (!options.yes) {
          const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
            {
              type: 'confirm',
              name: 'confirm',
              message: `Remove the installed commands from ${installer.destinationDir}?`,
              default: false
            }
          ]);
          if (!confirm) {
            console.log(chalk.yellow('Uninstall cancelled'));
            return;
          }
        }

        await installer.uninstall();
      } catch (error) {
        fail(error, 'Uninstall failed:');
      }
    });

  return program;
}

export const program = createProgram();

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => fail(error));
}
