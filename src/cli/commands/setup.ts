/**
 * Install the git pre-commit hook that runs `guidesmith precommit`.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { execFileSync } from 'node:child_process';
import chalk from 'chalk';
import { installPrecommitHook, isManagedHook } from '../../core/gate/index.js';
import { fileExists } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface SetupOptions {
  force?: boolean;
  command?: string;
}

export function createSetupCommand(): Command {
  return new Command('setup')
    .description('Install the git pre-commit hook')
    .option('--force', 'Overwrite an existing pre-commit hook')
    .option('--command <cmd>', 'Command the hook uses to run guidesmith (default: auto-detect)')
    .action(async (options: SetupOptions) => {
      try {
        await runSetup(options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runSetup(options: SetupOptions): Promise<void> {
  const projectRoot = process.cwd();
  const command = options.command || (await detectGuidesmithCommand(projectRoot));

  const result = await installPrecommitHook(projectRoot, { force: options.force, command });
  const shownPath = path.relative(projectRoot, result.hookPath);

  if (!result.installed) {
    if (await isManagedHook(result.hookPath)) {
      log.warn(`guidesmith hook already installed at ${shownPath}. Use --force to rewrite it.`);
    } else {
      log.warn(`A different pre-commit hook exists at ${shownPath}. Use --force to replace it.`);
    }
    return;
  }

  log.success(`${result.replaced ? 'Replaced' : 'Installed'} ${shownPath}`);
  console.log(chalk.dim(`Hook runs: ${command} precommit`));
}

async function detectGuidesmithCommand(projectRoot: string): Promise<string> {
  try {
    execFileSync('which', ['guidesmith'], { stdio: 'ignore' });
    return 'guidesmith';
  } catch { /* not in PATH */ }

  if (await fileExists(path.join(projectRoot, 'node_modules', '.bin', 'guidesmith'))) {
    return 'npx --no-install guidesmith';
  }
  return 'npx guidesmith';
}
