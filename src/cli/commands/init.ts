import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { CATEGORIES, CATEGORY_IDS } from '../../core/category/index.js';
import { ensureDir, fileExists, writeFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { INIT_FILES } from './init-templates.js';

interface InitOptions {
  force?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Write default tool configuration and create the category directories')
    .option('--force', 'Overwrite existing configuration files')
    .action(async (options: InitOptions) => {
      try {
        await runInit(process.cwd(), options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

export interface InitSummary {
  written: string[];
  skipped: string[];
}

export async function runInit(projectRoot: string, options: InitOptions): Promise<InitSummary> {
  const summary: InitSummary = { written: [], skipped: [] };

  console.log();
  console.log(chalk.bold('Initializing guidesmith...'));
  console.log();

  for (const id of CATEGORY_IDS) {
    await ensureDir(path.join(projectRoot, CATEGORIES[id].directory));
  }

  for (const file of INIT_FILES) {
    const target = path.join(projectRoot, file.path);
    if (!options.force && (await fileExists(target))) {
      log.warn(`${file.path} already exists, skipping (use --force to overwrite)`);
      summary.skipped.push(file.path);
      continue;
    }
    await writeFile(target, file.content);
    log.success(`Created ${file.path}`);
    summary.written.push(file.path);
  }

  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. Run ${chalk.cyan('guidesmith sync')} to download prose rule packages`);
  console.log(`  2. Run ${chalk.cyan('guidesmith setup')} to install the pre-commit hook`);
  console.log(`  3. Create a guide with ${chalk.cyan('guidesmith new NAME how')}`);
  return summary;
}
