import { Command } from 'commander';
import chalk from 'chalk';
import { CATEGORIES, CATEGORY_IDS, parseCategory, type Category } from '../../core/category/index.js';
import { listGuides, groupByCategory } from '../../core/guides/index.js';
import { GuidesmithError, errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface ListOptions {
  category?: string;
  json?: boolean;
}

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List guides by category (to help update the index tables)')
    .option('-c, --category <type>', "Only list one category: 'how' or 'why'")
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        await runList(options);
      } catch (error) {
        if (error instanceof GuidesmithError) {
          console.error(`Error: ${error.message}`);
        } else {
          log.error(errorMessage(error));
        }
        process.exit(1);
      }
    });
}

async function runList(options: ListOptions): Promise<void> {
  const only: Category | undefined = options.category ? parseCategory(options.category) : undefined;
  const entries = await listGuides(process.cwd(), only);

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  const groups = groupByCategory(entries);
  for (const id of CATEGORY_IDS) {
    if (only && id !== only) continue;
    const descriptor = CATEGORIES[id];
    console.log(chalk.bold(`${descriptor.directory}/`) + chalk.dim(` ${descriptor.description}`));
    if (groups[id].length === 0) {
      console.log(chalk.dim('  (none)'));
    }
    for (const entry of groups[id]) {
      console.log(`  ${entry.name}`);
    }
    console.log();
  }
}
