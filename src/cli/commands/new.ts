import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/index.js';
import { parseCategory } from '../../core/category/index.js';
import { ScaffoldEngine, NEW_GUIDE_USAGE } from '../../core/scaffold/index.js';
import { GuidesmithError, UsageError, errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface NewOptions {
  dryRun?: boolean;
  config?: string;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return new Command('new')
    .description('Create a guide from its category template')
    .argument('[name]', 'Guide name, used verbatim as the file name')
    .argument('[type]', "Category: 'how' (mechanics) or 'why' (mental model)")
    .option('--dry-run', 'Show the file that would be created without writing it')
    .option('--config <path>', 'Path to config file')
    .action(async (name: string | undefined, type: string | undefined, options: NewOptions) => {
      try {
        await runNew(name, type, options);
      } catch (error) {
        reportFailure(error);
        process.exit(1);
      }
    });
}

async function runNew(
  name: string | undefined,
  type: string | undefined,
  options: NewOptions
): Promise<void> {
  if (!name || !type) {
    throw new UsageError('NAME and TYPE are required', NEW_GUIDE_USAGE);
  }
  const category = parseCategory(type);

  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const engine = new ScaffoldEngine(projectRoot, {
    rootGuide: config.index.root_guide,
    readme: config.index.readme,
  });

  if (options.dryRun) {
    const plan = engine.plan(name, category);
    console.log();
    console.log(chalk.bold('Dry Run - Would create:'));
    console.log(chalk.dim(`Path: ${plan.relativePath}`));
    console.log(chalk.dim('─'.repeat(60)));
    console.log(plan.content);
    console.log(chalk.dim('─'.repeat(60)));
    return;
  }

  const result = await engine.create(name, category);
  if (!result.success) {
    throw result.error;
  }

  console.log(`Created ${result.relativePath}`);
  console.log();
  console.log(chalk.dim('Next steps:'));
  result.reminders.forEach((reminder, i) => {
    console.log(`  ${i + 1}. ${reminder}`);
  });
}

function reportFailure(error: unknown): void {
  if (error instanceof GuidesmithError) {
    console.error(`Error: ${error.message}`);
    if (error instanceof UsageError && error.usage) {
      console.error(error.usage);
    }
    return;
  }
  log.error(errorMessage(error));
}
