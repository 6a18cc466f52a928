import { Command } from 'commander';
import { loadConfig } from '../../core/config/index.js';
import { createProseRuleSync } from '../../core/pipeline/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the sync command (one-time download of vale style packages).
 */
export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Download the prose linter rule packages named in its config')
    .option('--config <path>', 'Path to config file')
    .action(async (options: { config?: string }) => {
      let exitCode: number;
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        const result = await createProseRuleSync(projectRoot, config).sync();
        log.passthrough(result.output);
        exitCode = result.exitCode;
        if (exitCode === 0) {
          log.success('Prose rule packages synced');
        } else {
          log.fail(`${config.tools.prose_linter.command} sync exited with code ${exitCode}`);
        }
      } catch (error) {
        log.error(errorMessage(error));
        exitCode = 1;
      }
      process.exit(exitCode);
    });
}
