/**
 * lint / format / check / fix / precommit: thin wrappers over the pipeline.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/index.js';
import {
  createPipeline,
  type PipelineMode,
  type PipelineResult,
  type ValidationPipeline,
} from '../../core/pipeline/index.js';
import { runPrecommitGate } from '../../core/gate/index.js';
import { formatJson, formatSummary } from '../formatters/pipeline-report.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface PipelineOptions {
  config?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

const DESCRIPTIONS: Record<PipelineMode, string> = {
  lint: 'Run the structural and prose linters',
  format: 'Format every markdown file in place',
  check: 'Verify formatting and lint without changing any file',
  fix: 'Format in place, then lint',
};

function withPipelineOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output the report as JSON')
    .option('--quiet', 'Only print failures')
    .option('--verbose', 'Show tool invocations');
}

export function createPipelineCommand(mode: PipelineMode): Command {
  return withPipelineOptions(new Command(mode).description(DESCRIPTIONS[mode]))
    .action(async (options: PipelineOptions) => {
      const exitCode = await runGuarded(options, (pipeline) => pipeline.run(mode));
      process.exit(exitCode);
    });
}

/**
 * Entry point for the git pre-commit hook.
 */
export function createPrecommitCommand(): Command {
  return withPipelineOptions(
    new Command('precommit').description('Run the read-only check; non-zero aborts the commit')
  ).action(async (options: PipelineOptions) => {
    const exitCode = await runGuarded(options, (pipeline) => runPrecommitGate(pipeline));
    if (exitCode !== 0 && !options.json) {
      log.error('Commit aborted: run "guidesmith fix" and review the remaining problems.');
    }
    process.exit(exitCode);
  });
}

type PipelineRun = (pipeline: ValidationPipeline) => Promise<PipelineResult>;

async function runGuarded(options: PipelineOptions, run: PipelineRun): Promise<number> {
  log.applyFlags(options);
  try {
    const projectRoot = process.cwd();
    const config = await loadConfig(projectRoot, options.config);
    const result = await run(createPipeline(projectRoot, config));
    printResult(result, options);
    return result.exitCode;
  } catch (error) {
    log.error(errorMessage(error));
    return 1;
  }
}

export function printResult(result: PipelineResult, options: PipelineOptions): void {
  if (options.json) {
    console.log(formatJson(result));
    return;
  }
  for (const report of result.reports) {
    if (options.quiet && report.passed) continue;
    log.passthrough(report.detail);
  }
  console.log();
  console.log(formatSummary(result));
}
