/**
 * Ordered composition of the formatter and linters over the docs tree.
 *
 * Stages always run in plan order and never short-circuit, so one run
 * reports every kind of problem. Formatting always precedes linting.
 */
import type { Config } from '../config/index.js';
import type {
  DocFileSet,
  DocTool,
  PipelineMode,
  PipelineResult,
  PipelineTools,
  StageKind,
  ToolReport,
} from './types.js';
import { collectDocFiles } from './files.js';
import { MarkdownlintLinter, PrettierFormatter, ValeLinter } from './tools.js';
import type { CommandRunner } from '../../utils/process.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const STAGE_PLANS: Readonly<Record<PipelineMode, readonly StageKind[]>> = {
  check: ['format-check', 'structural-lint', 'prose-lint'],
  fix: ['format-write', 'structural-lint', 'prose-lint'],
  lint: ['structural-lint', 'prose-lint'],
  format: ['format-write'],
};

export type DocFileSource = () => Promise<DocFileSet>;

/**
 * 0 when every mandatory report passed, otherwise the exit code of the first
 * failed mandatory report (1 if that report failed with code 0).
 */
export function computeExitCode(reports: readonly ToolReport[]): number {
  const firstFailure = reports.find((r) => !r.passed && !r.advisory);
  if (!firstFailure) {
    return 0;
  }
  return firstFailure.exitCode !== 0 ? firstFailure.exitCode : 1;
}

export class ValidationPipeline {
  constructor(
    private readonly tools: PipelineTools,
    private readonly files: DocFileSource
  ) {}

  async run(mode: PipelineMode): Promise<PipelineResult> {
    const fileSet = await this.files();
    const reports: ToolReport[] = [];

    for (const stage of STAGE_PLANS[mode]) {
      const tool = this.toolFor(stage);
      const paths = stage === 'prose-lint' ? fileSet.prose : fileSet.all;
      logger.debug(`[pipeline] ${stage}: ${tool.name} on ${paths.length} file(s)`);
      reports.push(await this.runStage(stage, tool, paths));
    }

    const exitCode = computeExitCode(reports);
    return { mode, reports, exitCode, passed: exitCode === 0 };
  }

  private toolFor(stage: StageKind): DocTool {
    switch (stage) {
      case 'format-check':
        return this.tools.checkFormatter;
      case 'format-write':
        return this.tools.writeFormatter;
      case 'structural-lint':
        return this.tools.structuralLinter;
      case 'prose-lint':
        return this.tools.proseLinter;
    }
  }

  private async runStage(stage: StageKind, tool: DocTool, paths: string[]): Promise<ToolReport> {
    try {
      return await tool.run(paths);
    } catch (error) {
      // A crashed stage is a failed stage of the same weight; later stages still run
      return {
        tool: tool.name,
        stage,
        passed: false,
        advisory: tool.advisory,
        exitCode: 1,
        detail: errorMessage(error),
        files: paths.length,
      };
    }
  }
}

/**
 * Pipeline wired to prettier, markdownlint and vale as configured.
 */
export function createPipeline(
  projectRoot: string,
  config: Config,
  runner?: CommandRunner
): ValidationPipeline {
  const { formatter, structural_linter, prose_linter } = config.tools;
  const tools: PipelineTools = {
    checkFormatter: new PrettierFormatter(projectRoot, formatter, false, runner),
    writeFormatter: new PrettierFormatter(projectRoot, formatter, true, runner),
    structuralLinter: new MarkdownlintLinter(projectRoot, structural_linter, runner),
    proseLinter: new ValeLinter(projectRoot, prose_linter, config.prose.advisory, runner),
  };
  return new ValidationPipeline(tools, () => collectDocFiles(projectRoot, config));
}

/**
 * `vale sync`: one-time download of the prose linter's rule packages.
 */
export function createProseRuleSync(
  projectRoot: string,
  config: Config,
  runner?: CommandRunner
): ValeLinter {
  return new ValeLinter(projectRoot, config.tools.prose_linter, config.prose.advisory, runner);
}
