/**
 * External formatter and linters, invoked as black boxes.
 *
 * Each tool gets a fixed argument list, the configured config file and the
 * explicit list of paths. Its output is carried into the report untouched.
 */
import * as path from 'node:path';
import type { ToolConfig } from '../config/index.js';
import type {
  Formatter,
  ProseLinter,
  StageKind,
  StructuralLinter,
  ToolReport,
} from './types.js';
import {
  runCommand,
  resolveExecutable,
  type CommandResult,
  type CommandRunner,
} from '../../utils/process.js';
import { ErrorCodes, ExternalToolFailure, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** Exit code reported when a tool could not be started at all */
export const TOOL_NOT_FOUND_EXIT_CODE = 127;

export const NO_FILES_DETAIL = 'no files to process';

abstract class ExternalTool {
  readonly name: string;

  constructor(
    protected readonly projectRoot: string,
    protected readonly config: ToolConfig,
    protected readonly runner: CommandRunner = runCommand
  ) {
    this.name = path.basename(config.command);
  }

  protected abstract get stage(): StageKind;

  get advisory(): boolean {
    return false;
  }

  protected abstract buildArgs(paths: string[]): string[];

  protected configArgs(): string[] {
    return this.config.config ? ['--config', this.config.config] : [];
  }

  async run(paths: string[]): Promise<ToolReport> {
    if (paths.length === 0) {
      return this.report({ exitCode: 0, output: NO_FILES_DETAIL }, 0);
    }

    const executable = await resolveExecutable(this.projectRoot, this.config.command);
    const args = this.buildArgs(paths);
    logger.debug(`[pipeline] ${executable} ${args.join(' ')}`);

    let result: CommandResult;
    try {
      result = await this.runner(executable, args, { cwd: this.projectRoot });
    } catch (error) {
      const failure = this.startFailure(error);
      return {
        ...this.report({ exitCode: failure.exitCode, output: describeFailure(failure) }, paths.length),
        errorCode: failure.code,
      };
    }

    return this.report(result, paths.length);
  }

  protected startFailure(error: unknown): ExternalToolFailure {
    return new ExternalToolFailure(
      this.name,
      TOOL_NOT_FOUND_EXIT_CODE,
      errorMessage(error),
      ErrorCodes.TOOL_NOT_FOUND
    );
  }

  private report(result: CommandResult, files: number): ToolReport {
    const report: ToolReport = {
      tool: this.name,
      stage: this.stage,
      passed: result.exitCode === 0,
      advisory: this.advisory,
      exitCode: result.exitCode,
      detail: result.output,
      files,
    };
    if (!report.passed) {
      report.errorCode = ErrorCodes.EXTERNAL_TOOL;
    }
    return report;
  }
}

function describeFailure(failure: ExternalToolFailure): string {
  return `${failure.message}: ${failure.output}`;
}

/**
 * prettier, either `--check` (read-only) or `--write`.
 */
export class PrettierFormatter extends ExternalTool implements Formatter {
  readonly kind = 'formatter' as const;

  constructor(
    projectRoot: string,
    config: ToolConfig,
    readonly writes: boolean,
    runner?: CommandRunner
  ) {
    super(projectRoot, config, runner);
  }

  protected get stage(): StageKind {
    return this.writes ? 'format-write' : 'format-check';
  }

  protected buildArgs(paths: string[]): string[] {
    return [this.writes ? '--write' : '--check', ...this.configArgs(), ...paths];
  }
}

/**
 * markdownlint: heading order, list style and other syntax conventions.
 */
export class MarkdownlintLinter extends ExternalTool implements StructuralLinter {
  readonly kind = 'structural-linter' as const;

  protected get stage(): StageKind {
    return 'structural-lint';
  }

  protected buildArgs(paths: string[]): string[] {
    return [...this.configArgs(), ...paths];
  }
}

/**
 * vale: writing-style rules (passive voice, word choice).
 */
export class ValeLinter extends ExternalTool implements ProseLinter {
  readonly kind = 'prose-linter' as const;

  constructor(
    projectRoot: string,
    config: ToolConfig,
    private readonly isAdvisory: boolean = false,
    runner?: CommandRunner
  ) {
    super(projectRoot, config, runner);
  }

  protected get stage(): StageKind {
    return 'prose-lint';
  }

  get advisory(): boolean {
    return this.isAdvisory;
  }

  protected buildArgs(paths: string[]): string[] {
    return [...this.configArgs(), '--no-wrap', ...paths];
  }

  /**
   * Download the style packages named in the vale config (`vale sync`).
   */
  async sync(): Promise<CommandResult> {
    const executable = await resolveExecutable(this.projectRoot, this.config.command);
    const args = [...this.configArgs(), 'sync'];
    logger.debug(`[pipeline] ${executable} ${args.join(' ')}`);
    try {
      return await this.runner(executable, args, { cwd: this.projectRoot });
    } catch (error) {
      const failure = this.startFailure(error);
      return { exitCode: failure.exitCode, output: describeFailure(failure) };
    }
  }
}
