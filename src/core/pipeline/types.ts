/**
 * Validation pipeline type definitions.
 */

export type StageKind = 'format-check' | 'format-write' | 'structural-lint' | 'prose-lint';

export type PipelineMode = 'check' | 'fix' | 'lint' | 'format';

/**
 * Outcome of one tool invocation.
 */
export interface ToolReport {
  tool: string;
  stage: StageKind;
  passed: boolean;
  /** Advisory failures are reported but never affect the exit code */
  advisory: boolean;
  exitCode: number;
  /** The tool's own output, unmodified */
  detail: string;
  /** Number of files handed to the tool */
  files: number;
  /** Set on failure: EXTERNAL_TOOL for a non-zero exit, TOOL_NOT_FOUND when it could not start */
  errorCode?: string;
}

/**
 * One external tool behind a single entry point. `run` resolves to a report
 * even when the tool fails; rejecting is reserved for unexpected errors.
 */
export interface DocTool {
  readonly name: string;
  /** Failures of this tool, including crashes, never affect the exit code */
  readonly advisory: boolean;
  run(paths: string[]): Promise<ToolReport>;
}

export interface Formatter extends DocTool {
  readonly kind: 'formatter';
  /** true rewrites files in place, false only verifies */
  readonly writes: boolean;
}

export interface StructuralLinter extends DocTool {
  readonly kind: 'structural-linter';
}

export interface ProseLinter extends DocTool {
  readonly kind: 'prose-linter';
}

export interface PipelineTools {
  checkFormatter: Formatter;
  writeFormatter: Formatter;
  structuralLinter: StructuralLinter;
  proseLinter: ProseLinter;
}

/**
 * The files each kind of tool sees. Prose linting gets a curated subset.
 */
export interface DocFileSet {
  all: string[];
  prose: string[];
}

export interface PipelineResult {
  mode: PipelineMode;
  reports: ToolReport[];
  exitCode: number;
  passed: boolean;
}
