/**
 * Validation pipeline exports barrel file.
 */
export {
  ValidationPipeline,
  STAGE_PLANS,
  computeExitCode,
  createPipeline,
  createProseRuleSync,
} from './engine.js';
export type { DocFileSource } from './engine.js';
export { collectDocFiles } from './files.js';
export {
  PrettierFormatter,
  MarkdownlintLinter,
  ValeLinter,
  TOOL_NOT_FOUND_EXIT_CODE,
  NO_FILES_DETAIL,
} from './tools.js';
export type {
  StageKind,
  PipelineMode,
  ToolReport,
  DocTool,
  Formatter,
  StructuralLinter,
  ProseLinter,
  PipelineTools,
  DocFileSet,
  PipelineResult,
} from './types.js';
