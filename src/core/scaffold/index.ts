/**
 * Scaffold engine exports barrel file.
 */
export { ScaffoldEngine, renderTemplate, validateGuideName, NEW_GUIDE_USAGE } from './engine.js';
export { TEMPLATES, MECHANICS_TEMPLATE, MENTAL_MODEL_TEMPLATE } from './templates.js';
export type {
  TemplateVariables,
  ScaffoldEngineOptions,
  ScaffoldPlan,
  ScaffoldResult,
  ScaffoldSuccess,
  ScaffoldFailure,
} from './types.js';
