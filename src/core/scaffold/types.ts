/**
 * Scaffold type definitions.
 */
import type { Category } from '../category/index.js';
import type { GuidesmithError } from '../../utils/errors.js';

/**
 * Variables available for template substitution.
 */
export interface TemplateVariables {
  /** Name with the first character upper-cased */
  TITLE: string;
  /** Name exactly as given */
  NAME: string;
  [key: string]: string;
}

export interface ScaffoldEngineOptions {
  /** Root guide holding the per-category index table */
  rootGuide?: string;
  /** README holding the second index table */
  readme?: string;
}

/**
 * Successful creation. `reminders` are the manual index updates the tool
 * leaves to a human.
 */
export interface ScaffoldSuccess {
  success: true;
  category: Category;
  filePath: string;
  relativePath: string;
  content: string;
  reminders: string[];
}

export interface ScaffoldFailure {
  success: false;
  error: GuidesmithError;
}

export type ScaffoldResult = ScaffoldSuccess | ScaffoldFailure;

export interface ScaffoldPlan {
  category: Category;
  filePath: string;
  relativePath: string;
  content: string;
}
