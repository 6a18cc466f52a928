/**
 * Creates one new guide from its category template.
 * Never overwrites: an existing target is reported, not replaced.
 */
import * as path from 'node:path';
import { CATEGORIES, CATEGORY_IDS, type Category } from '../category/index.js';
import { TEMPLATES } from './templates.js';
import type {
  ScaffoldEngineOptions,
  ScaffoldPlan,
  ScaffoldResult,
  TemplateVariables,
} from './types.js';
import {
  createFileExclusive,
  ensureDir,
  fileExists,
  isErrnoException,
} from '../../utils/file-system.js';
import { capitalizeFirst, fillPlaceholders } from '../../utils/string.js';
import {
  AlreadyExistsError,
  ErrorCodes,
  GuidesmithError,
  SystemError,
  UsageError,
  errorMessage,
} from '../../utils/errors.js';

export const NEW_GUIDE_USAGE = [
  'Usage: guidesmith new NAME TYPE',
  `  TYPE must be ${CATEGORY_IDS.map((c) => `'${c}'`).join(' or ')}`,
].join('\n');

/**
 * Render a category template for `name`. Pure; touches no files.
 */
export function renderTemplate(category: Category, name: string): string {
  const variables: TemplateVariables = {
    TITLE: capitalizeFirst(name),
    NAME: name,
  };
  return fillPlaceholders(TEMPLATES[category], variables);
}

/**
 * @throws UsageError when the name is blank or is not a plain file stem
 */
export function validateGuideName(name: string | undefined): string {
  if (name === undefined || name.trim() === '') {
    throw new UsageError('Missing NAME', NEW_GUIDE_USAGE);
  }
  if (/[\\/]/.test(name) || name === '.' || name === '..' || name.toLowerCase().endsWith('.md')) {
    throw new UsageError(
      `NAME must be a plain file stem without directories or extension (got '${name}')`,
      NEW_GUIDE_USAGE,
      ErrorCodes.INVALID_NAME
    );
  }
  return name;
}

export class ScaffoldEngine {
  private readonly rootGuide: string;
  private readonly readme: string;

  constructor(
    private readonly projectRoot: string,
    options: ScaffoldEngineOptions = {}
  ) {
    this.rootGuide = options.rootGuide ?? 'CLAUDE.md';
    this.readme = options.readme ?? 'README.md';
  }

  /**
   * Compute target path and content without writing anything.
   */
  plan(name: string, category: Category): ScaffoldPlan {
    const stem = validateGuideName(name);
    const relativePath = `${CATEGORIES[category].directory}/${stem}.md`;
    return {
      category,
      relativePath,
      filePath: path.join(this.projectRoot, relativePath),
      content: renderTemplate(category, stem),
    };
  }

  /**
   * The two index updates a human has to make after creating a guide.
   */
  reminders(category: Category): string[] {
    return [
      `Update ${this.rootGuide} table in ${CATEGORIES[category].directory}/ section`,
      `Update ${this.readme} table`,
    ];
  }

  async create(name: string, category: Category): Promise<ScaffoldResult> {
    let plan: ScaffoldPlan;
    try {
      plan = this.plan(name, category);
    } catch (error) {
      return { success: false, error: toGuidesmithError(error) };
    }

    if (await fileExists(plan.filePath)) {
      return { success: false, error: new AlreadyExistsError(plan.relativePath) };
    }

    try {
      await ensureDir(path.dirname(plan.filePath));
    } catch (error) {
      return { success: false, error: writeFailure(error, plan.relativePath) };
    }

    try {
      await createFileExclusive(plan.filePath, plan.content);
    } catch (error) {
      // Lost a race with another writer between the check and the write
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return { success: false, error: new AlreadyExistsError(plan.relativePath) };
      }
      return { success: false, error: writeFailure(error, plan.relativePath) };
    }

    return {
      success: true,
      ...plan,
      reminders: this.reminders(category),
    };
  }
}

function writeFailure(error: unknown, relativePath: string): SystemError {
  return new SystemError(ErrorCodes.WRITE_FAILED, errorMessage(error), { path: relativePath });
}

function toGuidesmithError(error: unknown): GuidesmithError {
  if (error instanceof GuidesmithError) {
    return error;
  }
  return new SystemError(ErrorCodes.WRITE_FAILED, errorMessage(error));
}
