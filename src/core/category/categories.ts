/**
 * The closed set of guide categories.
 *
 * A guide's category is always inferred from its top-level directory, never
 * from its content. The CLI boundary is the only place a raw string becomes a
 * Category (via parseCategory).
 */
import { InvalidCategoryError } from '../../utils/errors.js';

export const CATEGORY_IDS = ['how', 'why'] as const;

export type Category = (typeof CATEGORY_IDS)[number];

export type CategoryKind = 'mechanics' | 'mental-model';

export interface CategoryDescriptor {
  id: Category;
  kind: CategoryKind;
  /** Directory under the project root holding this category's guides */
  directory: string;
  description: string;
}

export const CATEGORIES: Readonly<Record<Category, CategoryDescriptor>> = {
  how: {
    id: 'how',
    kind: 'mechanics',
    directory: 'how',
    description: 'Mechanics: commands, syntax and quick references',
  },
  why: {
    id: 'why',
    kind: 'mental-model',
    directory: 'why',
    description: 'Mental models: principles and worked examples',
  },
};

export function isCategory(value: string): value is Category {
  return CATEGORY_IDS.some((id) => id === value);
}

/**
 * @throws InvalidCategoryError listing the allowed values
 */
export function parseCategory(value: string): Category {
  if (!isCategory(value)) {
    throw new InvalidCategoryError(value, CATEGORY_IDS);
  }
  return value;
}

/**
 * Category of a guide from its path relative to the project root.
 * Only markdown files directly inside a category directory count.
 */
export function categoryOfPath(relativePath: string): Category | undefined {
  const segments = relativePath.replace(/\\/g, '/').split('/').filter(Boolean);
  if (segments.length !== 2 || !segments[1].endsWith('.md')) {
    return undefined;
  }
  return Object.values(CATEGORIES).find((c) => c.directory === segments[0])?.id;
}
