export {
  CATEGORY_IDS,
  CATEGORIES,
  isCategory,
  parseCategory,
  categoryOfPath,
} from './categories.js';
export type { Category, CategoryKind, CategoryDescriptor } from './categories.js';
