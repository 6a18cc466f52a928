/**
 * Enumerate existing guides by category, for updating the index tables by hand.
 */
import * as path from 'node:path';
import { CATEGORIES, CATEGORY_IDS, categoryOfPath, type Category } from '../category/index.js';
import { globFiles } from '../../utils/file-system.js';

export interface GuideEntry {
  category: Category;
  /** File stem, as passed to `guidesmith new` */
  name: string;
  relativePath: string;
}

/**
 * Flat markdown files directly inside each category directory, ordered by
 * category then name. Membership comes from the directory alone.
 */
export async function listGuides(projectRoot: string, only?: Category): Promise<GuideEntry[]> {
  const categories = only ? [only] : [...CATEGORY_IDS];
  const patterns = categories.map((c) => `${CATEGORIES[c].directory}/*.md`);
  const files = await globFiles(patterns, { cwd: projectRoot });

  const entries: GuideEntry[] = [];
  for (const relativePath of files) {
    const category = categoryOfPath(relativePath);
    if (category) {
      entries.push({ category, name: path.basename(relativePath, '.md'), relativePath });
    }
  }

  const order = (c: Category): number => CATEGORY_IDS.indexOf(c);
  return entries.sort(
    (a, b) => order(a.category) - order(b.category) || a.name.localeCompare(b.name)
  );
}

export function groupByCategory(entries: readonly GuideEntry[]): Record<Category, GuideEntry[]> {
  const groups: Record<Category, GuideEntry[]> = { how: [], why: [] };
  for (const entry of entries) {
    groups[entry.category].push(entry);
  }
  return groups;
}
