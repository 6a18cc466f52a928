export { listGuides, groupByCategory } from './list.js';
export type { GuideEntry } from './list.js';
