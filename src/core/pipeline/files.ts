import type { Config } from '../config/index.js';
import type { DocFileSet } from './types.js';
import { globFiles } from '../../utils/file-system.js';
import { createPathMatcher } from '../../utils/path-matcher.js';

/**
 * Collect the documentation tree, relative to `projectRoot` and sorted.
 *
 * `prose` narrows `all` by the prose allow list and removes the deny list of
 * directories that have not been onboarded to the prose rules yet.
 */
export async function collectDocFiles(projectRoot: string, config: Config): Promise<DocFileSet> {
  const all = await globFiles(config.docs.include, {
    cwd: projectRoot,
    ignore: config.docs.exclude,
  });
  const prose = createPathMatcher(config.prose.include, config.prose.exclude).filter(all);
  return { all, prose };
}
