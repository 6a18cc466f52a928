/**
 * Include/exclude matching for relative paths.
 * The prose linter's allow/deny lists go through here.
 */
import { minimatch } from 'minimatch';

export interface PathMatcher {
  /**
   * True if the path should be included.
   * @param filePath - Relative path from project root
   */
  matches(filePath: string): boolean;

  filter(filePaths: string[]): string[];
}

/**
 * Create a PathMatcher.
 *
 * - No include patterns: everything starts included.
 * - Otherwise a path must match at least one include pattern.
 * - Any exclude match removes the path.
 *
 * A pattern ending in `/` (or `/**`) matches everything under that directory.
 */
export function createPathMatcher(
  include: string[] = [],
  exclude: string[] = []
): PathMatcher {
  const includeGlobs = include.map(expandDirectoryPattern);
  const excludeGlobs = exclude.map(expandDirectoryPattern);
  const test = (filePath: string, glob: string): boolean =>
    minimatch(filePath, glob, { dot: true });

  return {
    matches(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/');
      if (includeGlobs.length > 0 && !includeGlobs.some((glob) => test(normalizedPath, glob))) {
        return false;
      }
      return !excludeGlobs.some((glob) => test(normalizedPath, glob));
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => this.matches(fp));
    },
  };
}

function expandDirectoryPattern(pattern: string): string {
  return pattern.endsWith('/') ? `${pattern}**` : pattern;
}
