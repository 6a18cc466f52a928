/**
 * Git queries needed to install the pre-commit hook.
 */
import { execFileSync } from 'node:child_process';
import * as path from 'node:path';

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

/**
 * Absolute path of the directory git reads hooks from, or null when
 * `projectRoot` is not inside a git work tree (or git is unavailable).
 *
 * Honours `core.hooksPath` and resolves a linked worktree to the main
 * repository's hooks, since `--git-path` applies git's own relocation rules.
 */
export function getHooksDir(projectRoot: string): string | null {
  try {
    const result = execFileSync('git', ['rev-parse', '--git-path', 'hooks'], {
      cwd: projectRoot,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    const hooksDir = result.trim();
    return hooksDir ? path.resolve(projectRoot, hooksDir) : null;
  } catch { /* not a git repo or git unavailable */
    return null;
  }
}
