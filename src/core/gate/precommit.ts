/**
 * Pre-commit gate: the hook's single entry point, plus the one-time hook install.
 */
import * as path from 'node:path';
import { chmod } from 'node:fs/promises';
import type { PipelineResult } from '../pipeline/index.js';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { getHooksDir } from '../../utils/git.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';

/** Marker line identifying a hook written by guidesmith */
export const HOOK_MARKER = '# installed by guidesmith setup';

export const PRE_COMMIT_HOOK_TEMPLATE = `#!/bin/sh
${HOOK_MARKER}
# Runs the read-only docs check; a non-zero exit aborts the commit.
exec {{CMD}} precommit
`;

/**
 * Anything that can run the pipeline in check mode.
 */
export interface CheckRunner {
  run(mode: 'check'): Promise<PipelineResult>;
}

/**
 * Run the pipeline in `check` mode. Never writes to the tree.
 */
export async function runPrecommitGate(pipeline: CheckRunner): Promise<PipelineResult> {
  return pipeline.run('check');
}

export interface InstallHookOptions {
  /** Replace an existing pre-commit hook */
  force?: boolean;
  /** How the hook invokes the CLI (default: guidesmith) */
  command?: string;
  /** Hooks directory; defaults to the one git reads hooks from */
  hooksDir?: string;
}

export type InstallHookResult =
  | { installed: true; hookPath: string; replaced: boolean }
  | { installed: false; hookPath: string; reason: 'exists' };

export async function installPrecommitHook(
  projectRoot: string,
  options: InstallHookOptions = {}
): Promise<InstallHookResult> {
  const hooksDir = options.hooksDir ?? requireHooksDir(projectRoot);
  const hookPath = path.join(hooksDir, 'pre-commit');
  const exists = await fileExists(hookPath);

  if (exists && !options.force) {
    return { installed: false, hookPath, reason: 'exists' };
  }

  const content = PRE_COMMIT_HOOK_TEMPLATE.replace(/\{\{CMD\}\}/g, options.command ?? 'guidesmith');
  await writeFile(hookPath, content);
  await chmod(hookPath, 0o755);
  return { installed: true, hookPath, replaced: exists };
}

/**
 * True when the hook at `hookPath` was written by this tool.
 */
export async function isManagedHook(hookPath: string): Promise<boolean> {
  if (!(await fileExists(hookPath))) {
    return false;
  }
  return (await readFile(hookPath)).includes(HOOK_MARKER);
}

function requireHooksDir(projectRoot: string): string {
  const hooksDir = getHooksDir(projectRoot);
  if (!hooksDir) {
    throw new SystemError(
      ErrorCodes.NOT_A_GIT_REPO,
      `Not a git repository: ${projectRoot}`,
      { projectRoot }
    );
  }
  return hooksDir;
}
