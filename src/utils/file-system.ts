/**
 * File system helpers shared by the scaffolder, the pipeline and init.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Create a file that must not exist yet. Rejects with an `EEXIST` error
 * when something is already at `filePath`; the existing file is left alone.
 * The parent directory must exist.
 */
export async function createFileExclusive(filePath: string, content: string): Promise<void> {
  await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns. Results are relative to `cwd` unless
 * `absolute` is set, and always sorted so callers get a stable order.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? false,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}

/**
 * Node error with an errno-style code, as thrown by fs calls.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
