/**
 * Running external commands for the formatter and linters.
 */
import { spawn } from 'node:child_process';
import * as path from 'node:path';
import { fileExists } from './file-system.js';

export interface CommandResult {
  exitCode: number;
  /** stdout followed by stderr, exactly as the command wrote them */
  output: string;
}

/**
 * Runs a command and collects its output. Implementations other than
 * `runCommand` exist only in tests.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: { cwd: string }
) => Promise<CommandResult>;

/**
 * Spawn a command without a shell and wait for it to exit.
 * Rejects when the command cannot be started (e.g. ENOENT).
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, FORCE_COLOR: process.stdout.isTTY ? '1' : '0' },
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', reject);
    child.on('close', (code, signal) => {
      resolve({
        // null code means the child was killed by a signal
        exitCode: code ?? (signal ? 1 : 0),
        output: Buffer.concat(stdout).toString('utf-8') + Buffer.concat(stderr).toString('utf-8'),
      });
    });
  });

/**
 * Prefer a project-local binary from node_modules/.bin, else rely on PATH.
 */
export async function resolveExecutable(projectRoot: string, command: string): Promise<string> {
  if (command.includes('/') || command.includes('\\')) {
    return path.resolve(projectRoot, command);
  }
  const localBin = path.join(projectRoot, 'node_modules', '.bin', command);
  if (await fileExists(localBin)) {
    return localBin;
  }
  return command;
}
