/**
 * Tests for the setup command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/core/gate/index.js', () => ({
  installPrecommitHook: vi.fn(),
  isManagedHook: vi.fn(),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

import { createSetupCommand } from '../../../../src/cli/commands/setup.js';
import { installPrecommitHook, isManagedHook } from '../../../../src/core/gate/index.js';
import { logger as log } from '../../../../src/utils/logger.js';

const HOOK_PATH = '/repo/.git/hooks/pre-commit';

describe('setup command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  const run = (...args: string[]) =>
    createSetupCommand().parseAsync(['node', 'guidesmith', '--command', 'npx guidesmith', ...args]);

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(process, 'cwd').mockReturnValue('/repo');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should install the hook with the given command', async () => {
    vi.mocked(installPrecommitHook).mockResolvedValue({ installed: true, hookPath: HOOK_PATH, replaced: false });

    await run();

    expect(installPrecommitHook).toHaveBeenCalledWith('/repo', { force: undefined, command: 'npx guidesmith' });
    expect(log.success).toHaveBeenCalledWith('Installed .git/hooks/pre-commit');
    expect(consoleLogSpy).toHaveBeenCalledWith('Hook runs: npx guidesmith precommit');
  });

  it('should report a replaced hook with --force', async () => {
    vi.mocked(installPrecommitHook).mockResolvedValue({ installed: true, hookPath: HOOK_PATH, replaced: true });

    await run('--force');

    expect(installPrecommitHook).toHaveBeenCalledWith('/repo', { force: true, command: 'npx guidesmith' });
    expect(log.success).toHaveBeenCalledWith('Replaced .git/hooks/pre-commit');
  });

  it('should warn about a foreign hook', async () => {
    vi.mocked(installPrecommitHook).mockResolvedValue({ installed: false, hookPath: HOOK_PATH, reason: 'exists' });
    vi.mocked(isManagedHook).mockResolvedValue(false);

    await run();

    expect(log.warn).toHaveBeenCalledWith(
      'A different pre-commit hook exists at .git/hooks/pre-commit. Use --force to replace it.'
    );
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should warn that its own hook is already installed', async () => {
    vi.mocked(installPrecommitHook).mockResolvedValue({ installed: false, hookPath: HOOK_PATH, reason: 'exists' });
    vi.mocked(isManagedHook).mockResolvedValue(true);

    await run();

    expect(log.warn).toHaveBeenCalledWith(
      'guidesmith hook already installed at .git/hooks/pre-commit. Use --force to rewrite it.'
    );
  });

  it('should exit 1 outside a git repository', async () => {
    vi.mocked(installPrecommitHook).mockRejectedValue(new Error('Not a git repository: /repo'));

    await expect(run()).rejects.toThrow('process.exit called');

    expect(log.error).toHaveBeenCalledWith('Not a git repository: /repo');
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
