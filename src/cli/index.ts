import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createNewCommand } from './commands/new.js';
import { createPipelineCommand, createPrecommitCommand } from './commands/pipeline.js';
import { createSyncCommand } from './commands/sync.js';
import { createSetupCommand } from './commands/setup.js';
import { createListCommand } from './commands/list.js';
import { createInitCommand } from './commands/init.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('guidesmith')
    .description('Scaffold and validate a markdown knowledge base')
    .version(readVersion());

  [
    createNewCommand,
    () => createPipelineCommand('lint'),
    () => createPipelineCommand('format'),
    () => createPipelineCommand('check'),
    () => createPipelineCommand('fix'),
    createPrecommitCommand,
    createSyncCommand,
    createSetupCommand,
    createListCommand,
    createInitCommand,
  ].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
