/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCompileCommand } from './commands/compile.js';
import { createCheckCommand } from './commands/check.js';
import { createFoundationCommand } from './commands/foundation.js';
import { createExplainCommand } from './commands/explain.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('pgmutate')
    .description('Compile declarative entity actions into PL/pgSQL mutation functions')
    .version(readVersion())
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors')
    .option('-c, --config <path>', 'Path to config file (default: .pgmutate/config.yaml)');

  [createCompileCommand, createCheckCommand, createFoundationCommand, createExplainCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
