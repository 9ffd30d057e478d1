/**
 * Write the foundation SQL the compiled functions depend on.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { generateFoundation } from '../../core/foundation/generator.js';
import { writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { exitWithError, loadCliConfig, type GlobalOptions } from '../project.js';

interface FoundationCommandOptions extends GlobalOptions {
  out?: string;
  withOutbox?: boolean;
}

/**
 * Create the foundation command.
 */
export function createFoundationCommand(): Command {
  return new Command('foundation')
    .description('Generate the shared foundation SQL (result type, cascade helpers, audit log, outbox)')
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .option('--with-outbox', 'Include the transactional outbox table')
    .action(async (_options: FoundationCommandOptions, command: Command) => {
      try {
        await runFoundation(command.optsWithGlobals<FoundationCommandOptions>());
      } catch (error) {
        exitWithError(error);
      }
    });
}

export async function runFoundation(options: FoundationCommandOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadCliConfig(options, projectRoot);
  const { sql, sections } = generateFoundation(config, { withOutbox: options.withOutbox ?? false });

  if (!options.out) {
    console.log(sql);
    return;
  }

  const file = path.resolve(projectRoot, options.out);
  await writeFile(file, sql);
  log.success(`Wrote ${path.relative(projectRoot, file)} (${sections.join(', ')})`);
}
