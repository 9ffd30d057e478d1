/**
 * Compile entity files into one SQL file per entity.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { compileEntities } from '../../core/compiler/project-compiler.js';
import { generateFoundation } from '../../core/foundation/generator.js';
import { entityLower } from '../../core/compiler/naming.js';
import { writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { exitWithError, loadProject, type GlobalOptions } from '../project.js';

interface CompileOptions extends GlobalOptions {
  out?: string;
  foundation?: boolean;
  stdout?: boolean;
}

/**
 * Create the compile command.
 */
export function createCompileCommand(): Command {
  return new Command('compile')
    .description('Compile entity YAML files into PL/pgSQL mutation functions')
    .argument('<files...>', 'Entity files or glob patterns')
    .option('-o, --out <dir>', 'Output directory (default: output.dir from config)')
    .option('--foundation', 'Also write the foundation SQL file')
    .option('--stdout', 'Print SQL instead of writing files')
    .action(async (files: string[], _options: CompileOptions, command: Command) => {
      try {
        await runCompile(files, command.optsWithGlobals<CompileOptions>());
      } catch (error) {
        exitWithError(error);
      }
    });
}

export async function runCompile(patterns: string[], options: CompileOptions): Promise<void> {
  const { projectRoot, config, entities } = await loadProject(patterns, options);
  const result = compileEntities(entities, config);

  if (result.failures.length > 0) {
    for (const failure of result.failures) {
      log.error(`${failure.entity}: ${failure.error.code} ${failure.error.message}`);
    }
    log.fail(`${result.failures.length} entit${result.failures.length === 1 ? 'y' : 'ies'} failed to compile; nothing written`);
    process.exit(1);
  }

  const outDir = path.resolve(projectRoot, options.out ?? config.output.dir);
  // Entities without actions only serve as lookup targets.
  const outputs: Array<{ file: string; sql: string }> = result.compiled
    .filter((entity) => entity.actions.length > 0)
    .map((entity) => ({
      file: path.join(outDir, `${entityLower(entity.entity)}.sql`),
      sql: entity.sql,
    }));

  if (options.foundation) {
    outputs.unshift({
      file: path.join(outDir, config.output.foundation_file),
      sql: generateFoundation(config, { withOutbox: result.usesOutbox }).sql,
    });
  }

  if (options.stdout) {
    console.log(outputs.map((output) => output.sql).join('\n'));
    return;
  }

  for (const output of outputs) {
    await writeFile(output.file, output.sql);
    log.success(`Wrote ${path.relative(projectRoot, output.file)}`);
  }
}
