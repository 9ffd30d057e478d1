/**
 * Compile entity files without writing output and report problems.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { compileEntities } from '../../core/compiler/project-compiler.js';
import { createFormatter, type CheckReport } from '../formatters/index.js';
import { exitWithError, loadProject, type GlobalOptions } from '../project.js';

interface CheckOptions extends GlobalOptions {
  json?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check entity files for compile errors and warnings')
    .argument('<files...>', 'Entity files or glob patterns')
    .option('--json', 'Output in JSON format')
    .action(async (files: string[], _options: CheckOptions, command: Command) => {
      try {
        const report = await runCheck(files, command.optsWithGlobals<CheckOptions>());
        if (report.errors.length > 0) {
          process.exit(1);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}

export async function runCheck(patterns: string[], options: CheckOptions): Promise<CheckReport> {
  const { projectRoot, config, files, entities } = await loadProject(patterns, options);
  const result = compileEntities(entities, config);

  const report: CheckReport = {
    files: files.map((file) => path.relative(projectRoot, file)),
    entities: result.compiled.map((entity) => ({
      entity: entity.entity,
      actions: entity.actions.map((action) => action.action),
    })),
    errors: result.failures.map((failure) => ({
      entity: failure.entity,
      code: failure.error.code,
      message: failure.error.message,
      details: failure.error.details,
    })),
    warnings: result.diagnostics,
  };

  const formatter = createFormatter(options.json ? 'json' : 'human', { verbose: options.verbose });
  console.log(formatter.formatCheck(report));
  return report;
}
