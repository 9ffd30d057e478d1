/**
 * Show how one action compiles: bindings, cascade plan, CDC and audit.
 */
import { Command } from 'commander';
import { ActionCompiler } from '../../core/compiler/action-compiler.js';
import { EntityRegistry } from '../../core/registry/entity-registry.js';
import { createFormatter } from '../formatters/index.js';
import { exitWithError, loadProject, type GlobalOptions } from '../project.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';

interface ExplainOptions extends GlobalOptions {
  json?: boolean;
  sql?: boolean;
}

/**
 * Create the explain command.
 */
export function createExplainCommand(): Command {
  return new Command('explain')
    .description('Explain the compilation plan of one action')
    .argument('<file>', 'Entity file')
    .argument('<action>', 'Action name')
    .option('--json', 'Output in JSON format')
    .option('--sql', 'Also print the generated function')
    .action(async (file: string, actionName: string, _options: ExplainOptions, command: Command) => {
      try {
        await runExplain(file, actionName, command.optsWithGlobals<ExplainOptions>());
      } catch (error) {
        exitWithError(error);
      }
    });
}

export async function runExplain(file: string, actionName: string, options: ExplainOptions): Promise<void> {
  const { config, entities } = await loadProject([file], options);

  const entity = entities.find((e) => e.actions.some((a) => a.name === actionName));
  const action = entity?.actions.find((a) => a.name === actionName);
  if (!entity || !action) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `No action named ${actionName} in ${file}`, { file, action: actionName });
  }

  const compiler = new ActionCompiler({ config, registry: new EntityRegistry(entities) });
  const compiled = compiler.compileAction(entity, action);

  const formatter = createFormatter(options.json ? 'json' : 'human', { verbose: options.verbose });
  console.log(formatter.formatPlan(compiled.plan));
  if (options.sql && !options.json) {
    console.log('');
    console.log(compiled.sql);
  }
}
