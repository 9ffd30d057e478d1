/**
 * Compiles a set of loaded entities, collecting failures per entity so one
 * broken action does not hide the others.
 */
import type { Entity } from '../ast/types.js';
import type { Config } from '../config/schema.js';
import { EntityRegistry } from '../registry/entity-registry.js';
import { ActionCompiler } from './action-compiler.js';
import type { CompiledEntity, Diagnostic } from './types.js';
import { PgMutateError } from '../../utils/errors.js';

export interface EntityFailure {
  entity: string;
  error: PgMutateError;
}

export interface ProjectCompileResult {
  compiled: CompiledEntity[];
  failures: EntityFailure[];
  diagnostics: Diagnostic[];
  /** True when any compiled action writes outbox events */
  usesOutbox: boolean;
}

export function compileEntities(entities: readonly Entity[], config: Config): ProjectCompileResult {
  const registry = new EntityRegistry(entities);
  const compiler = new ActionCompiler({ config, registry });
  const compiled: CompiledEntity[] = [];
  const failures: EntityFailure[] = [];

  for (const entity of entities) {
    try {
      compiled.push(compiler.compileEntity(entity));
    } catch (error) {
      if (error instanceof PgMutateError) {
        failures.push({ entity: entity.name, error });
        continue;
      }
      throw error;
    }
  }

  return {
    compiled,
    failures,
    diagnostics: compiled.flatMap((c) => c.diagnostics),
    usesOutbox: compiled.some((c) => c.actions.some((a) => a.plan.eventType !== null)),
  };
}
