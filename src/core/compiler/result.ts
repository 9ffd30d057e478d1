/**
 * Mutation result assembly and return statements.
 */
import type { Action, Entity, InsertStep, UpdateStep } from '../ast/types.js';
import type { Config } from '../config/schema.js';
import type { EntityRegistry } from '../registry/entity-registry.js';
import type { BindingTable } from './binding-table.js';
import type { ResolvedImpact, ValidationFailure } from './types.js';
import { viewName } from './naming.js';
import { qualify, sqlLiteral, textArray } from '../../utils/sql.js';

export const NIL_UUID = "'00000000-0000-0000-0000-000000000000'::UUID";
export const VALIDATION_STATUS = 'failed:validation';

/** Name of the composite result type. */
export function resultType(config: Config): string {
  return qualify(config.schemas.app, 'mutation_result');
}

/**
 * Columns written to the owning entity by insert/update steps, in order.
 */
export function ownerColumns(action: Action, owner: Entity): string[] {
  const columns = action.steps
    .filter((step): step is InsertStep | UpdateStep => step.kind === 'insert' || step.kind === 'update')
    .filter((step) => step.entity === owner.name)
    .flatMap((step) => Object.keys(step.fields));
  return [...new Set(columns)];
}

export interface SuccessResultInput {
  action: Action;
  owner: Entity;
  primary: ResolvedImpact | null;
  bindings: BindingTable;
  registry: EntityRegistry;
  config: Config;
  extraMetadata: string;
}

/**
 * Assignments filling `v_result` for a successful run.
 */
export function successResultStatements(input: SuccessResultInput): string[] {
  const { action, owner, primary, config } = input;
  let id = 'NULL';
  let objectData = 'NULL';
  let updatedFields = ownerColumns(action, owner);

  if (primary) {
    id = primary.binding.variable;
    updatedFields = primary.impact.fields;
    if (primary.label !== 'DELETED') {
      const entity = primary.impact.entity;
      const schema = input.registry.schemaOf(entity, owner.schema);
      objectData = `${qualify(config.schemas.app, 'cascade_entity')}(${sqlLiteral(entity)}, ${id}, ${sqlLiteral(primary.label)}, ${sqlLiteral(schema)}, ${sqlLiteral(viewName(entity, config.naming))})->'entity'`;
    }
  } else {
    const ownerBinding = input.bindings.lookup(owner.name);
    if (ownerBinding) {
      id = ownerBinding.variable;
      objectData = `jsonb_build_object('id', ${id})`;
    }
  }

  return [
    `v_result.id := ${id};`,
    `v_result.updated_fields := ${textArray(updatedFields)};`,
    "v_result.status := 'success';",
    `v_result.message := ${sqlLiteral(`${action.name} completed`)};`,
    `v_result.object_data := ${objectData};`,
    input.extraMetadata,
  ];
}

/**
 * Success return, optionally routed through the mutation-log helper.
 */
export function successReturn(
  config: Config,
  logMutation: { entity: string; operation: string } | null
): string {
  if (!logMutation) {
    return 'RETURN v_result;';
  }
  const args = [
    'auth_tenant_id',
    'auth_user_id',
    sqlLiteral(logMutation.entity),
    'v_result.id',
    sqlLiteral(logMutation.operation),
    'v_result.status',
    'v_result.updated_fields',
    'v_result.message',
    'v_result.object_data',
    'v_result.extra_metadata',
  ];
  return `RETURN ${qualify(config.schemas.app, 'log_and_return_mutation')}(\n${args.map((a) => `    ${a}`).join(',\n')}\n);`;
}

/**
 * Direct return of a validation failure. Values are SQL expressions.
 */
export function failureReturn(
  config: Config,
  values: { message: string; code: string; step: string }
): string {
  return [
    'RETURN ROW(',
    `    ${NIL_UUID},`,
    '    ARRAY[]::TEXT[],',
    `    ${sqlLiteral(VALIDATION_STATUS)},`,
    `    ${values.message},`,
    '    NULL::JSONB,',
    `    jsonb_build_object('code', ${values.code}, 'step', ${values.step})`,
    `)::${resultType(config)};`,
  ].join('\n');
}

/** SQLSTATE raised by validate steps inside the rollback block. */
export const VALIDATION_SQLSTATE = 'PM001';

/**
 * Raise that unwinds the rollback block with the failure details.
 */
export function validationRaise(failure: ValidationFailure): string {
  return `RAISE EXCEPTION USING ERRCODE = ${sqlLiteral(VALIDATION_SQLSTATE)}, MESSAGE = ${sqlLiteral(failure.message)}, DETAIL = ${sqlLiteral(failure.code)}, HINT = ${sqlLiteral(String(failure.stepIndex))};`;
}

export const VALIDATION_HANDLER_DECLARATIONS = [
  'v_error_message TEXT;',
  'v_error_code TEXT;',
  'v_error_step TEXT;',
];

/**
 * Body of the `WHEN SQLSTATE` handler.
 */
export function validationHandler(config: Config, clear: readonly string[]): string[] {
  return [
    'GET STACKED DIAGNOSTICS',
    '    v_error_message = MESSAGE_TEXT,',
    '    v_error_code = PG_EXCEPTION_DETAIL,',
    '    v_error_step = PG_EXCEPTION_HINT;',
    ...clear,
    failureReturn(config, {
      message: 'v_error_message',
      code: 'v_error_code',
      step: 'v_error_step::INTEGER',
    }),
  ];
}
