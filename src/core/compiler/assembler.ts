/**
 * Function assembler - stitches compiled fragments into one PL/pgSQL function.
 *
 * Phase order:
 *   1 declarations
 *   2a audit seed
 *   2  steps in YAML order, each followed by its audit-context update
 *   3  cascade construction
 *   4  audit context replaced by the full cascade
 *   5  outbox write
 *   6  result assembly
 *   7  audit clear
 *   8  return
 * When validation must roll back earlier DML, phases 2 to 5 run inside a
 * block whose handler returns the failure result.
 */
import type { ActionStep } from '../ast/types.js';
import type { StepFragment } from './types.js';
import { VALIDATION_SQLSTATE } from './result.js';
import { indent, qualify, sqlLiteral } from '../../utils/sql.js';
import { CompileError, ErrorCodes } from '../../utils/errors.js';

export interface AssembledStep {
  fragment: StepFragment;
  /** Audit statements run right after the step */
  audit: string[];
}

export interface FunctionParts {
  schema: string;
  name: string;
  /** Parameters between the auth context and input_payload */
  parameters: Array<{ name: string; type: string }>;
  returns: string;
  declarations: string[];
  auditSeed: string[];
  steps: AssembledStep[];
  cascade: string[];
  auditSet: string[];
  outbox: string[];
  result: string[];
  auditClear: string[];
  returnStatement: string;
  /** Handler body when validation rolls back earlier DML */
  validationHandler: string[] | null;
}

/**
 * One-line description of a step for its header comment.
 */
export function describeStep(step: ActionStep): string {
  switch (step.kind) {
    case 'insert':
      return `insert ${step.entity}`;
    case 'update':
      return `update ${step.entity}`;
    case 'delete':
      return `${step.hard ? 'hard' : 'soft'} delete ${step.entity}`;
    case 'validate':
      return `validate ${step.error ?? step.condition.trim()}`;
    case 'call':
      return step.captures ? `call ${step.function} -> ${step.captures}` : `call ${step.function}`;
    default: {
      const unknown: never = step;
      throw new CompileError(ErrorCodes.UNKNOWN_STEP_KIND, `Unknown step kind in ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Full argument list: auth context, extra parameters, input payload.
 */
export function functionArguments(parameters: FunctionParts['parameters']): Array<{ name: string; type: string; defaultValue?: string }> {
  return [
    { name: 'auth_tenant_id', type: 'UUID' },
    { name: 'auth_user_id', type: 'UUID' },
    ...parameters,
    { name: 'input_payload', type: 'JSONB', defaultValue: "'{}'::jsonb" },
  ];
}

/** `(UUID, UUID, JSONB)` as used by COMMENT ON FUNCTION. */
export function functionSignature(parts: Pick<FunctionParts, 'schema' | 'name' | 'parameters'>): string {
  const types = functionArguments(parts.parameters).map((arg) => arg.type);
  return `${qualify(parts.schema, parts.name)}(${types.join(', ')})`;
}

function section(title: string, statements: readonly string[]): string | null {
  if (statements.length === 0) return null;
  return [`-- ${title}`, ...statements].join('\n');
}

function stepSection(step: AssembledStep): string {
  const { fragment, audit } = step;
  return [`-- Step ${fragment.stepIndex}: ${describeStep(fragment.step)}`, fragment.sql, ...audit].join('\n');
}

function joinSections(sections: ReadonlyArray<string | null>): string {
  return sections.filter((s): s is string => s !== null).join('\n\n');
}

/**
 * Assemble the CREATE FUNCTION statement.
 */
export function assembleFunction(parts: FunctionParts): string {
  const args = functionArguments(parts.parameters).map((arg) =>
    arg.defaultValue ? `    ${arg.name} ${arg.type} DEFAULT ${arg.defaultValue}` : `    ${arg.name} ${arg.type}`
  );

  const work = joinSections([
    ...parts.steps.map(stepSection),
    section('Cascade', parts.cascade),
    section('Audit context: full cascade', parts.auditSet),
    section('Outbox event', parts.outbox),
  ]);

  const guarded = parts.validationHandler
    ? [
        'BEGIN',
        indent(work, 4),
        'EXCEPTION',
        `    WHEN SQLSTATE ${sqlLiteral(VALIDATION_SQLSTATE)} THEN`,
        indent(parts.validationHandler.join('\n'), 8),
        'END;',
      ].join('\n')
    : work;

  const body = joinSections([
    section('Audit context', parts.auditSeed),
    guarded.length > 0 ? guarded : null,
    section('Result', parts.result),
    section('Clear audit context', parts.auditClear),
    parts.returnStatement,
  ]);

  return [
    `CREATE OR REPLACE FUNCTION ${qualify(parts.schema, parts.name)}(`,
    args.join(',\n'),
    `) RETURNS ${parts.returns}`,
    'LANGUAGE plpgsql',
    'AS $$',
    'DECLARE',
    ...parts.declarations.map((d) => `    ${d}`),
    'BEGIN',
    indent(body, 4),
    'END;',
    '$$;',
  ].join('\n');
}
