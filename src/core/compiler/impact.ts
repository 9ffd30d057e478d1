/**
 * Impact metadata compiler.
 *
 * Turns an action's declared impact plus its ID bindings into:
 * - the `v_meta` impact metadata statements
 * - the cascade plan and the statements that build `v_cascade`
 * - the result's `extra_metadata` object
 * Actions without impact get none of this.
 */
import type {
  ActionImpact,
  CacheInvalidation,
  CascadeConfig,
  CascadeOperation,
  EntityImpact,
  ImpactOperation,
  StepKind,
} from '../ast/types.js';
import type { Config } from '../config/schema.js';
import type { EntityRegistry } from '../registry/entity-registry.js';
import type { BindingTable } from './binding-table.js';
import type { Binding, CascadePlanEntry, ResolvedImpact } from './types.js';
import { shouldIncludeEntity } from '../config/resolve.js';
import { viewName } from './naming.js';
import { isEntityName, jsonbLiteral, qualify, sqlLiteral, textArray } from '../../utils/sql.js';
import {
  BindingError,
  CompileError,
  ErrorCodes,
  type CompileLocation,
} from '../../utils/errors.js';

const OPERATION_LABELS: Record<ImpactOperation, CascadeOperation> = {
  CREATE: 'CREATED',
  UPDATE: 'UPDATED',
  DELETE: 'DELETED',
};

type BindingSource = StepKind | 'parameter';

/** Binding sources that can carry the id for each impact operation. */
const COMPATIBLE_SOURCES: Record<ImpactOperation, readonly BindingSource[]> = {
  CREATE: ['insert', 'call'],
  UPDATE: ['update', 'call', 'parameter'],
  DELETE: ['delete', 'call', 'parameter'],
};

export function isImpactOperation(value: string): value is ImpactOperation {
  return Object.prototype.hasOwnProperty.call(OPERATION_LABELS, value);
}

/**
 * Cascade label for an impact operation. No fallback: anything outside
 * CREATE/UPDATE/DELETE is a compile error.
 */
export function operationLabel(operation: string, location: CompileLocation = {}): CascadeOperation {
  if (!isImpactOperation(operation)) {
    throw new CompileError(
      ErrorCodes.UNMAPPED_OPERATION,
      `Impact operation ${operation} has no cascade label; expected CREATE, UPDATE or DELETE`,
      location
    );
  }
  return OPERATION_LABELS[operation];
}

function sourceOf(binding: Binding): BindingSource {
  return binding.kind === 'parameter' ? 'parameter' : (binding.source ?? 'call');
}

/**
 * Bindings of an entity that can carry the id for an operation, oldest first.
 */
export function compatibleBindings(
  bindings: BindingTable,
  entity: string,
  operation: ImpactOperation
): Binding[] {
  return bindings
    .allFor(entity)
    .filter((binding) => COMPATIBLE_SOURCES[operation].includes(sourceOf(binding)));
}

/**
 * Impact entries in order (primary, then side effects).
 */
export function impactEntries(impact: ActionImpact): Array<{ impact: EntityImpact; role: ResolvedImpact['role'] }> {
  return [
    { impact: impact.primary, role: 'primary' },
    ...impact.sideEffects.map((sideEffect) => ({ impact: sideEffect, role: 'side_effect' as const })),
  ];
}

/**
 * Pair every impact entry with the binding that carries its id.
 *
 * @throws BindingError B001 when no step or parameter binds the entity
 * @throws CompileError C002 when the entity is bound only by incompatible steps
 */
export function resolveImpactBindings(
  impact: ActionImpact,
  bindings: BindingTable,
  location: CompileLocation = {}
): ResolvedImpact[] {
  return impactEntries(impact).map(({ impact: entry, role }) => {
    if (!isEntityName(entry.entity)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid entity name "${entry.entity}" in impact: use letters, digits and underscores`,
        location
      );
    }
    const label = operationLabel(entry.operation, location);
    const all = bindings.allFor(entry.entity);
    const describe = role === 'primary' ? 'Primary impact' : 'Side effect';

    if (all.length === 0) {
      throw new BindingError(
        ErrorCodes.UNDEFINED_BINDING,
        `${describe} ${entry.entity} (${entry.operation}) has no ID binding: add a step targeting ${entry.entity} or a parameter carrying its id`,
        location
      );
    }

    const compatible = compatibleBindings(bindings, entry.entity, entry.operation);
    const binding = compatible[compatible.length - 1];
    if (!binding) {
      const sources = [...new Set(all.map(sourceOf))].join(', ');
      throw new CompileError(
        ErrorCodes.INCOMPATIBLE_SIDE_EFFECT,
        `${describe} ${entry.entity} declares ${entry.operation}, but the entity is only bound by: ${sources}`,
        location
      );
    }

    return { impact: entry, role, label, binding };
  });
}

/**
 * Ordered cascade constructions after filtering and truncation.
 */
export function planCascade(
  resolved: readonly ResolvedImpact[],
  cascade: CascadeConfig,
  registry: EntityRegistry,
  config: Config,
  fallbackSchema: string
): CascadePlanEntry[] {
  if (!cascade.enabled) {
    return [];
  }

  const entries = resolved
    .filter((r) => shouldIncludeEntity(r.impact.entity, cascade))
    .filter((r) => cascade.includeDeleted || r.label !== 'DELETED')
    .map((r): CascadePlanEntry => ({
      entity: r.impact.entity,
      label: r.label,
      bucket: r.label === 'DELETED' ? 'deleted' : 'updated',
      variable: r.binding.variable,
      schema: registry.schemaOf(r.impact.entity, fallbackSchema),
      view: viewName(r.impact.entity, config.naming),
    }));

  return cascade.maxEntities !== undefined ? entries.slice(0, cascade.maxEntities) : entries;
}

/**
 * Declarations for metadata and cascade accumulators.
 */
export function impactDeclarations(config: Config, cascadeEnabled: boolean): string[] {
  const declarations = [`v_meta ${qualify(config.schemas.metadata, 'mutation_impact_metadata')};`];
  if (cascadeEnabled) {
    declarations.push(
      'v_cascade JSONB;',
      "v_cascade_updated JSONB := '[]'::jsonb;",
      "v_cascade_deleted JSONB := '[]'::jsonb;"
    );
  }
  return declarations;
}

function entityImpactRow(entry: EntityImpact, metadataSchema: string): string {
  return `ROW(${sqlLiteral(entry.entity)}, ${sqlLiteral(entry.operation)}, ${textArray(entry.fields)})::${metadataSchema}.entity_impact`;
}

function cacheInvalidationRow(entry: CacheInvalidation, metadataSchema: string): string {
  const filter = entry.filter ? jsonbLiteral(entry.filter) : 'NULL';
  const reason = entry.reason ? sqlLiteral(entry.reason) : 'NULL';
  return `ROW(${sqlLiteral(entry.query)}, ${filter}, ${sqlLiteral(entry.strategy)}, ${reason})::${metadataSchema}.cache_invalidation`;
}

function arrayAssignment(target: string, rows: string[]): string {
  return `${target} := ARRAY[\n${rows.map((row) => `    ${row}`).join(',\n')}\n];`;
}

/**
 * Statements filling `v_meta`. Empty arrays are left unassigned.
 */
export function metadataStatements(impact: ActionImpact, config: Config): string[] {
  const schema = config.schemas.metadata;
  const statements = [`v_meta.primary_entity := ${entityImpactRow(impact.primary, schema)};`];

  if (impact.sideEffects.length > 0) {
    statements.push(
      arrayAssignment(
        'v_meta.actual_side_effects',
        impact.sideEffects.map((entry) => entityImpactRow(entry, schema))
      )
    );
  }
  if (impact.cacheInvalidations.length > 0) {
    statements.push(
      arrayAssignment(
        'v_meta.cache_invalidations',
        impact.cacheInvalidations.map((entry) => cacheInvalidationRow(entry, schema))
      )
    );
  }
  return statements;
}

/**
 * ID-only cascade object. Never carries entity data.
 */
export function idOnlyEntry(typename: string, idExpression: string, label: CascadeOperation): string {
  return `jsonb_build_object('__typename', ${sqlLiteral(typename)}, 'id', ${idExpression}, 'operation', ${sqlLiteral(label)})`;
}

/**
 * Full cascade object fetched through the foundation helper.
 */
export function cascadeEntityCall(entry: CascadePlanEntry, appSchema: string): string {
  return `${qualify(appSchema, 'cascade_entity')}(${sqlLiteral(entry.entity)}, ${entry.variable}, ${sqlLiteral(entry.label)}, ${sqlLiteral(entry.schema)}, ${sqlLiteral(entry.view)})`;
}

/**
 * Statement appending one planned entry to its cascade array.
 */
export function cascadeEntryStatement(
  entry: CascadePlanEntry,
  cascade: CascadeConfig,
  appSchema: string
): string {
  if (entry.bucket === 'deleted') {
    return `v_cascade_deleted := v_cascade_deleted || jsonb_build_array(${qualify(appSchema, 'cascade_deleted')}(${sqlLiteral(entry.entity)}, ${entry.variable}));`;
  }
  const element = cascade.includeFullData
    ? cascadeEntityCall(entry, appSchema)
    : idOnlyEntry(entry.entity, entry.variable, entry.label);
  return `v_cascade_updated := v_cascade_updated || jsonb_build_array(${element});`;
}

/**
 * Client cache invalidations as they appear in the cascade payload.
 */
export function invalidationPayload(invalidations: readonly CacheInvalidation[]): Array<Record<string, unknown>> {
  return invalidations.map((entry) => {
    const payload: Record<string, unknown> = { queryName: entry.query, strategy: entry.strategy };
    if (entry.filter) payload.filter = entry.filter;
    if (entry.reason) payload.reason = entry.reason;
    return payload;
  });
}

/**
 * Statement assembling `v_cascade` from the accumulated arrays.
 */
export function cascadeAssemblyStatement(impact: ActionImpact): string {
  return [
    'v_cascade := jsonb_build_object(',
    "    'updated', v_cascade_updated,",
    "    'deleted', v_cascade_deleted,",
    `    'invalidations', ${jsonbLiteral(invalidationPayload(impact.cacheInvalidations))},`,
    "    'metadata', jsonb_build_object(",
    "        'timestamp', now(),",
    "        'affectedCount', jsonb_array_length(v_cascade_updated) + jsonb_array_length(v_cascade_deleted)",
    '    )',
    ');',
  ].join('\n');
}

/**
 * Cascade construction statements for a plan.
 */
export function cascadeStatements(
  plan: readonly CascadePlanEntry[],
  impact: ActionImpact,
  cascade: CascadeConfig,
  appSchema: string
): string[] {
  return [
    ...plan.map((entry) => cascadeEntryStatement(entry, cascade, appSchema)),
    cascadeAssemblyStatement(impact),
  ];
}

/**
 * Named collections: every compatible binding of the entity, as a JSON array of ids.
 */
export function collectionEntries(
  impact: ActionImpact,
  bindings: BindingTable
): Array<{ name: string; expression: string }> {
  return impactEntries(impact)
    .map(({ impact: entry }) => entry)
    .filter((entry): entry is EntityImpact & { collection: string } => entry.collection !== undefined)
    .map((entry) => {
      const ids = compatibleBindings(bindings, entry.entity, entry.operation).map((b) => b.variable);
      return { name: entry.collection, expression: `jsonb_build_array(${ids.join(', ')})` };
    });
}

/**
 * Assignment of `v_result.extra_metadata`.
 */
export function extraMetadataStatement(parts: {
  impact: ActionImpact | undefined;
  cascadeEnabled: boolean;
  collections: Array<{ name: string; expression: string }>;
  eventIdVariable: string | null;
}): string {
  if (!parts.impact) {
    return "v_result.extra_metadata := '{}'::jsonb;";
  }

  const pairs: string[] = [];
  if (parts.cascadeEnabled) pairs.push("'cascade', v_cascade");
  pairs.push("'meta', to_jsonb(v_meta)");
  for (const collection of parts.collections) {
    pairs.push(`${sqlLiteral(collection.name)}, ${collection.expression}`);
  }
  if (parts.eventIdVariable) pairs.push(`'eventId', ${parts.eventIdVariable}`);

  return `v_result.extra_metadata := jsonb_build_object(\n${pairs.map((p) => `    ${p}`).join(',\n')}\n);`;
}
