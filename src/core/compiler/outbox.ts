/**
 * Outbox event compiler - one event row per mutation, written in the same
 * transaction as the business DML.
 */
import type { CDCConfig, EntityImpact, ImpactOperation } from '../ast/types.js';
import type { Config } from '../config/schema.js';
import type { EntityRegistry } from '../registry/entity-registry.js';
import type { ResolvedImpact } from './types.js';
import { viewName } from './naming.js';
import { qualify, sqlLiteral } from '../../utils/sql.js';

const EVENT_SUFFIXES: Record<ImpactOperation, string> = {
  CREATE: 'Created',
  UPDATE: 'Updated',
  DELETE: 'Deleted',
};

export const EVENT_ID_VARIABLE = 'v_event_id';

/**
 * Explicit event type, or `<Entity><Created|Updated|Deleted>`.
 */
export function resolveEventType(primary: EntityImpact, cdc: CDCConfig): string {
  return cdc.eventType ?? `${primary.entity}${EVENT_SUFFIXES[primary.operation]}`;
}

/**
 * Affected type names, primary first, without repeats.
 */
export function affectedTypes(resolved: readonly ResolvedImpact[]): string[] {
  return [...new Set(resolved.map((r) => r.impact.entity))];
}

export interface OutboxInput {
  actionName: string;
  primary: ResolvedImpact;
  resolved: readonly ResolvedImpact[];
  cdc: CDCConfig;
  eventType: string;
  /** Embed `v_cascade` in the event metadata */
  embedCascade: boolean;
  registry: EntityRegistry;
  config: Config;
  fallbackSchema: string;
}

function payloadExpression(input: OutboxInput): string {
  const { primary, cdc, config } = input;
  if (!cdc.includePayload) {
    return "'{}'::jsonb";
  }
  if (primary.label === 'DELETED') {
    return `jsonb_build_object('id', ${primary.binding.variable})`;
  }
  const entity = primary.impact.entity;
  const schema = input.registry.schemaOf(entity, input.fallbackSchema);
  const call = `${qualify(config.schemas.app, 'cascade_entity')}(${sqlLiteral(entity)}, ${primary.binding.variable}, ${sqlLiteral(primary.label)}, ${sqlLiteral(schema)}, ${sqlLiteral(viewName(entity, config.naming))})`;
  return `COALESCE(${call}->'entity', '{}'::jsonb)`;
}

function metadataExpression(input: OutboxInput): string {
  const types = affectedTypes(input.resolved).map(sqlLiteral).join(', ');
  const pairs = [
    `'action', ${sqlLiteral(input.actionName)}`,
    `'affectedTypes', jsonb_build_array(${types})`,
  ];
  if (input.embedCascade) {
    pairs.push("'cascade', v_cascade");
  }
  return `jsonb_build_object(${pairs.join(', ')})`;
}

/**
 * The outbox INSERT, capturing the event id.
 */
export function outboxStatement(input: OutboxInput): string {
  const values = [
    sqlLiteral(input.primary.impact.entity),
    input.primary.binding.variable,
    sqlLiteral(input.eventType),
    payloadExpression(input),
    metadataExpression(input),
    'auth_tenant_id',
    "current_setting('app.trace_id', true)",
    "current_setting('app.correlation_id', true)",
  ];

  return [
    `INSERT INTO ${qualify(input.config.schemas.app, 'tb_outbox')} (`,
    '    aggregate_type, aggregate_id, event_type, event_payload, event_metadata,',
    '    tenant_id, trace_id, correlation_id',
    ') VALUES (',
    values.map((v) => `    ${v}`).join(',\n'),
    `) RETURNING id INTO ${EVENT_ID_VARIABLE};`,
  ].join('\n');
}

export function outboxDeclarations(): string[] {
  return [`${EVENT_ID_VARIABLE} UUID;`];
}
