/**
 * Foundation SQL generator.
 *
 * Emits the shared objects every compiled mutation function relies on:
 * - the schemas and the `mutation_result` type
 * - the impact metadata composite types
 * - the cascade helpers `cascade_entity` and `cascade_deleted`
 * - the mutation audit log and `log_and_return_mutation`
 * - the transactional outbox table (optional)
 */
import type { Config } from '../config/schema.js';
import {
  DEFAULT_FETCH_STRATEGIES,
  fetchStrategyBody,
  type CascadeFetchStrategy,
} from './fetch-strategies.js';
import { indent, sqlLiteral } from '../../utils/sql.js';

// ============================================================================
// Types
// ============================================================================

export interface FoundationOptions {
  /** Include the outbox table */
  withOutbox?: boolean;
  /** Fetch strategies for cascade_entity, tried in order */
  fetchStrategies?: readonly CascadeFetchStrategy[];
}

export interface FoundationResult {
  sql: string;
  /** Section titles in emission order */
  sections: string[];
}

interface Section {
  title: string;
  statements: string[];
}

// ============================================================================
// Sections
// ============================================================================

function banner(title: string): string {
  const rule = `-- ${'='.repeat(76)}`;
  return [rule, `-- ${title}`, rule].join('\n');
}

function schemasSection(config: Config): Section {
  const names = [...new Set([config.schemas.app, config.schemas.metadata])];
  return {
    title: 'Schemas',
    statements: names.map((name) => `CREATE SCHEMA IF NOT EXISTS ${name};`),
  };
}

const RESULT_COLUMNS: ReadonlyArray<{ name: string; type: string; comment: string }> = [
  { name: 'id', type: 'UUID', comment: 'Identifier of the affected entity.' },
  { name: 'updated_fields', type: 'TEXT[]', comment: 'Fields modified by the mutation.' },
  { name: 'status', type: 'TEXT', comment: 'success, or failed:<reason>.' },
  { name: 'message', type: 'TEXT', comment: 'Human-readable outcome.' },
  { name: 'object_data', type: 'JSONB', comment: 'Entity data after the mutation.' },
  { name: 'extra_metadata', type: 'JSONB', comment: 'Impact metadata, cascade and event id.' },
];

function mutationResultSection(config: Config): Section {
  const type = `${config.schemas.app}.mutation_result`;
  return {
    title: 'Mutation result type',
    statements: [
      [
        `CREATE TYPE ${type} AS (`,
        RESULT_COLUMNS.map((c) => `    ${c.name} ${c.type}`).join(',\n'),
        ');',
      ].join('\n'),
      `COMMENT ON TYPE ${type} IS ${sqlLiteral('Standard result of every mutation function.')};`,
      ...RESULT_COLUMNS.map((c) => `COMMENT ON COLUMN ${type}.${c.name} IS ${sqlLiteral(c.comment)};`),
    ],
  };
}

function metadataTypesSection(config: Config): Section {
  const schema = config.schemas.metadata;
  return {
    title: 'Impact metadata types',
    statements: [
      [
        `CREATE TYPE ${schema}.entity_impact AS (`,
        '    entity_type TEXT,',
        '    operation TEXT,',
        '    modified_fields TEXT[]',
        ');',
      ].join('\n'),
      [
        `CREATE TYPE ${schema}.cache_invalidation AS (`,
        '    query_name TEXT,',
        '    filter_json JSONB,',
        '    strategy TEXT,',
        '    reason TEXT',
        ');',
      ].join('\n'),
      [
        `CREATE TYPE ${schema}.mutation_impact_metadata AS (`,
        `    primary_entity ${schema}.entity_impact,`,
        `    actual_side_effects ${schema}.entity_impact[],`,
        `    cache_invalidations ${schema}.cache_invalidation[]`,
        ');',
      ].join('\n'),
    ],
  };
}

function cascadeHelpersSection(config: Config, strategies: readonly CascadeFetchStrategy[]): Section {
  const app = config.schemas.app;
  const cascadeEntity = [
    `CREATE OR REPLACE FUNCTION ${app}.cascade_entity(`,
    '    p_typename TEXT,',
    '    p_id UUID,',
    '    p_operation TEXT,',
    '    p_schema TEXT,',
    '    p_view_name TEXT',
    ') RETURNS JSONB',
    'LANGUAGE plpgsql',
    'STABLE',
    'AS $$',
    'DECLARE',
    '    v_entity_data JSONB;',
    'BEGIN',
    indent(fetchStrategyBody(strategies, config.naming).join('\n'), 4),
    'END;',
    '$$;',
  ].join('\n');

  const cascadeDeleted = [
    `CREATE OR REPLACE FUNCTION ${app}.cascade_deleted(`,
    '    p_typename TEXT,',
    '    p_id UUID',
    ') RETURNS JSONB',
    'LANGUAGE sql',
    'IMMUTABLE',
    'AS $$',
    "    SELECT jsonb_build_object('__typename', p_typename, 'id', p_id, 'operation', 'DELETED');",
    '$$;',
  ].join('\n');

  return {
    title: 'Cascade helpers',
    statements: [
      cascadeEntity,
      `COMMENT ON FUNCTION ${app}.cascade_entity(TEXT, UUID, TEXT, TEXT, TEXT) IS ${sqlLiteral(
        `Cascade entry with entity data, fetched from: ${strategies.map((s) => s.description).join(', ')}.`
      )};`,
      cascadeDeleted,
      `COMMENT ON FUNCTION ${app}.cascade_deleted(TEXT, UUID) IS ${sqlLiteral('Cascade entry for a deleted entity (id only).')};`,
    ],
  };
}

function auditSection(config: Config): Section {
  const app = config.schemas.app;
  const table = `${app}.tb_mutation_audit_log`;
  const columns = [
    'tenant_id',
    'user_id',
    'entity_type',
    'entity_id',
    'operation',
    'status',
    'updated_fields',
    'message',
    'object_data',
    'extra_metadata',
    'error_context',
  ];
  const params = [
    'p_tenant_id',
    'p_user_id',
    'p_entity',
    'p_entity_id',
    'p_operation',
    'p_status',
    'p_updated_fields',
    'p_message',
    'p_object_data',
    'p_extra_metadata',
    'p_error_context',
  ];

  return {
    title: 'Mutation audit log',
    statements: [
      [
        `CREATE TABLE IF NOT EXISTS ${table} (`,
        '    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),',
        '    tenant_id UUID NOT NULL,',
        '    user_id UUID,',
        '    entity_type TEXT NOT NULL,',
        '    entity_id UUID,',
        '    operation TEXT NOT NULL,',
        '    status TEXT NOT NULL,',
        '    updated_fields TEXT[],',
        '    message TEXT,',
        '    object_data JSONB,',
        '    extra_metadata JSONB,',
        '    error_context JSONB,',
        '    created_at TIMESTAMPTZ NOT NULL DEFAULT now()',
        ');',
      ].join('\n'),
      `CREATE INDEX IF NOT EXISTS idx_mutation_audit_tenant ON ${table} (tenant_id);`,
      `CREATE INDEX IF NOT EXISTS idx_mutation_audit_entity ON ${table} (entity_type, entity_id);`,
      `CREATE INDEX IF NOT EXISTS idx_mutation_audit_created ON ${table} (created_at);`,
      [
        `CREATE OR REPLACE FUNCTION ${app}.log_and_return_mutation(`,
        '    p_tenant_id UUID,',
        '    p_user_id UUID,',
        '    p_entity TEXT,',
        '    p_entity_id UUID,',
        '    p_operation TEXT,',
        '    p_status TEXT,',
        '    p_updated_fields TEXT[],',
        '    p_message TEXT,',
        '    p_object_data JSONB,',
        '    p_extra_metadata JSONB DEFAULT NULL,',
        '    p_error_context JSONB DEFAULT NULL',
        `) RETURNS ${app}.mutation_result`,
        'LANGUAGE plpgsql',
        'AS $$',
        'BEGIN',
        `    INSERT INTO ${table} (`,
        `        ${columns.join(', ')}`,
        '    ) VALUES (',
        `        ${params.join(', ')}`,
        '    );',
        '',
        '    RETURN ROW(',
        '        p_entity_id,',
        '        p_updated_fields,',
        '        p_status,',
        '        p_message,',
        '        p_object_data,',
        "        COALESCE(p_extra_metadata, '{}'::jsonb)",
        `    )::${app}.mutation_result;`,
        'END;',
        '$$;',
      ].join('\n'),
    ],
  };
}

function outboxSection(config: Config): Section {
  const table = `${config.schemas.app}.tb_outbox`;
  return {
    title: 'Transactional outbox',
    statements: [
      [
        `CREATE TABLE IF NOT EXISTS ${table} (`,
        '    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),',
        '    tenant_id UUID,',
        '    aggregate_type TEXT NOT NULL,',
        '    aggregate_id UUID NOT NULL,',
        '    event_type TEXT NOT NULL,',
        "    event_payload JSONB NOT NULL DEFAULT '{}'::jsonb,",
        "    event_metadata JSONB NOT NULL DEFAULT '{}'::jsonb,",
        '    trace_id TEXT,',
        '    correlation_id TEXT,',
        '    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),',
        '    processed_at TIMESTAMPTZ',
        ');',
      ].join('\n'),
      `CREATE INDEX IF NOT EXISTS idx_outbox_unprocessed ON ${table} (created_at) WHERE processed_at IS NULL;`,
      `CREATE INDEX IF NOT EXISTS idx_outbox_aggregate ON ${table} (aggregate_type, aggregate_id);`,
    ],
  };
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Generate the foundation SQL file.
 */
export function generateFoundation(config: Config, options: FoundationOptions = {}): FoundationResult {
  const strategies = options.fetchStrategies ?? DEFAULT_FETCH_STRATEGIES;

  const sections: Section[] = [
    schemasSection(config),
    mutationResultSection(config),
    metadataTypesSection(config),
    cascadeHelpersSection(config, strategies),
    auditSection(config),
  ];
  if (options.withOutbox) {
    sections.push(outboxSection(config));
  }

  const sql = sections
    .map((section) => [banner(section.title), ...section.statements].join('\n\n'))
    .join('\n\n\n');

  return {
    sql: `${sql}\n`,
    sections: sections.map((section) => section.title),
  };
}
