/**
 * Ordered fetch strategies compiled into `cascade_entity`.
 *
 * Each strategy becomes one guarded block that returns as soon as it finds the
 * entity. Any error inside a block is reported with RAISE NOTICE and falls
 * through to the next strategy, so a failed fetch never aborts the mutation.
 */
import type { NamingSettings } from '../config/schema.js';
import { sqlLiteral } from '../../utils/sql.js';

export interface CascadeFetchStrategy {
  name: string;
  description: string;
  /** Dynamic query run with `USING p_id`, producing one JSONB value */
  query(naming: NamingSettings): string;
}

/** Denormalized read view keyed by id, exposing a `data` JSONB column. */
export const viewStrategy: CascadeFetchStrategy = {
  name: 'view',
  description: 'denormalized view',
  query: () => "format('SELECT data FROM %I.%I WHERE id = $1', p_schema, p_view_name)",
};

/** The base table row as JSON. */
export const tableStrategy: CascadeFetchStrategy = {
  name: 'table',
  description: 'base table',
  query: (naming) =>
    `format('SELECT to_jsonb(t) FROM %I.%I t WHERE t.id = $1', p_schema, ${sqlLiteral(naming.table_prefix)} || lower(p_typename))`,
};

export const DEFAULT_FETCH_STRATEGIES: readonly CascadeFetchStrategy[] = [viewStrategy, tableStrategy];

const CASCADE_OBJECT = "jsonb_build_object('__typename', p_typename, 'id', p_id, 'operation', p_operation, 'entity', %s)";

function cascadeObject(entity: string): string {
  return CASCADE_OBJECT.replace('%s', entity);
}

/**
 * Guarded block for one strategy.
 */
export function strategyBlock(strategy: CascadeFetchStrategy, index: number, naming: NamingSettings): string[] {
  return [
    `-- ${index + 1}. ${strategy.description}`,
    'BEGIN',
    `    EXECUTE ${strategy.query(naming)}`,
    '    INTO v_entity_data',
    '    USING p_id;',
    '    IF v_entity_data IS NOT NULL THEN',
    `        RETURN ${cascadeObject('v_entity_data')};`,
    '    END IF;',
    'EXCEPTION WHEN OTHERS THEN',
    `    RAISE NOTICE ${sqlLiteral(`cascade_entity: ${strategy.name} fetch failed for % %: % (%)`)}, p_typename, p_id, SQLERRM, SQLSTATE;`,
    '    v_entity_data := NULL;',
    'END;',
  ];
}

/**
 * Body statements of `cascade_entity`: every strategy, then the empty payload.
 */
export function fetchStrategyBody(
  strategies: readonly CascadeFetchStrategy[],
  naming: NamingSettings
): string[] {
  const blocks = strategies.flatMap((strategy, index) => [...strategyBlock(strategy, index, naming), '']);
  return [...blocks, `RETURN ${cascadeObject("'{}'::jsonb")};`];
}
