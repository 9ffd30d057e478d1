/**
 * Audit bridge - exposes mutation context to row-level audit triggers.
 *
 * Three transaction-local settings carry the context:
 *   app.cascade_source    name of the running action
 *   app.cascade_data      JSON array of affected entities (later the full cascade)
 *   app.cascade_entities  comma-separated affected type names
 *
 * Impact entities bound by parameters are known before any DML and seed the
 * context. Each step that binds a new impact entity appends an ID-only entry
 * right after it runs, so triggers fired by later steps see it. Triggers fired
 * by the very INSERT that creates an entity cannot see that entity's own id.
 */
import type { AuditConfig } from '../ast/types.js';
import type { ResolvedImpact } from './types.js';
import { idOnlyEntry } from './impact.js';
import { sqlLiteral } from '../../utils/sql.js';

export const AUDIT_SETTINGS = {
  data: 'app.cascade_data',
  entities: 'app.cascade_entities',
  source: 'app.cascade_source',
} as const;

function setConfig(key: string, value: string): string {
  return `PERFORM set_config(${sqlLiteral(key)}, ${value}, true);`;
}

export class AuditBridge {
  private readonly seedBlock: string[];
  private readonly stepBlocks = new Map<number, string[]>();

  constructor(
    private readonly actionName: string,
    resolved: readonly ResolvedImpact[],
    private readonly config: AuditConfig
  ) {
    const seen = new Set<string>();
    const claim = (entry: ResolvedImpact): boolean => {
      if (seen.has(entry.impact.entity)) return false;
      seen.add(entry.impact.entity);
      return true;
    };
    const typeOrder: string[] = [];

    this.seedBlock = appendBlock(
      resolved.filter((r) => r.binding.kind === 'parameter').filter(claim),
      typeOrder
    );

    const captured = resolved
      .filter((r) => r.binding.kind === 'captured')
      .sort((a, b) => (a.binding.stepIndex ?? 0) - (b.binding.stepIndex ?? 0))
      .filter(claim);
    const stepIndexes = [...new Set(captured.map((r) => r.binding.stepIndex ?? 0))];
    for (const stepIndex of stepIndexes) {
      const entries = captured.filter((r) => (r.binding.stepIndex ?? 0) === stepIndex);
      this.stepBlocks.set(stepIndex, appendBlock(entries, typeOrder));
    }
  }

  /** Whether session settings are emitted at all. */
  get bridgesTriggers(): boolean {
    return this.config.rowTriggers;
  }

  /** Whether the success result goes through the mutation-log helper. */
  get logsMutations(): boolean {
    return this.config.logMutations;
  }

  declarations(): string[] {
    return this.bridgesTriggers ? ["v_audit_context JSONB := '[]'::jsonb;"] : [];
  }

  /**
   * Statements run before the first step.
   */
  seed(): string[] {
    if (!this.bridgesTriggers) return [];
    return [setConfig(AUDIT_SETTINGS.source, sqlLiteral(this.actionName)), ...this.seedBlock];
  }

  /**
   * Statements run right after a step, when it bound a new impact entity.
   */
  afterStep(stepIndex: number): string[] {
    if (!this.bridgesTriggers) return [];
    return this.stepBlocks.get(stepIndex) ?? [];
  }

  /**
   * Statements run once the full cascade is assembled.
   */
  afterCascade(cascadeEnabled: boolean): string[] {
    if (!this.bridgesTriggers || !cascadeEnabled) return [];
    return [setConfig(AUDIT_SETTINGS.data, 'v_cascade::text')];
  }

  /**
   * Statements run before every return.
   */
  clear(): string[] {
    return auditClearStatements(this.config);
  }
}

/**
 * Statements clearing the session settings; empty when triggers are not bridged.
 */
export function auditClearStatements(config: AuditConfig | null): string[] {
  if (!config?.rowTriggers) return [];
  return [
    setConfig(AUDIT_SETTINGS.data, "''"),
    setConfig(AUDIT_SETTINGS.entities, "''"),
    setConfig(AUDIT_SETTINGS.source, "''"),
  ];
}

/**
 * Append entries to the context; `typeOrder` accumulates across blocks.
 */
function appendBlock(entries: readonly ResolvedImpact[], typeOrder: string[]): string[] {
  if (entries.length === 0) return [];
  typeOrder.push(...entries.map((e) => e.impact.entity));
  const objects = entries.map((e) => idOnlyEntry(e.impact.entity, e.binding.variable, e.label));
  return [
    `v_audit_context := v_audit_context || jsonb_build_array(${objects.join(', ')});`,
    setConfig(AUDIT_SETTINGS.data, 'v_audit_context::text'),
    setConfig(AUDIT_SETTINGS.entities, sqlLiteral(typeOrder.join(','))),
  ];
}
