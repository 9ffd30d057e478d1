/**
 * Per-action configuration resolution.
 *
 * Every resolver is a pure function of the action and the loaded config.
 * Precedence is field-wise: action level, then application level, then defaults.
 */
import type {
  Action,
  AuditConfig,
  CDCConfig,
  CascadeConfig,
  CascadeOverride,
  CDCOverride,
} from '../ast/types.js';
import { toCascadeOverride, toCdcOverride } from '../ast/loader.js';
import type { Config } from './schema.js';
import { CompileError, ErrorCodes, type CompileLocation } from '../../utils/errors.js';

/** Entity filter portion of a cascade config. */
export type EntityFilter = Pick<CascadeConfig, 'includeEntities' | 'excludeEntities'>;

/**
 * Resolve the effective cascade config for an action.
 *
 * Returns null when the action declares no impact: cascade is then absent,
 * not merely disabled.
 */
export function resolveCascadeConfig(action: Action, config: Config): CascadeConfig | null {
  if (!action.impact) {
    return null;
  }

  const local: CascadeOverride = action.cascade ?? {};
  const app = toCascadeOverride(config.cascade);

  return {
    enabled: local.enabled ?? app.enabled ?? true,
    includeEntities: local.includeEntities ?? app.includeEntities,
    excludeEntities: local.excludeEntities ?? app.excludeEntities,
    includeFullData: local.includeFullData ?? app.includeFullData ?? true,
    includeDeleted: local.includeDeleted ?? app.includeDeleted ?? true,
    maxEntities: local.maxEntities ?? app.maxEntities,
  };
}

/**
 * Resolve the effective CDC config for an action.
 *
 * Application-level `cdc.enabled` only applies to actions with impact.
 * Returns null when no event is emitted.
 *
 * @throws CompileError C001 when the action itself enables CDC without impact
 */
export function resolveCdcConfig(
  action: Action,
  config: Config,
  location: CompileLocation = { action: action.name }
): CDCConfig | null {
  const local: CDCOverride = action.cdc ?? {};

  if (!action.impact) {
    if (local.enabled === true) {
      throw new CompileError(
        ErrorCodes.CDC_WITHOUT_IMPACT,
        'CDC is enabled but the action declares no impact; event emission needs impact.primary',
        location
      );
    }
    return null;
  }

  const app = toCdcOverride(config.cdc);
  if (!(local.enabled ?? app.enabled ?? false)) {
    return null;
  }

  return {
    enabled: true,
    // event_type is per action; an application-wide value would name every event alike
    eventType: local.eventType,
    includeCascade: local.includeCascade ?? app.includeCascade ?? true,
    includePayload: local.includePayload ?? app.includePayload ?? true,
  };
}

/**
 * Resolve the audit bridge for an action. Null when the action has no impact,
 * auditing is off, or both audit modes are disabled.
 */
export function resolveAuditConfig(action: Action, config: Config): AuditConfig | null {
  if (!action.impact || !config.audit.enabled) {
    return null;
  }
  if (!config.audit.row_triggers && !config.audit.log_mutations) {
    return null;
  }
  return {
    rowTriggers: config.audit.row_triggers,
    logMutations: config.audit.log_mutations,
  };
}

/**
 * Whether an entity passes the cascade filter.
 * A defined whitelist decides alone; otherwise the blacklist excludes.
 */
export function shouldIncludeEntity(entity: string, filter: EntityFilter): boolean {
  if (filter.includeEntities !== undefined) {
    return filter.includeEntities.includes(entity);
  }
  if (filter.excludeEntities !== undefined) {
    return !filter.excludeEntities.includes(entity);
  }
  return true;
}

/**
 * Filter entity names, preserving order.
 */
export function filterEntities(entities: readonly string[], filter: EntityFilter): string[] {
  return entities.filter((entity) => shouldIncludeEntity(entity, filter));
}
