/**
 * Action compiler - validates an action and runs every compilation phase.
 */
import type {
  Action,
  ActionParameter,
  ActionStep,
  CDCConfig,
  CascadeConfig,
  Entity,
} from '../ast/types.js';
import type { Config } from '../config/schema.js';
import { getDefaultConfig } from '../config/loader.js';
import { resolveAuditConfig, resolveCascadeConfig, resolveCdcConfig } from '../config/resolve.js';
import { EntityRegistry } from '../registry/entity-registry.js';
import { BindingTable } from './binding-table.js';
import { ExpressionCompiler } from './expression.js';
import { compileStep, type StepContext } from './steps/index.js';
import {
  cascadeStatements,
  collectionEntries,
  extraMetadataStatement,
  impactDeclarations,
  metadataStatements,
  planCascade,
  resolveImpactBindings,
} from './impact.js';
import { AuditBridge, auditClearStatements } from './audit.js';
import { EVENT_ID_VARIABLE, outboxDeclarations, outboxStatement, resolveEventType } from './outbox.js';
import {
  VALIDATION_HANDLER_DECLARATIONS,
  failureReturn,
  resultType,
  successResultStatements,
  successReturn,
  validationHandler,
  validationRaise,
} from './result.js';
import { assembleFunction, functionSignature, type AssembledStep, type FunctionParts } from './assembler.js';
import { functionComment } from './function-comment.js';
import { entityIdParameter } from './naming.js';
import type { ActionPlan, CompiledAction, CompiledEntity, Diagnostic, ValidationFailure } from './types.js';
import { isEntityName, isSafeIdentifier, qualify, sqlLiteral } from '../../utils/sql.js';
import { logger } from '../../utils/logger.js';
import {
  CompileError,
  ErrorCodes,
  WarningCodes,
  type CompileLocation,
  type WarningCode,
} from '../../utils/errors.js';

const PARAMETER_NAME = /^p_[a-z0-9_]+$/;
const PARAMETER_TYPE = /^[A-Za-z][A-Za-z0-9_ ]*(\[\])?$/;

export interface ActionCompilerOptions {
  config?: Config;
  registry?: EntityRegistry;
}

/**
 * True when a validate step follows a step that may have written rows.
 * Such actions run their steps in a block that rolls the writes back.
 */
export function needsValidationRollback(steps: readonly ActionStep[]): boolean {
  let wrote = false;
  for (const step of steps) {
    if (step.kind === 'validate') {
      if (wrote) return true;
    } else {
      wrote = true;
    }
  }
  return false;
}

export class ActionCompiler {
  private readonly config: Config;
  private readonly registry: EntityRegistry;
  private readonly expressions = new ExpressionCompiler();

  constructor(options: ActionCompilerOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.registry = options.registry ?? new EntityRegistry();
  }

  /**
   * Compile every action of an entity into one SQL file body.
   */
  compileEntity(entity: Entity): CompiledEntity {
    const seen = new Set<string>();
    for (const action of entity.actions) {
      if (seen.has(action.name)) {
        throw new CompileError(
          ErrorCodes.DUPLICATE_ACTION,
          `Action ${action.name} is defined more than once`,
          { entity: entity.name, action: action.name }
        );
      }
      seen.add(action.name);
    }

    const actions = entity.actions.map((action) => this.compileAction(entity, action));
    return {
      entity: entity.name,
      actions,
      sql: renderEntityFile(entity, actions),
      diagnostics: actions.flatMap((a) => a.diagnostics),
    };
  }

  /**
   * Compile one action into a CREATE FUNCTION statement and its comment.
   */
  compileAction(entity: Entity, action: Action): CompiledAction {
    const config = this.config;
    const location: CompileLocation = { entity: entity.name, action: action.name };
    const log = logger.child(`compile:${action.name}`);
    const diagnostics: Diagnostic[] = [];
    const warn = (code: WarningCode, message: string, stepIndex?: number): void => {
      diagnostics.push({ code, message, ...location, stepIndex });
      log.warn(`${code}: ${message}`);
    };

    this.validateNames(entity, action, location);
    if (action.steps.length === 0) {
      throw new CompileError(ErrorCodes.EMPTY_ACTION, 'Action has no steps', location);
    }

    const cascade = resolveCascadeConfig(action, config);
    const cdc = resolveCdcConfig(action, config, location);
    const audit = resolveAuditConfig(action, config);
    this.configWarnings(action, cascade, cdc, warn);

    // Phase: steps
    const parameters = this.functionParameters(entity, action, location);
    const bindings = new BindingTable();
    for (const parameter of parameters) {
      if (parameter.entity) bindings.bindParameter(parameter.entity, parameter.name);
    }

    const rollbackOnValidation = needsValidationRollback(action.steps);
    const clear = auditClearStatements(audit);
    const renderFailure = (failure: ValidationFailure): string =>
      rollbackOnValidation
        ? validationRaise(failure)
        : [
            ...clear,
            failureReturn(config, {
              message: sqlLiteral(failure.message),
              code: sqlLiteral(failure.code),
              step: String(failure.stepIndex),
            }),
          ].join('\n');

    const fragments = action.steps.map((step, index) => {
      const ctx: StepContext = {
        owner: entity,
        action,
        stepIndex: index + 1,
        bindings,
        parameters: new Set(parameters.map((p) => p.name)),
        registry: this.registry,
        config,
        expressions: this.expressions,
        renderFailure,
        warn: (code, message) => warn(code, message, index + 1),
      };
      return compileStep(step, ctx);
    });
    log.debug('Bindings established', {
      bindings: bindings.entries().map((b) => `${b.entity} -> ${b.variable} (${b.kind})`),
    });

    // Phase: impact, cascade, audit, outbox
    const impact = action.impact;
    const resolved = impact ? resolveImpactBindings(impact, bindings, location) : [];
    const primary = resolved.find((r) => r.role === 'primary') ?? null;
    const cascadeEnabled = cascade?.enabled === true;
    const cascadePlan = cascade ? planCascade(resolved, cascade, this.registry, config, entity.schema) : [];
    log.debug('Cascade planned', { entries: cascadePlan.map((e) => `${e.entity}:${e.label}`) });

    const bridge = audit ? new AuditBridge(action.name, resolved, audit) : null;
    const eventType = cdc && primary ? resolveEventType(primary.impact, cdc) : null;
    if (eventType) {
      log.debug(`Event type ${eventType}`);
    }

    const outbox =
      cdc && primary && eventType
        ? [
            outboxStatement({
              actionName: action.name,
              primary,
              resolved,
              cdc,
              eventType,
              embedCascade: cdc.includeCascade && cascadeEnabled,
              registry: this.registry,
              config,
              fallbackSchema: entity.schema,
            }),
          ]
        : [];

    const declarations = [
      `v_result ${resultType(config)};`,
      ...bindings.capturedVariables().map((variable) => `${variable} UUID;`),
    ];
    if (impact) declarations.push(...impactDeclarations(config, cascadeEnabled));
    if (bridge) declarations.push(...bridge.declarations());
    if (eventType) declarations.push(...outboxDeclarations());
    if (rollbackOnValidation) declarations.push(...VALIDATION_HANDLER_DECLARATIONS);

    const steps: AssembledStep[] = fragments.map((fragment) => ({
      fragment,
      audit: bridge ? bridge.afterStep(fragment.stepIndex) : [],
    }));

    const extraMetadata = extraMetadataStatement({
      impact,
      cascadeEnabled,
      collections: impact ? collectionEntries(impact, bindings) : [],
      eventIdVariable: eventType ? EVENT_ID_VARIABLE : null,
    });

    const result = [
      ...(impact ? metadataStatements(impact, config) : []),
      ...successResultStatements({
        action,
        owner: entity,
        primary,
        bindings,
        registry: this.registry,
        config,
        extraMetadata,
      }),
    ];

    const logMutation =
      bridge?.logsMutations && primary
        ? { entity: primary.impact.entity, operation: primary.impact.operation }
        : null;

    const parts: FunctionParts = {
      schema: entity.schema,
      name: action.name,
      parameters: parameters.map((p) => ({ name: p.name, type: p.type })),
      returns: resultType(config),
      declarations,
      auditSeed: bridge ? bridge.seed() : [],
      steps,
      cascade: impact && cascade && cascadeEnabled ? cascadeStatements(cascadePlan, impact, cascade, config.schemas.app) : [],
      auditSet: bridge ? bridge.afterCascade(cascadeEnabled) : [],
      outbox,
      result,
      auditClear: clear,
      returnStatement: successReturn(config, logMutation),
      validationHandler: rollbackOnValidation ? validationHandler(config, clear) : null,
    };

    const comment = functionComment({
      signature: functionSignature(parts),
      entity,
      action,
      cascadeEnabled,
      eventType,
    });

    const plan: ActionPlan = {
      entity: entity.name,
      action: action.name,
      functionName: qualify(entity.schema, action.name),
      parameters: parts.parameters,
      bindings: bindings.entries(),
      cascade,
      cascadePlan,
      cdc,
      eventType,
      audit,
      rollbackOnValidation,
    };

    return {
      entity: entity.name,
      action: action.name,
      sql: `${assembleFunction(parts)}\n\n${comment}`,
      plan,
      diagnostics,
    };
  }

  private validateNames(entity: Entity, action: Action, location: CompileLocation): void {
    if (!isEntityName(entity.name)) {
      throw new CompileError(ErrorCodes.INVALID_IDENTIFIER, `Invalid entity name "${entity.name}"`, location);
    }
    if (!isSafeIdentifier(entity.schema)) {
      throw new CompileError(ErrorCodes.INVALID_IDENTIFIER, `Invalid schema name "${entity.schema}"`, location);
    }
    if (!isSafeIdentifier(action.name)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid action name "${action.name}": use snake_case`,
        location
      );
    }
    for (const parameter of action.parameters) {
      if (!PARAMETER_NAME.test(parameter.name) || !isSafeIdentifier(parameter.name)) {
        throw new CompileError(
          ErrorCodes.INVALID_IDENTIFIER,
          `Invalid parameter name "${parameter.name}": parameters are named p_<name>`,
          location
        );
      }
      if (parameter.entity !== undefined && !isEntityName(parameter.entity)) {
        throw new CompileError(
          ErrorCodes.INVALID_IDENTIFIER,
          `Invalid entity name "${parameter.entity}" for parameter ${parameter.name}`,
          location
        );
      }
      if (!PARAMETER_TYPE.test(parameter.type)) {
        throw new CompileError(
          ErrorCodes.INVALID_IDENTIFIER,
          `Invalid type "${parameter.type}" for parameter ${parameter.name}`,
          location
        );
      }
    }
  }

  /**
   * Declared parameters, preceded by `p_<entity>_id` when update/delete steps
   * target the owning entity and the action does not declare it.
   */
  private functionParameters(entity: Entity, action: Action, location: CompileLocation): ActionParameter[] {
    const seen = new Set<string>();
    for (const parameter of action.parameters) {
      if (seen.has(parameter.name)) {
        throw new CompileError(
          ErrorCodes.INVALID_IDENTIFIER,
          `Parameter ${parameter.name} is declared more than once`,
          location
        );
      }
      seen.add(parameter.name);
    }

    const implicit = entityIdParameter(entity.name);
    const targetsOwner = action.steps.some(
      (step) => (step.kind === 'update' || step.kind === 'delete') && step.entity === entity.name
    );
    if (targetsOwner && !seen.has(implicit)) {
      return [{ name: implicit, type: 'UUID', entity: entity.name }, ...action.parameters];
    }
    return [...action.parameters];
  }

  private configWarnings(
    action: Action,
    cascade: CascadeConfig | null,
    cdc: CDCConfig | null,
    warn: (code: WarningCode, message: string) => void
  ): void {
    if (!action.impact && action.cascade?.enabled === true) {
      warn(
        WarningCodes.CASCADE_WITHOUT_IMPACT,
        'Cascade is enabled but the action declares no impact; no cascade is generated'
      );
    }

    if (cascade) {
      const known = new Set([
        ...this.registry.names(),
        ...(action.impact ? [action.impact.primary, ...action.impact.sideEffects].map((e) => e.entity) : []),
      ]);
      const named = [...(cascade.includeEntities ?? []), ...(cascade.excludeEntities ?? [])];
      for (const name of [...new Set(named)]) {
        if (!known.has(name)) {
          warn(WarningCodes.UNKNOWN_FILTER_ENTITY, `Cascade filter names unknown entity ${name}`);
        }
      }
    }

    if (cdc?.includeCascade && !cascade?.enabled) {
      warn(
        WarningCodes.INCLUDE_CASCADE_WITHOUT_CASCADE,
        'CDC include_cascade is set but cascade is disabled; the event carries no cascade'
      );
    }
  }
}

/**
 * SQL file body for one entity.
 */
export function renderEntityFile(entity: Entity, actions: readonly CompiledAction[]): string {
  const rule = `-- ${'='.repeat(76)}`;
  const header = [
    rule,
    `-- Entity: ${entity.name} (schema ${entity.schema})`,
    `-- Actions: ${actions.map((a) => a.action).join(', ') || '(none)'}`,
    rule,
  ].join('\n');
  return [header, ...actions.map((a) => a.sql)].join('\n\n') + '\n';
}

/**
 * Compile a single action with the given options.
 */
export function compileAction(
  entity: Entity,
  action: Action,
  options: ActionCompilerOptions = {}
): CompiledAction {
  return new ActionCompiler(options).compileAction(entity, action);
}
