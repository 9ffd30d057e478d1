/**
 * Step compiler base class and shared context.
 */
import type { Action, ActionStep, DeleteStep, Entity, UpdateStep } from '../../ast/types.js';
import type { Config } from '../../config/schema.js';
import type { EntityRegistry } from '../../registry/entity-registry.js';
import type { BindingTable } from '../binding-table.js';
import type { ExpressionCompiler, ExpressionScope } from '../expression.js';
import type { Binding, StepFragment, ValidationFailure } from '../types.js';
import { tableName } from '../naming.js';
import { isEntityName, isSafeIdentifier, qualify } from '../../../utils/sql.js';
import {
  BindingError,
  CompileError,
  ErrorCodes,
  WarningCodes,
  type CompileLocation,
  type WarningCode,
} from '../../../utils/errors.js';

/**
 * Everything a step compiler may read or record while compiling one step.
 */
export interface StepContext {
  /** Entity that owns the action */
  owner: Entity;
  action: Action;
  /** 1-based */
  stepIndex: number;
  bindings: BindingTable;
  parameters: ReadonlySet<string>;
  registry: EntityRegistry;
  config: Config;
  expressions: ExpressionCompiler;
  /** SQL that ends the action with a validation failure */
  renderFailure(failure: ValidationFailure): string;
  warn(code: WarningCode, message: string): void;
}

export interface StepCompiler<S extends ActionStep> {
  readonly kind: S['kind'];
  compile(step: S, ctx: StepContext): StepFragment;
}

/** Resolved target of an entity step. */
export interface StepTarget {
  qualifiedTable: string;
  /** Undefined when the entity is not registered */
  entity?: Entity;
}

const ID_EQUALS_PARAMETER = /^id\s*=\s*(p_[A-Za-z0-9_]+)$/;

export abstract class BaseStepCompiler<S extends ActionStep> implements StepCompiler<S> {
  abstract readonly kind: S['kind'];

  abstract compile(step: S, ctx: StepContext): StepFragment;

  protected location(ctx: StepContext): CompileLocation {
    return { entity: ctx.owner.name, action: ctx.action.name, stepIndex: ctx.stepIndex };
  }

  protected scope(ctx: StepContext, target?: Entity): ExpressionScope {
    return {
      bindings: ctx.bindings,
      parameters: ctx.parameters,
      target,
      location: this.location(ctx),
    };
  }

  /**
   * Table a step writes to. Unknown entities are compiled against the
   * owner's schema with a warning; malformed names are rejected.
   */
  protected target(entityName: string, ctx: StepContext): StepTarget {
    if (!isEntityName(entityName)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid entity name "${entityName}" in step ${ctx.stepIndex}: use letters, digits and underscores`,
        this.location(ctx)
      );
    }
    const entity = ctx.registry.get(entityName);
    if (!entity) {
      ctx.warn(
        WarningCodes.UNKNOWN_STEP_ENTITY,
        `Step ${ctx.stepIndex} targets ${entityName}, which is not a loaded entity; assuming schema ${ctx.owner.schema}`
      );
    }
    const schema = entity?.schema ?? ctx.owner.schema;
    if (!isSafeIdentifier(schema)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid schema name "${schema}" for entity ${entityName}`,
        this.location(ctx)
      );
    }
    return {
      qualifiedTable: qualify(schema, tableName(entityName, ctx.config.naming)),
      entity,
    };
  }

  /**
   * Validate a column or argument name.
   */
  protected identifier(name: string, ctx: StepContext): string {
    if (!isSafeIdentifier(name)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid column name "${name}": use lower-case letters, digits and underscores`,
        this.location(ctx)
      );
    }
    return name;
  }

  /**
   * DML that may touch several rows, run so that the binding receives the
   * first returned id. A bare `RETURNING id INTO` raises on a second row.
   */
  protected captureFirstId(statement: readonly string[], variable: string): string {
    return [
      'WITH touched AS (',
      ...statement.map((line) => `    ${line}`),
      '    RETURNING id',
      ')',
      `SELECT id INTO ${variable} FROM touched LIMIT 1;`,
    ].join('\n');
  }

  protected tenantColumn(ctx: StepContext): string | null {
    return ctx.config.naming.tenant_column;
  }

  /**
   * WHERE clause for update/delete: the compiled predicate, scoped to the tenant.
   */
  protected whereClause(step: UpdateStep | DeleteStep, ctx: StepContext, target: StepTarget): string {
    const predicate = ctx.expressions.compile(step.where, this.scope(ctx, target.entity));
    const tenant = this.tenantColumn(ctx);
    return tenant
      ? `WHERE (${predicate}) AND ${tenant} = auth_tenant_id`
      : `WHERE (${predicate})`;
  }

  /**
   * Parameter binding for an `id = p_<name>` predicate, or null when the
   * predicate selects rows some other way.
   */
  protected parameterBinding(step: UpdateStep | DeleteStep, ctx: StepContext): Binding | null {
    const match = ID_EQUALS_PARAMETER.exec(step.where.trim());
    if (!match) {
      return null;
    }
    const parameter = match[1];
    if (!ctx.parameters.has(parameter)) {
      throw new BindingError(
        ErrorCodes.UNKNOWN_PARAMETER,
        `Predicate "${step.where}" names undeclared parameter ${parameter}`,
        this.location(ctx)
      );
    }
    return ctx.bindings.bindParameter(step.entity, parameter);
  }
}
