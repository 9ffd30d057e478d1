/**
 * Insert step: one row, id captured into a fresh binding.
 */
import type { InsertStep } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import { BaseStepCompiler, type StepContext } from './base.js';

export class InsertStepCompiler extends BaseStepCompiler<InsertStep> {
  readonly kind = 'insert' as const;

  compile(step: InsertStep, ctx: StepContext): StepFragment {
    const target = this.target(step.entity, ctx);
    const scope = this.scope(ctx, target.entity);

    const columns: string[] = [];
    const values: string[] = [];
    const add = (column: string, value: string): void => {
      columns.push(column);
      values.push(value);
    };

    const tenant = this.tenantColumn(ctx);
    if (tenant && !(tenant in step.fields)) {
      add(tenant, 'auth_tenant_id');
    }
    for (const [column, expression] of Object.entries(step.fields)) {
      add(
        this.identifier(column, ctx),
        ctx.expressions.compileValue(expression, scope, target.entity?.fields[column])
      );
    }
    if (!('created_at' in step.fields)) add('created_at', 'now()');
    if (!('created_by' in step.fields)) add('created_by', 'auth_user_id');

    // Values are compiled first so `Entity.id` inside them sees earlier bindings.
    const binding = ctx.bindings.capture(step.entity, 'insert', ctx.stepIndex);

    const sql = [
      `INSERT INTO ${target.qualifiedTable} (${columns.join(', ')})`,
      `VALUES (${values.join(', ')})`,
      `RETURNING id INTO ${binding.variable};`,
    ].join('\n');

    return { stepIndex: ctx.stepIndex, step, sql, binding };
  }
}
