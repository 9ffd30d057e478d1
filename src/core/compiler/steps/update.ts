/**
 * Update step. `id = p_<param>` predicates reuse the parameter as the
 * binding; anything else captures the first updated row's id.
 */
import type { UpdateStep } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import { BaseStepCompiler, type StepContext } from './base.js';

export class UpdateStepCompiler extends BaseStepCompiler<UpdateStep> {
  readonly kind = 'update' as const;

  compile(step: UpdateStep, ctx: StepContext): StepFragment {
    const target = this.target(step.entity, ctx);
    const scope = this.scope(ctx, target.entity);

    const assignments = Object.entries(step.fields).map(
      ([column, expression]) =>
        `${this.identifier(column, ctx)} = ${ctx.expressions.compileValue(expression, scope, target.entity?.fields[column])}`
    );
    if (!('updated_at' in step.fields)) assignments.push('updated_at = now()');
    if (!('updated_by' in step.fields)) assignments.push('updated_by = auth_user_id');

    const where = this.whereClause(step, ctx, target);
    const reused = this.parameterBinding(step, ctx);
    const binding = reused ?? ctx.bindings.capture(step.entity, 'update', ctx.stepIndex);

    const lines = [`UPDATE ${target.qualifiedTable}`, `SET ${assignments.join(', ')}`, where];
    const sql = reused ? `${lines.join('\n')};` : this.captureFirstId(lines, binding.variable);

    return { stepIndex: ctx.stepIndex, step, sql, binding };
  }
}
