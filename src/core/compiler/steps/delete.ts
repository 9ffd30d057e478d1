/**
 * Delete step. Soft delete stamps deleted_at/deleted_by; `hard: true`
 * removes the row. The binding feeds the DELETED cascade path.
 */
import type { DeleteStep } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import { BaseStepCompiler, type StepContext } from './base.js';

export class DeleteStepCompiler extends BaseStepCompiler<DeleteStep> {
  readonly kind = 'delete' as const;

  compile(step: DeleteStep, ctx: StepContext): StepFragment {
    const target = this.target(step.entity, ctx);
    const where = this.whereClause(step, ctx, target);
    const reused = this.parameterBinding(step, ctx);
    const binding = reused ?? ctx.bindings.capture(step.entity, 'delete', ctx.stepIndex);

    const lines = step.hard
      ? [`DELETE FROM ${target.qualifiedTable}`, where]
      : [`UPDATE ${target.qualifiedTable}`, 'SET deleted_at = now(), deleted_by = auth_user_id', where];
    const sql = reused ? `${lines.join('\n')};` : this.captureFirstId(lines, binding.variable);

    return { stepIndex: ctx.stepIndex, step, sql, binding };
  }
}
