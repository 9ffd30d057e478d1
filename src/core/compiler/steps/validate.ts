/**
 * Validate step: a guard that ends the action with a structured failure.
 */
import type { ValidateStep } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import { BaseStepCompiler, type StepContext } from './base.js';
import { indent } from '../../../utils/sql.js';

export const DEFAULT_VALIDATION_CODE = 'validation_failed';

export class ValidateStepCompiler extends BaseStepCompiler<ValidateStep> {
  readonly kind = 'validate' as const;

  compile(step: ValidateStep, ctx: StepContext): StepFragment {
    const condition = ctx.expressions.compile(step.condition, this.scope(ctx, ctx.owner));
    const failure = ctx.renderFailure({
      code: step.error ?? DEFAULT_VALIDATION_CODE,
      message: step.message ?? `Validation failed: ${step.condition.trim()}`,
      stepIndex: ctx.stepIndex,
    });

    const sql = [`IF NOT (${condition}) THEN`, indent(failure, 4), 'END IF;'].join('\n');

    return { stepIndex: ctx.stepIndex, step, sql };
  }
}
