/**
 * Call step: PERFORM an external function, or capture the id it returns.
 */
import type { CallStep } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import { BaseStepCompiler, type StepContext } from './base.js';
import { CompileError, ErrorCodes } from '../../../utils/errors.js';

const FUNCTION_NAME = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/;

export class CallStepCompiler extends BaseStepCompiler<CallStep> {
  readonly kind = 'call' as const;

  compile(step: CallStep, ctx: StepContext): StepFragment {
    if (!FUNCTION_NAME.test(step.function)) {
      throw new CompileError(
        ErrorCodes.INVALID_IDENTIFIER,
        `Invalid function name "${step.function}"`,
        this.location(ctx)
      );
    }

    const scope = this.scope(ctx, ctx.owner);
    const args = Object.entries(step.args).map(
      ([name, expression]) => `${this.identifier(name, ctx)} => ${ctx.expressions.compile(expression, scope)}`
    );
    const invocation = `${step.function}(${args.join(', ')})`;

    if (!step.captures) {
      return { stepIndex: ctx.stepIndex, step, sql: `PERFORM ${invocation};` };
    }

    this.target(step.captures, ctx);
    const binding = ctx.bindings.capture(step.captures, 'call', ctx.stepIndex);
    return {
      stepIndex: ctx.stepIndex,
      step,
      sql: `${binding.variable} := ${invocation};`,
      binding,
    };
  }
}
