/**
 * Step compiler registry - maps step kinds to compilers.
 */
import type { ActionStep, StepKind } from '../../ast/types.js';
import type { StepFragment } from '../types.js';
import type { StepCompiler, StepContext } from './base.js';
import { InsertStepCompiler } from './insert.js';
import { UpdateStepCompiler } from './update.js';
import { DeleteStepCompiler } from './delete.js';
import { ValidateStepCompiler } from './validate.js';
import { CallStepCompiler } from './call.js';
import { CompileError, ErrorCodes } from '../../../utils/errors.js';

type StepCompilerRegistry = {
  [K in StepKind]: StepCompiler<Extract<ActionStep, { kind: K }>>;
};

const stepCompilers: StepCompilerRegistry = {
  insert: new InsertStepCompiler(),
  update: new UpdateStepCompiler(),
  delete: new DeleteStepCompiler(),
  validate: new ValidateStepCompiler(),
  call: new CallStepCompiler(),
};

/**
 * Compile one step with the compiler registered for its kind.
 */
export function compileStep(step: ActionStep, ctx: StepContext): StepFragment {
  switch (step.kind) {
    case 'insert':
      return stepCompilers.insert.compile(step, ctx);
    case 'update':
      return stepCompilers.update.compile(step, ctx);
    case 'delete':
      return stepCompilers.delete.compile(step, ctx);
    case 'validate':
      return stepCompilers.validate.compile(step, ctx);
    case 'call':
      return stepCompilers.call.compile(step, ctx);
    default: {
      const unknown: never = step;
      throw new CompileError(
        ErrorCodes.UNKNOWN_STEP_KIND,
        `Unknown step kind in ${JSON.stringify(unknown)}`,
        { entity: ctx.owner.name, action: ctx.action.name, stepIndex: ctx.stepIndex }
      );
    }
  }
}

/**
 * Kinds with a registered compiler.
 */
export function getStepKinds(): StepKind[] {
  return Object.keys(stepCompilers).filter(isStepKind);
}

function isStepKind(value: string): value is StepKind {
  return value in stepCompilers;
}

export type { StepCompiler, StepContext } from './base.js';
export { BaseStepCompiler } from './base.js';
export { DEFAULT_VALIDATION_CODE } from './validate.js';
