/**
 * Tests for the validate step compiler.
 */
import { describe, it, expect } from 'vitest';
import { ValidateStepCompiler, DEFAULT_VALIDATION_CODE } from '../../../../../src/core/compiler/steps/validate.js';
import { createContext } from './context.js';

describe('ValidateStepCompiler', () => {
  const compiler = new ValidateStepCompiler();

  it('should guard with IF NOT and the rendered failure', () => {
    const ctx = createContext({ stepIndex: 1 });

    const fragment = compiler.compile(
      { kind: 'validate', condition: 'input.title IS NOT NULL', error: 'missing_title', message: 'Title is required' },
      ctx
    );

    expect(fragment.sql).toBe(
      ["IF NOT ((input_payload->>'title') IS NOT NULL) THEN", '    RETURN fail(1);', 'END IF;'].join('\n')
    );
    expect(ctx.failures).toEqual([{ code: 'missing_title', message: 'Title is required', stepIndex: 1 }]);
    expect(fragment.binding).toBeUndefined();
  });

  it('should default the code and message', () => {
    const ctx = createContext({ stepIndex: 4 });

    compiler.compile({ kind: 'validate', condition: ' views >= 0 ' }, ctx);

    expect(ctx.failures).toEqual([
      { code: DEFAULT_VALIDATION_CODE, message: 'Validation failed: views >= 0', stepIndex: 4 },
    ]);
  });
});
