/**
 * Compiler exports barrel file.
 */
export { ActionCompiler, compileAction, needsValidationRollback, renderEntityFile } from './action-compiler.js';
export type { ActionCompilerOptions } from './action-compiler.js';
export { BindingTable } from './binding-table.js';
export { ExpressionCompiler } from './expression.js';
export type { ExpressionScope } from './expression.js';
export { compileStep, getStepKinds } from './steps/index.js';
export type { StepCompiler, StepContext } from './steps/index.js';
export { operationLabel, planCascade, resolveImpactBindings } from './impact.js';
export { AuditBridge, AUDIT_SETTINGS } from './audit.js';
export { resolveEventType } from './outbox.js';
export { assembleFunction, describeStep, functionSignature } from './assembler.js';
export type * from './types.js';
export { compileEntities } from './project-compiler.js';
export type { EntityFailure, ProjectCompileResult } from './project-compiler.js';
