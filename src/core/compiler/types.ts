/**
 * Compiler type definitions.
 */
import type {
  ActionStep,
  AuditConfig,
  CDCConfig,
  CascadeConfig,
  CascadeOperation,
  EntityImpact,
  StepKind,
} from '../ast/types.js';
import type { WarningCode } from '../../utils/errors.js';

/**
 * How an entity ID binding came to exist.
 * - parameter: supplied by the caller as a function argument
 * - captured: produced by a step at run time
 */
export type BindingKind = 'parameter' | 'captured';

export interface Binding {
  entity: string;
  /** PL/pgSQL name holding the id (`p_post_id`, `v_post_id`, `v_post_id_2`) */
  variable: string;
  kind: BindingKind;
  /** Step kind that produced a captured binding */
  source?: StepKind;
  /** 1-based index of the producing step */
  stepIndex?: number;
}

/**
 * A non-fatal finding recorded during compilation.
 */
export interface Diagnostic {
  code: WarningCode;
  message: string;
  action?: string;
  entity?: string;
  stepIndex?: number;
}

/**
 * Code emitted for one step.
 */
export interface StepFragment {
  stepIndex: number;
  step: ActionStep;
  sql: string;
  /** Binding established by this step, if any */
  binding?: Binding;
}

/** An impact entry paired with the binding that carries its id. */
export interface ResolvedImpact {
  impact: EntityImpact;
  role: 'primary' | 'side_effect';
  label: CascadeOperation;
  binding: Binding;
}

/**
 * One planned cascade construction.
 */
export interface CascadePlanEntry {
  entity: string;
  label: CascadeOperation;
  bucket: 'updated' | 'deleted';
  variable: string;
  schema: string;
  view: string;
}

/** Details of a validation failure rendered into SQL. */
export interface ValidationFailure {
  code: string;
  message: string;
  stepIndex: number;
}

/**
 * Everything decided about an action before SQL is assembled.
 */
export interface ActionPlan {
  entity: string;
  action: string;
  functionName: string;
  parameters: Array<{ name: string; type: string }>;
  bindings: Binding[];
  cascade: CascadeConfig | null;
  cascadePlan: CascadePlanEntry[];
  cdc: CDCConfig | null;
  eventType: string | null;
  audit: AuditConfig | null;
  rollbackOnValidation: boolean;
}

/**
 * Result of compiling one action.
 */
export interface CompiledAction {
  entity: string;
  action: string;
  sql: string;
  plan: ActionPlan;
  diagnostics: Diagnostic[];
}

/**
 * Result of compiling all actions of an entity.
 */
export interface CompiledEntity {
  entity: string;
  actions: CompiledAction[];
  sql: string;
  diagnostics: Diagnostic[];
}
