/**
 * Formatter type definitions.
 */
import type { ActionPlan, Diagnostic } from '../../core/compiler/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
}

/** A compile error reported by check. */
export interface ReportedError {
  entity: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Outcome of checking a set of entity files.
 */
export interface CheckReport {
  files: string[];
  entities: Array<{ entity: string; actions: string[] }>;
  errors: ReportedError[];
  warnings: Diagnostic[];
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatCheck(report: CheckReport): string;
  formatPlan(plan: ActionPlan): string;
}
