/**
 * JSON output formatter for machine consumption.
 */
import type { ActionPlan } from '../../core/compiler/types.js';
import type { CheckReport, IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatCheck(report: CheckReport): string {
    return JSON.stringify(
      {
        status: report.errors.length > 0 ? 'fail' : report.warnings.length > 0 ? 'warn' : 'pass',
        files: report.files,
        entities: report.entities,
        errors: report.errors,
        warnings: report.warnings,
      },
      null,
      2
    );
  }

  formatPlan(plan: ActionPlan): string {
    return JSON.stringify(plan, null, 2);
  }
}
