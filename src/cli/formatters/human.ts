/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { ActionPlan, Diagnostic } from '../../core/compiler/types.js';
import type { CheckReport, FormatOptions, IFormatter, ReportedError } from './types.js';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatCheck(report: CheckReport): string {
    const lines: string[] = [];

    for (const { entity, actions } of report.entities) {
      lines.push(`${this.colorize('✓', 'green')} ${entity}: ${actions.length} action(s)`);
      if (this.options.verbose) {
        actions.forEach((action) => lines.push(`   - ${action}`));
      }
    }

    for (const error of report.errors) {
      lines.push(this.formatError(error));
    }

    if (report.warnings.length > 0) {
      lines.push('');
      report.warnings.forEach((warning) => lines.push(this.formatWarning(warning)));
    }

    lines.push('');
    const summary = `${report.files.length} file(s), ${report.entities.length} entit${report.entities.length === 1 ? 'y' : 'ies'} compiled, ${report.errors.length} error(s), ${report.warnings.length} warning(s)`;
    lines.push(report.errors.length > 0 ? this.colorize(summary, 'red') : this.colorize(summary, 'green'));
    return lines.join('\n');
  }

  formatPlan(plan: ActionPlan): string {
    const lines: string[] = [];
    lines.push(this.colorize(`${plan.functionName}`, 'bold'));
    lines.push(`   Entity: ${plan.entity}`);

    const params = plan.parameters.map((p) => `${p.name} ${p.type}`);
    lines.push(`   Parameters: ${params.length > 0 ? params.join(', ') : this.colorize('(none)', 'dim')}`);

    lines.push('');
    lines.push('   Bindings:');
    if (plan.bindings.length === 0) {
      lines.push(`     ${this.colorize('(none)', 'dim')}`);
    }
    for (const binding of plan.bindings) {
      const origin = binding.kind === 'parameter' ? 'parameter' : `step ${binding.stepIndex ?? '?'} (${binding.source ?? 'call'})`;
      lines.push(`     ${binding.entity} -> ${binding.variable} [${origin}]`);
    }

    lines.push('');
    if (!plan.cascade) {
      lines.push(`   Cascade: ${this.colorize('absent (no impact)', 'dim')}`);
    } else if (!plan.cascade.enabled) {
      lines.push('   Cascade: disabled');
    } else {
      lines.push(`   Cascade: enabled${plan.cascade.includeFullData ? '' : ' (ids only)'}`);
      plan.cascadePlan.forEach((entry, index) =>
        lines.push(`     ${index + 1}. ${entry.entity} ${entry.label} via ${entry.variable}`)
      );
    }

    lines.push(`   CDC: ${plan.eventType ? `event ${plan.eventType}` : this.colorize('off', 'dim')}`);

    const audit = plan.audit
      ? [plan.audit.rowTriggers ? 'row triggers' : null, plan.audit.logMutations ? 'mutation log' : null]
          .filter((mode): mode is string => mode !== null)
          .join(' + ')
      : null;
    lines.push(`   Audit: ${audit ?? this.colorize('off', 'dim')}`);
    lines.push(`   Validation rollback: ${plan.rollbackOnValidation ? 'yes' : 'no'}`);
    return lines.join('\n');
  }

  private formatError(error: ReportedError): string {
    return `${this.colorize('✗', 'red')} ${error.entity}: ${this.colorize(error.code, 'red')} ${error.message}`;
  }

  private formatWarning(warning: Diagnostic): string {
    const where = [warning.entity, warning.action].filter(Boolean).join('.');
    return `${this.colorize('⚠', 'yellow')} ${this.colorize(warning.code, 'yellow')} ${where}: ${warning.message}`;
  }

  private colorize(text: string, color: 'red' | 'green' | 'yellow' | 'dim' | 'bold'): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}
