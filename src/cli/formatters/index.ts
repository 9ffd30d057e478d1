/**
 * Output formatters barrel file.
 */
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';

export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export type { CheckReport, FormatOptions, IFormatter, OutputFormat, ReportedError } from './types.js';

/**
 * Create a formatter for the given output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
