import type { Report } from '../types.js';
import { formatTextReport, type TextFormatOptions } from './text.js';
import { formatJsonReport } from './json.js';

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * Format a report in the specified format
 */
export function formatReport(
  report: Report,
  format: OutputFormat,
  options: TextFormatOptions = {}
): string {
  switch (format) {
    case 'json':
      return formatJsonReport(report);
    case 'text':
    default:
      return formatTextReport(report, options);
  }
}

// Export individual formatters
export { formatTextReport, formatJsonReport };
export type { TextFormatOptions };
