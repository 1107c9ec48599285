import type { Report } from '../types.js';

/**
 * Format the report as JSON for machine consumption.
 */
export function formatJsonReport(report: Report): string {
  return JSON.stringify(report, null, 2);
}
