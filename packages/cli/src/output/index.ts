/**
 * Output format registration: table, JSON.
 */

import { formatJson } from './json.js';
import { formatTable } from './table.js';

export const OUTPUT_FORMATS = ['table', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Format data for output in the specified format.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'table':
    default:
      return formatTable(data);
  }
}

export { formatTable } from './table.js';
export { formatJson } from './json.js';
