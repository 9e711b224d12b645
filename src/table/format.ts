/**
 * Table renderers for CLI output
 */

import type { FieldValue } from '../template/index.js';
import type { ParamTable } from './param-table.js';

export type OutputFormat = 'table' | 'csv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'csv', 'json'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function cellText(value: FieldValue | undefined): string {
  return value === undefined ? '' : String(value);
}

/**
 * Aligned columns with a header rule
 */
export function renderText(table: ParamTable): string {
  const headers = [...table.columns];
  const rows = table.rows().map((row) => headers.map((h) => cellText(row[h])));

  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));

  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  const headerLine = line(headers);
  return [headerLine, '-'.repeat(headerLine.length), ...rows.map(line)].join('\n');
}

function csvCell(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(table: ParamTable): string {
  const headers = [...table.columns];
  const lines = [headers.map(csvCell).join(',')];
  for (const row of table.rows()) {
    lines.push(headers.map((h) => csvCell(cellText(row[h]))).join(','));
  }
  return lines.join('\n');
}

export function renderJson(table: ParamTable): string {
  return JSON.stringify(table.toJSON(), null, 2);
}

export function renderTable(table: ParamTable, format: OutputFormat): string {
  switch (format) {
    case 'csv':
      return renderCsv(table);
    case 'json':
      return renderJson(table);
    default:
      return renderText(table);
  }
}
