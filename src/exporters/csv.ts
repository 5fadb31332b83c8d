/**
 * CSV exporter
 *
 * Header is the union of keys in first-seen order. Fields are quoted per
 * RFC 4180 when they contain a comma, quote or line break; arrays are
 * joined with commas, nested objects are written as JSON.
 */

import type { Exporter } from './types.js';

export function csvField(value: unknown): string {
  let text: string;
  if (value === null || value === undefined) {
    text = '';
  } else if (Array.isArray(value)) {
    text = value.map((item) => String(item)).join(',');
  } else if (typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export const csvExporter: Exporter = {
  format: 'csv',
  extension: 'csv',
  render(_target, items) {
    const rows = items.map((item) => new Map<string, unknown>(Object.entries(item)));
    const columns: string[] = [];
    for (const row of rows) {
      for (const key of row.keys()) {
        if (!columns.includes(key)) columns.push(key);
      }
    }

    const lines = [columns.map(csvField).join(',')];
    for (const row of rows) {
      lines.push(columns.map((column) => csvField(row.get(column))).join(','));
    }
    return `${lines.join('\r\n')}\r\n`;
  },
};
