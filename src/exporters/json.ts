import type { Exporter } from './types.js';

/**
 * JSON document with run metadata around the items
 */
export const jsonExporter: Exporter = {
  format: 'json',
  extension: 'json',
  render(target, items, now) {
    const document = {
      target,
      exported_at: now.toISOString(),
      count: items.length,
      items,
    };
    return `${JSON.stringify(document, null, 2)}\n`;
  },
};
