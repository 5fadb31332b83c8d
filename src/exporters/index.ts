/**
 * Exporters: write collected entities to files
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExportFormat, Exporter, ExportResult } from './types.js';
import { jsonExporter } from './json.js';
import { csvExporter } from './csv.js';

export { EXPORT_FORMATS, isExportFormat } from './types.js';
export type { ExportFormat, Exporter, ExportResult } from './types.js';
export { jsonExporter } from './json.js';
export { csvExporter, csvField } from './csv.js';

const EXPORTERS: Record<ExportFormat, Exporter> = {
  json: jsonExporter,
  csv: csvExporter,
};

/**
 * Write `items` to `<outputDir>/<target>.<ext>`, creating the directory
 */
export async function exportEntities(
  format: ExportFormat,
  target: string,
  items: readonly object[],
  outputDir: string,
  now: Date = new Date()
): Promise<ExportResult> {
  const exporter = EXPORTERS[format];
  await mkdir(outputDir, { recursive: true });
  const file = join(outputDir, `${target}.${exporter.extension}`);
  await writeFile(file, exporter.render(target, items, now), 'utf-8');
  return { file, count: items.length };
}
