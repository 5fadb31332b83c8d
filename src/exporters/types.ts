export const EXPORT_FORMATS = ['json', 'csv'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/**
 * Renders a list of entities into file content
 */
export interface Exporter {
  readonly format: ExportFormat;
  /** File extension without the dot */
  readonly extension: string;
  render(target: string, items: readonly object[], now: Date): string;
}

export interface ExportResult {
  file: string;
  count: number;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}
