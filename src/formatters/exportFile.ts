/**
 * Export file naming
 */

export type ExportFormat = 'csv' | 'json';

export interface ExportFileNameOptions {
  format: ExportFormat;
  command: string;
  profile?: string;
  fileName?: string;
  now?: Date;
}

function timestamp(now: Date): string {
  const two = (n: number) => String(n).padStart(2, '0');
  return (
    `${now.getFullYear()}${two(now.getMonth() + 1)}${two(now.getDate())}` +
    `_${two(now.getHours())}${two(now.getMinutes())}${two(now.getSeconds())}`
  );
}

/** Append the format's extension unless the name already ends with it */
export function withExtension(fileName: string, format: ExportFormat): string {
  const extension = `.${format}`;
  return fileName.toLowerCase().endsWith(extension) ? fileName : fileName + extension;
}

/**
 * Name an export file.
 *
 * An explicit name gets the format's extension appended when it lacks one;
 * otherwise the name is `<profile>-<command>-<YYYYMMDD_HHMMSS>.<format>`.
 *
 * @example
 * ```typescript
 * exportFileName({ format: 'csv', command: 'ports', fileName: 'out' }); // 'out.csv'
 * ```
 */
export function exportFileName(options: ExportFileNameOptions): string {
  if (options.fileName) {
    return withExtension(options.fileName, options.format);
  }

  const profile = options.profile || 'default';
  return `${profile}-${options.command}-${timestamp(options.now ?? new Date())}.${options.format}`;
}
