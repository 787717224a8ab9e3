import path from 'path';
import type { SourceFormat, TargetFormat } from '../types';

/**
 * Legacy formats and the format each one is converted to
 */
export const TARGET_FORMATS: Readonly<Record<SourceFormat, TargetFormat>> = {
  doc: 'docx',
  xls: 'xlsx',
};

function isSourceFormat(extension: string): extension is SourceFormat {
  return Object.prototype.hasOwnProperty.call(TARGET_FORMATS, extension);
}

/**
 * Source format of a file, by case-insensitive extension
 *
 * @returns null for anything that is not an eligible legacy document
 */
export function sourceFormatOf(filePath: string): SourceFormat | null {
  const extension = path.posix.extname(filePath).slice(1).toLowerCase();
  return isSourceFormat(extension) ? extension : null;
}

/**
 * Relative destination path: same directory and stem, target extension
 *
 * @example destinationRelativePath('reports/Q1.XLS', 'xlsx') === 'reports/Q1.xlsx'
 */
export function destinationRelativePath(relativePath: string, targetFormat: TargetFormat): string {
  const { dir, name } = path.posix.parse(relativePath);
  return path.posix.join(dir, `${name}.${targetFormat}`);
}
