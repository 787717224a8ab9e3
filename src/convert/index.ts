// LibreOffice conversion module
// Exports for doc/xls to docx/xlsx conversion with bounded worker pool

export {
  LibreOfficeConverter,
  createLibreOfficeConverter,
  truncateDiagnostic,
  MAX_REASON_LENGTH,
  type LibreOfficeConverterOptions,
} from './soffice';
export { resolveExecutable, isExecutableFile } from './binary';
