export { PdfLayoutReader } from './core/pdf-layout-reader';
export type { PdfLayoutReaderOptions } from './core/pdf-layout-reader';
export { PdfLayoutReadError } from './errors/pdf-layout-read-error';
export { LineAssembler } from './processors/line-assembler';
export type { LineAssemblerOptions } from './processors/line-assembler';
export type { TextRun } from './types/text-run';
export { detectFontStyle, type FontStyle } from './utils/font-style';
