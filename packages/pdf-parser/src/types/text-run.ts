/**
 * Text run in viewport space (top-left origin), before line assembly.
 *
 * One pdfjs text item maps to one run.
 */
export interface TextRun {
  text: string;

  /**
   * Left edge of the run
   */
  x: number;

  /**
   * Baseline position, growing downward
   */
  baselineY: number;

  width: number;
  size: number;
  fontName: string;

  /**
   * The parser reported an end of line after this run
   */
  hasEOL: boolean;
}
