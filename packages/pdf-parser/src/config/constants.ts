/**
 * Configuration constants for LineAssembler
 */
export const LINE_ASSEMBLER = {
  /**
   * A baseline shift larger than this fraction of the run size starts a new line
   */
  BASELINE_TOLERANCE_RATIO: 0.5,

  /**
   * Horizontal gap (fraction of run size) above which a space is inserted
   * between two runs that carry no whitespace of their own
   */
  WORD_GAP_RATIO: 0.15,

  /**
   * Descender depth below the baseline, as a fraction of the font size
   */
  DESCENT_RATIO: 0.25,

  /**
   * Default vertical gap (fraction of the previous line height) that starts
   * a new block
   */
  DEFAULT_BLOCK_GAP_RATIO: 1.0,
} as const;

/**
 * Configuration constants for PdfLayoutReader
 */
export const PDF_LAYOUT_READER = {
  /**
   * pdfjs verbosity (0 = errors only)
   */
  VERBOSITY: 0,
} as const;
