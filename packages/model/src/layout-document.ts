/**
 * Axis-aligned box in page space.
 *
 * The origin is the top-left corner of the page and `y` grows downward,
 * so `y0` is the top edge and `y1` the bottom edge.
 */
export interface LayoutBBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Run of text sharing one font and size
 */
export interface LayoutSpan {
  text: string;

  /**
   * Font size in points as reported by the parser (not rounded)
   */
  size: number;

  /**
   * Font name the style flags were derived from (e.g. "ABCDEF+Arial-BoldMT")
   */
  fontName: string;

  bold: boolean;
  italic: boolean;
  bbox: LayoutBBox;
}

// Spans sharing one visual line, in reading order
export interface LayoutLine {
  spans: LayoutSpan[];
  bbox: LayoutBBox;
}

// Vertically contiguous lines
export interface LayoutBlock {
  lines: LayoutLine[];
  bbox: LayoutBBox;
}

export interface LayoutPage {
  /**
   * 0-based physical page index
   */
  index: number;
  width: number;
  height: number;
  blocks: LayoutBlock[];
}

/**
 * Layout of a whole document as produced by a layout reader
 */
export interface LayoutDocument {
  /**
   * Document name, usually the source file name
   */
  name: string;
  pages: LayoutPage[];
}
