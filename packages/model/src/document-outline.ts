/**
 * Outline depth. `H_UNKNOWN` is used when no rule determines a depth.
 */
export type HeadingLevel = 'H1' | 'H2' | 'H3' | 'H4' | 'H_UNKNOWN';

export const HEADING_LEVELS = [
  'H1',
  'H2',
  'H3',
  'H4',
  'H_UNKNOWN',
] as const satisfies readonly HeadingLevel[];

/**
 * Single heading in the final outline
 */
export interface OutlineEntry {
  level: HeadingLevel;
  text: string;

  /**
   * 1-based logical page number
   */
  page: number;
}

/**
 * Result of outline extraction for one document
 *
 * `error` is only present when extraction failed; the outline is then empty.
 */
export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
  error?: string;
}
