/**
 * Document-wide typographic profile
 */
export interface StyleProfile {
  /**
   * Font size representing ordinary body text
   */
  dominantFontSize: number;

  /**
   * Distinct font sizes, most heading-like first.
   * Index 0 maps to H1 when used as a fallback level ladder.
   */
  fontSizesByProminence: number[];
}
