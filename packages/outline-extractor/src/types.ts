import type { OutlineEntry } from '@pdf-outline/model';

/**
 * Heading found on a page before curation
 */
export interface HeadingCandidate extends OutlineEntry {
  /**
   * Top edge of the line, used only to order candidates within a page
   */
  yPosition: number;
}

export interface ExtractOptions {
  /**
   * Added to `physicalIndex + 1` to get the logical page number.
   * Overrides any `pageOffsets` rule from the settings.
   */
  pageOffset?: number;
}
