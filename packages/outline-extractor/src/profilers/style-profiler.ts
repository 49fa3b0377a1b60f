import type { LayoutDocument, StyleProfile } from '@pdf-outline/model';

import { roundFontSize } from '../utils/text-utils';

/**
 * Sizes at or below this are page numbers, footnotes and the like; they are
 * ignored for the dominant size unless nothing larger exists.
 */
export const SMALL_FONT_SIZE_LIMIT = 6;

/**
 * StyleProfiler
 *
 * Scans every span of a document once and derives:
 * - the dominant (body text) font size: the most frequent size above
 *   {@link SMALL_FONT_SIZE_LIMIT}, or the most frequent size overall when
 *   every size is small
 * - the prominence ladder: distinct sizes ordered by size, then by how often
 *   the size is set in bold, both descending
 *
 * Ties on frequency go to the size seen first in reading order.
 */
export class StyleProfiler {
  profile(document: LayoutDocument): StyleProfile {
    const sizeCounts = new Map<number, number>();
    const boldCounts = new Map<number, number>();

    for (const page of document.pages) {
      for (const block of page.blocks) {
        for (const line of block.lines) {
          for (const span of line.spans) {
            const size = roundFontSize(span.size);
            sizeCounts.set(size, (sizeCounts.get(size) ?? 0) + 1);
            if (span.bold) {
              boldCounts.set(size, (boldCounts.get(size) ?? 0) + 1);
            }
          }
        }
      }
    }

    if (sizeCounts.size === 0) {
      return { dominantFontSize: 0, fontSizesByProminence: [] };
    }

    const bodySizes = [...sizeCounts].filter(
      ([size]) => size > SMALL_FONT_SIZE_LIMIT,
    );
    const pool = bodySizes.length > 0 ? bodySizes : [...sizeCounts];
    const [dominantFontSize] = pool.reduce((best, entry) =>
      entry[1] > best[1] ? entry : best,
    );

    const fontSizesByProminence = [...sizeCounts.keys()].sort(
      (a, b) => b - a || (boldCounts.get(b) ?? 0) - (boldCounts.get(a) ?? 0),
    );

    return { dominantFontSize, fontSizesByProminence };
  }
}
