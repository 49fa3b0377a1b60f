import type {
  LayoutPage,
  OutlineEntry,
  StyleProfile,
} from '@pdf-outline/model';

import type { ExtractorSettings } from '../config/settings-loader';
import type { HeadingCandidate } from '../types';

import { HEADING_LEVELS } from '@pdf-outline/model';

import {
  countWords,
  matchesAnyPattern,
  roundFontSize,
} from '../utils/text-utils';

/**
 * PageCurator
 *
 * Turns one page's heading candidates into outline entries: most significant
 * level first, then top to bottom, capped at `maxHeadingsPerPage`. A page
 * without candidates gets a single H1 entry for its topmost prominent text,
 * so that every page with content shows up in the outline.
 */
export class PageCurator {
  constructor(private readonly settings: ExtractorSettings) {}

  curate(
    candidates: HeadingCandidate[],
    page: LayoutPage,
    pageNumber: number,
    title: string,
    profile: StyleProfile,
  ): OutlineEntry[] {
    if (candidates.length === 0) {
      const text = this.findFallbackText(page, title, profile);
      return text === undefined ? [] : [{ level: 'H1', text, page: pageNumber }];
    }

    return [...candidates]
      .sort(
        (a, b) =>
          HEADING_LEVELS.indexOf(a.level) - HEADING_LEVELS.indexOf(b.level) ||
          a.yPosition - b.yPosition,
      )
      .slice(0, this.settings.maxHeadingsPerPage)
      .map((candidate) => ({
        level: candidate.level,
        text: candidate.text,
        page: candidate.page,
      }));
  }

  /**
   * Topmost span text prominent enough to stand in for a heading
   */
  findFallbackText(
    page: LayoutPage,
    title: string,
    profile: StyleProfile,
  ): string | undefined {
    let best: { text: string; y: number } | undefined;

    for (const block of page.blocks) {
      for (const line of block.lines) {
        for (const span of line.spans) {
          const text = span.text.trim();
          if (
            text.length === 0 ||
            matchesAnyPattern(text, this.settings.noisePatterns) ||
            (title.length > 0 && text === title)
          ) {
            continue;
          }

          const prominent =
            roundFontSize(span.size) >= profile.dominantFontSize - 0.5 ||
            span.bold;
          const meaningful =
            countWords(text) > 1 || (text.length > 3 && !/^\d+$/.test(text));

          if (prominent && meaningful && (!best || line.bbox.y0 < best.y)) {
            best = { text, y: line.bbox.y0 };
          }
        }
      }
    }

    return best?.text;
  }
}
