import type { LayoutLine, LayoutPage } from '@pdf-outline/model';

import type { ExtractorSettings } from '../config/settings-loader';

import { matchesAnyPattern, roundFontSize } from '../utils/text-utils';
import { TitleFragmentMerger } from './title-fragment-merger';

/**
 * Titles this short are page furniture rather than a title
 */
const MIN_TITLE_LENGTH = 6;

/**
 * TitleResolver
 *
 * Reconstructs the document title from the first physical page:
 * 1. Configured fragment lists, searched in the upper half of the page
 * 2. Otherwise, every distinct text at the page's largest font size,
 *    longest first
 *
 * A title containing a configured banner phrase is replaced by ''.
 */
export class TitleResolver {
  constructor(
    private readonly settings: ExtractorSettings,
    private readonly merger = new TitleFragmentMerger(),
  ) {}

  resolve(firstPage: LayoutPage | undefined): string {
    if (!firstPage) {
      return '';
    }

    const title =
      this.findByFragments(firstPage) ?? this.findByLargestSize(firstPage);
    return this.isBanner(title) ? '' : title;
  }

  private findByFragments(page: LayoutPage): string | undefined {
    const upperLines = page.blocks
      .flatMap((block) => block.lines)
      .filter((line) => line.bbox.y0 < page.height / 2)
      .map((line) => ({ line, text: this.merger.mergeLine(line) }));

    for (const phrases of this.settings.title.fragments) {
      const matched: LayoutLine[] = [];
      for (const phrase of phrases) {
        const found = upperLines.find(
          ({ line, text }) => !matched.includes(line) && text.includes(phrase),
        );
        if (!found) {
          break;
        }
        matched.push(found.line);
      }

      if (matched.length === phrases.length) {
        return this.merger.merge(matched);
      }
    }

    return undefined;
  }

  private findByLargestSize(page: LayoutPage): string {
    const spans = page.blocks
      .flatMap((block) => block.lines)
      .flatMap((line) => line.spans)
      .map((span) => ({ text: span.text.trim(), size: roundFontSize(span.size) }))
      .filter((span) => span.text.length > 0);

    if (spans.length === 0) {
      return '';
    }

    const maxSize = Math.max(...spans.map((span) => span.size));
    const texts = [
      ...new Set(
        spans.filter((span) => span.size === maxSize).map((span) => span.text),
      ),
    ];
    const title = texts
      .sort((a, b) => b.length - a.length)
      .join(' ')
      .trim();

    if (
      title.length < MIN_TITLE_LENGTH ||
      matchesAnyPattern(title, this.settings.noisePatterns)
    ) {
      return '';
    }
    return title;
  }

  private isBanner(title: string): boolean {
    return this.settings.title.bannerPhrases.some((phrase) =>
      title.includes(phrase),
    );
  }
}
