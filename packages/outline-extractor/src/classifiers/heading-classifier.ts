import type { LayoutBBox, LayoutSpan, StyleProfile } from '@pdf-outline/model';

import type { ExtractorSettings } from '../config/settings-loader';
import type { OverrideTable } from '../overrides/override-table';

import {
  NUMBERED_HEADING_PATTERN,
  countWords,
  isUpperCase,
  roundFontSize,
} from '../utils/text-utils';

/**
 * Line facts the classifier looks at
 */
export interface ClassifierInput {
  /**
   * Trimmed line text
   */
  text: string;

  /**
   * First span of the line; its size and weight stand for the whole line
   */
  span: LayoutSpan;

  bbox: LayoutBBox;
  previousBBox?: LayoutBBox;
}

/**
 * Names of the built-in rules, in evaluation order
 */
export const HEADING_RULES = {
  LARGE_FONT: 'large-font',
  BOLD: 'bold',
  NUMBERED: 'numbered',
  KEYWORD: 'keyword',
  ALL_CAPS: 'all-caps',
  VERTICAL_GAP: 'vertical-gap',
} as const;

/**
 * Vertical gap (in multiples of the dominant size) that sets a line apart
 */
const VERTICAL_GAP_RATIO = 1.5;

/**
 * HeadingClassifier
 *
 * Decides whether a single line is a heading candidate. Rules run in a fixed
 * order and the first one that matches wins; configured overrides run last.
 */
export class HeadingClassifier {
  constructor(
    private readonly settings: ExtractorSettings,
    private readonly overrides: OverrideTable,
  ) {}

  isHeading(input: ClassifierInput, profile: StyleProfile): boolean {
    return this.matchRule(input, profile) !== null;
  }

  /**
   * Name of the first rule that accepts the line, or null when none does.
   * Overrides are reported as `override:<name>`.
   */
  matchRule(input: ClassifierInput, profile: StyleProfile): string | null {
    const { text, span } = input;
    const { thresholds, headingKeywords } = this.settings;
    const size = roundFontSize(span.size);
    const dominant = profile.dominantFontSize;
    const words = countWords(text);
    const upper = isUpperCase(text);

    if (size > dominant + thresholds.fontSizeDifferenceFromDominant) {
      return HEADING_RULES.LARGE_FONT;
    }

    if (
      span.bold &&
      size >= dominant * thresholds.boldFontSizeMinRatioToDominant &&
      (words < thresholds.maxWordsForBoldHeading || upper)
    ) {
      return HEADING_RULES.BOLD;
    }

    if (
      NUMBERED_HEADING_PATTERN.test(text) &&
      (size >= dominant - 1 || span.bold)
    ) {
      return HEADING_RULES.NUMBERED;
    }

    const lowerText = text.toLowerCase();
    if (
      headingKeywords.some((keyword) => lowerText.includes(keyword)) &&
      ((span.bold && size >= dominant - 0.5) ||
        size >= dominant + 0.5 ||
        (text.endsWith(':') && size >= dominant - 1))
    ) {
      return HEADING_RULES.KEYWORD;
    }

    if (
      upper &&
      words < thresholds.maxWordsForAllCapsHeading &&
      size >= dominant - 1
    ) {
      return HEADING_RULES.ALL_CAPS;
    }

    if (
      input.previousBBox &&
      input.bbox.y0 - input.previousBBox.y1 > dominant * VERTICAL_GAP_RATIO &&
      size >= dominant - 0.5 &&
      !text.endsWith('.')
    ) {
      return HEADING_RULES.VERTICAL_GAP;
    }

    const override = this.overrides.findCandidate(
      text,
      { size, bold: span.bold, wordCount: words },
      dominant,
    );
    return override ? `override:${override.name}` : null;
  }
}
