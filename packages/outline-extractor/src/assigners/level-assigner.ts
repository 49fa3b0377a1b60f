import type { HeadingLevel, StyleProfile } from '@pdf-outline/model';

import type { LineStyle, OverrideTable } from '../overrides/override-table';

import { SECTION_NUMBER_PATTERN, roundFontSize } from '../utils/text-utils';

const NUMBERED_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3', 'H4'];

/**
 * LevelAssigner
 *
 * Picks the outline depth of a heading candidate. Numbering wins over
 * configured overrides, which win over the document's prominence ladder.
 */
export class LevelAssigner {
  constructor(private readonly overrides: OverrideTable) {}

  assign(
    heading: { text: string } & LineStyle,
    profile: StyleProfile,
  ): HeadingLevel {
    const depth = LevelAssigner.numberingDepth(heading.text);
    if (depth !== null) {
      return NUMBERED_LEVELS[depth - 1] ?? 'H_UNKNOWN';
    }

    const size = roundFontSize(heading.size);
    const override = this.overrides.findLevel(
      heading.text,
      { ...heading, size },
      profile.dominantFontSize,
    );
    if (override) {
      return override;
    }

    const index = profile.fontSizesByProminence.indexOf(size);
    if (index === -1) {
      return 'H_UNKNOWN';
    }
    return (
      NUMBERED_LEVELS[Math.min(index, NUMBERED_LEVELS.length - 1)] ??
      'H_UNKNOWN'
    );
  }

  /**
   * Number of non-empty dot groups in the leading number ("3.1." -> 2),
   * or null when the text is not numbered
   */
  static numberingDepth(text: string): number | null {
    if (!SECTION_NUMBER_PATTERN.test(text)) {
      return null;
    }

    const [token = ''] = text.split(/\s+/);
    return token.split('.').filter((group) => group.length > 0).length;
  }
}
