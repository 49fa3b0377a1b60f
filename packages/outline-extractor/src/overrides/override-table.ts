import type { HeadingLevel } from '@pdf-outline/model';

import type { OverrideGate } from '../config/settings-schema';
import type { HeadingOverride } from '../config/settings-loader';

/**
 * Typographic facts about a line that gates are evaluated against
 */
export interface LineStyle {
  size: number;
  bold: boolean;
  wordCount: number;
}

export function passesGate(
  gate: OverrideGate,
  style: LineStyle,
  dominantFontSize: number,
): boolean {
  if (gate.requireBold && !style.bold) {
    return false;
  }
  if (gate.wordLimit !== undefined && style.wordCount >= gate.wordLimit) {
    return false;
  }
  if (gate.boldPasses && style.bold) {
    return true;
  }
  if (gate.minSizeDelta === null) {
    return false;
  }

  const threshold = dominantFontSize + gate.minSizeDelta;
  return gate.strict ? style.size > threshold : style.size >= threshold;
}

/**
 * OverrideTable
 *
 * Configured phrase-to-level rules for phrasings that the general typographic
 * heuristics miss in particular documents. A well-formed document should not
 * need any; every entry is a known gap in the heuristics.
 *
 * Entries are evaluated in configuration order and the first match wins.
 */
export class OverrideTable {
  constructor(private readonly overrides: HeadingOverride[]) {}

  get size(): number {
    return this.overrides.length;
  }

  /**
   * First override that forces the line to be a heading candidate
   */
  findCandidate(
    text: string,
    style: LineStyle,
    dominantFontSize: number,
  ): HeadingOverride | undefined {
    return this.overrides.find(
      (override) =>
        override.candidate !== undefined &&
        override.pattern.test(text) &&
        passesGate(override.candidate, style, dominantFontSize),
    );
  }

  /**
   * Level forced by the first matching override, if any
   */
  findLevel(
    text: string,
    style: LineStyle,
    dominantFontSize: number,
  ): HeadingLevel | undefined {
    return this.overrides.find(
      (override) =>
        override.pattern.test(text) &&
        (override.levelGate === undefined ||
          passesGate(override.levelGate, style, dominantFontSize)),
    )?.level;
  }
}
