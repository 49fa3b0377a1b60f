import type { LayoutLine } from '@pdf-outline/model';

/**
 * Numbered heading such as "2 Scope" or "3.1 Budget". A trailing dot
 * ("1. Submit the form") is not accepted: at body size that is a list item.
 */
export const NUMBERED_HEADING_PATTERN = /^\d+(?:\.\d+)*\s+\S/;

/**
 * Section numbering prefix for level depth, with or without a trailing dot
 * ("3.1 Budget", "1. Introduction").
 */
export const SECTION_NUMBER_PATTERN = /^\d+(?:\.\d+)*\.?\s+\S/;

/**
 * Sizes are compared at one decimal so that 11.04 and 10.96 count as 11.0.
 * Exact ties round half to even (10.25 -> 10.2, 10.75 -> 10.8).
 */
export function roundFontSize(size: number): number {
  const scaled = size * 10;
  const floor = Math.floor(scaled);

  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Math.round(scaled) / 10;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * True when the text has at least one cased letter and no lowercase letter.
 * Digits and punctuation do not count either way ("2024 BUDGET" is upper case).
 */
export function isUpperCase(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

/**
 * Concatenated, trimmed text of a line
 */
export function getLineText(line: LayoutLine): string {
  return line.spans
    .map((span) => span.text)
    .join('')
    .trim();
}

export function matchesAnyPattern(text: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}
