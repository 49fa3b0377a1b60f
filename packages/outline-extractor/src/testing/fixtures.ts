import type {
  LayoutBBox,
  LayoutDocument,
  LayoutLine,
  LayoutPage,
  LayoutSpan,
} from '@pdf-outline/model';

import type { SettingsInput } from '../config/settings-schema';

import { SettingsLoader } from '../config/settings-loader';

/**
 * Settings input shared by the unit tests
 */
export const createSettingsInput = (
  overrides: Partial<SettingsInput> = {},
): SettingsInput => ({
  headingDetection: {
    fontSizeDifferenceFromDominant: 2,
    boldFontSizeMinRatioToDominant: 0.9,
    maxWordsForBoldHeading: 10,
    maxWordsForAllCapsHeading: 8,
  },
  headingKeywords: ['Introduction', 'Summary', 'Conclusion'],
  noisePatterns: ['^page \\d+( of \\d+)?$', '^confidential$'],
  maxHeadingsPerPage: 4,
  ...overrides,
});

export const createSettings = (overrides: Partial<SettingsInput> = {}) =>
  SettingsLoader.parse(createSettingsInput(overrides));

export interface SpanOptions {
  size?: number;
  bold?: boolean;
  italic?: boolean;
  x?: number;
  width?: number;
}

/**
 * Span whose top edge sits at `y`
 */
export const span = (
  text: string,
  y: number,
  options: SpanOptions = {},
): LayoutSpan => {
  const size = options.size ?? 11;
  const x = options.x ?? 72;
  return {
    text,
    size,
    fontName: options.bold ? 'Arial-BoldMT' : 'ArialMT',
    bold: options.bold ?? false,
    italic: options.italic ?? false,
    bbox: {
      x0: x,
      y0: y,
      x1: x + (options.width ?? text.length * size * 0.5),
      y1: y + size,
    },
  };
};

const union = (boxes: LayoutBBox[]): LayoutBBox => ({
  x0: Math.min(...boxes.map((b) => b.x0)),
  y0: Math.min(...boxes.map((b) => b.y0)),
  x1: Math.max(...boxes.map((b) => b.x1)),
  y1: Math.max(...boxes.map((b) => b.y1)),
});

export const line = (...spans: LayoutSpan[]): LayoutLine => ({
  spans,
  bbox: union(spans.map((s) => s.bbox)),
});

/**
 * Single-span line with its top edge at `y`
 */
export const textLine = (
  text: string,
  y: number,
  options: SpanOptions = {},
): LayoutLine => line(span(text, y, options));

/**
 * Page holding every line in one block
 */
export const page = (
  index: number,
  lines: LayoutLine[],
  height = 800,
): LayoutPage => ({
  index,
  width: 600,
  height,
  blocks:
    lines.length > 0
      ? [{ lines, bbox: union(lines.map((l) => l.bbox)) }]
      : [],
});

export const layoutDocument = (
  pages: LayoutPage[],
  name = 'test.pdf',
): LayoutDocument => ({ name, pages });
