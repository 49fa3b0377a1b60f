import { HEADING_LEVELS } from '@pdf-outline/model';
import { z } from 'zod';

/**
 * Minimum prominence a line needs before an override applies.
 *
 * Passes when every hard requirement holds (`requireBold`, `wordLimit`) and
 * either the text is bold (with `boldPasses`) or the size reaches
 * `dominant + minSizeDelta` (strictly above it with `strict`).
 * `minSizeDelta: null` means size alone never passes.
 */
export const OverrideGateSchema = z.object({
  minSizeDelta: z.number().nullable(),
  strict: z.boolean().default(false),
  boldPasses: z.boolean().default(true),
  requireBold: z.boolean().default(false),
  wordLimit: z.number().int().positive().optional(),
});

export const HeadingOverrideSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z
    .string()
    .regex(/^[imsu]*$/, 'Only i, m, s and u flags are allowed')
    .default(''),
  level: z.enum(HEADING_LEVELS),
  candidate: OverrideGateSchema.optional(),
  levelGate: OverrideGateSchema.optional(),
});

export const SettingsSchema = z.object({
  headingDetection: z.object({
    fontSizeDifferenceFromDominant: z.number().nonnegative(),
    boldFontSizeMinRatioToDominant: z.number().positive(),
    maxWordsForBoldHeading: z.number().int().positive(),
    maxWordsForAllCapsHeading: z.number().int().positive(),
  }),
  headingKeywords: z.array(z.string().min(1)),
  noisePatterns: z.array(z.string().min(1)),
  maxHeadingsPerPage: z.number().int().positive().default(4),
  title: z
    .object({
      fragments: z.array(z.array(z.string().min(1)).min(1)).default([]),
      bannerPhrases: z.array(z.string().min(1)).default([]),
    })
    .default({ fragments: [], bannerPhrases: [] }),
  overrides: z.array(HeadingOverrideSchema).default([]),
  pageOffsets: z
    .array(
      z.object({
        match: z.string().min(1),
        offset: z.number().int(),
      }),
    )
    .default([]),
});

export type OverrideGate = z.output<typeof OverrideGateSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type Settings = z.output<typeof SettingsSchema>;
export type HeadingThresholds = Settings['headingDetection'];
