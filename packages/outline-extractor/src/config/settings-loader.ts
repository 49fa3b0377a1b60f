import type { HeadingLevel } from '@pdf-outline/model';

import { readFileSync } from 'node:fs';

import {
  type HeadingThresholds,
  type OverrideGate,
  type Settings,
  SettingsSchema,
} from './settings-schema';
import { SettingsError } from './settings-error';

/**
 * Override with its pattern compiled
 */
export interface HeadingOverride {
  name: string;
  pattern: RegExp;
  level: HeadingLevel;
  candidate?: OverrideGate;
  levelGate?: OverrideGate;
}

export interface PageOffsetRule {
  match: RegExp;
  offset: number;
}

/**
 * Validated settings with every pattern compiled, ready for the extractor
 */
export interface ExtractorSettings {
  thresholds: HeadingThresholds;

  /**
   * Lower-cased heading keywords
   */
  headingKeywords: string[];

  /**
   * Header/footer noise patterns (case-insensitive)
   */
  noisePatterns: RegExp[];

  maxHeadingsPerPage: number;
  title: {
    fragments: string[][];
    bannerPhrases: string[];
  };
  overrides: HeadingOverride[];
  pageOffsets: PageOffsetRule[];
}

/**
 * SettingsLoader
 *
 * Reads the JSON settings file, validates it with {@link SettingsSchema} and
 * compiles every regular expression it contains.
 */
export class SettingsLoader {
  /**
   * @throws {SettingsError} When the file is missing, is not JSON or fails validation
   */
  static load(path: string): ExtractorSettings {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new SettingsError(`Settings file not found: ${path}`, [], {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SettingsError(`Invalid JSON in settings file: ${path}`, [], {
        cause: error,
      });
    }

    return this.parse(json);
  }

  /**
   * @throws {SettingsError} When the value fails validation
   */
  static parse(value: unknown): ExtractorSettings {
    const result = SettingsSchema.safeParse(value);
    if (!result.success) {
      throw new SettingsError(
        'Invalid settings',
        result.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
        ),
      );
    }

    return this.compile(result.data);
  }

  private static compile(settings: Settings): ExtractorSettings {
    return {
      thresholds: settings.headingDetection,
      headingKeywords: settings.headingKeywords.map((k) => k.toLowerCase()),
      noisePatterns: settings.noisePatterns.map((source, i) =>
        this.compilePattern(source, 'i', `noisePatterns.${i}`),
      ),
      maxHeadingsPerPage: settings.maxHeadingsPerPage,
      title: settings.title,
      overrides: settings.overrides.map((override, i) => ({
        name: override.name,
        pattern: this.compilePattern(
          override.pattern,
          override.flags,
          `overrides.${i}.pattern`,
        ),
        level: override.level,
        candidate: override.candidate,
        levelGate: override.levelGate,
      })),
      pageOffsets: settings.pageOffsets.map((rule, i) => ({
        match: this.compilePattern(rule.match, 'i', `pageOffsets.${i}.match`),
        offset: rule.offset,
      })),
    };
  }

  private static compilePattern(
    source: string,
    flags: string,
    path: string,
  ): RegExp {
    try {
      return new RegExp(source, flags);
    } catch (error) {
      throw new SettingsError(
        'Invalid settings',
        [`${path}: Invalid regular expression "${source}"`],
        { cause: error },
      );
    }
  }
}
