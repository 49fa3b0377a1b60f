import { describe, expect, test } from 'vitest';

import { line, span } from '../testing/fixtures';
import {
  NUMBERED_HEADING_PATTERN,
  SECTION_NUMBER_PATTERN,
  countWords,
  getLineText,
  isUpperCase,
  matchesAnyPattern,
  roundFontSize,
} from './text-utils';

describe('text-utils', () => {
  describe('roundFontSize', () => {
    test('rounds to one decimal', () => {
      expect(roundFontSize(11.04)).toBe(11);
      expect(roundFontSize(10.96)).toBe(11);
      expect(roundFontSize(13.96)).toBe(14);
      expect(roundFontSize(9.34)).toBe(9.3);
    });

    test('rounds exact ties to the even digit', () => {
      expect(roundFontSize(10.25)).toBe(10.2);
      expect(roundFontSize(10.75)).toBe(10.8);
      expect(roundFontSize(12.5)).toBe(12.5);
    });
  });

  describe('countWords', () => {
    test('counts whitespace separated tokens', () => {
      expect(countWords('Project  scope\tand goals')).toBe(4);
      expect(countWords('  ')).toBe(0);
      expect(countWords('')).toBe(0);
    });
  });

  describe('isUpperCase', () => {
    test('requires a cased letter and no lowercase letters', () => {
      expect(isUpperCase('BACKGROUND')).toBe(true);
      expect(isUpperCase('2024 BUDGET:')).toBe(true);
      expect(isUpperCase('Background')).toBe(false);
      expect(isUpperCase('2024')).toBe(false);
      expect(isUpperCase('')).toBe(false);
    });
  });

  describe('NUMBERED_HEADING_PATTERN', () => {
    test('matches numbered headings without a trailing dot', () => {
      expect(NUMBERED_HEADING_PATTERN.test('1 Scope')).toBe(true);
      expect(NUMBERED_HEADING_PATTERN.test('2.3.1 Data sources')).toBe(true);
    });

    test('rejects trailing-dot list items', () => {
      expect(NUMBERED_HEADING_PATTERN.test('1. Submit the form')).toBe(false);
      expect(NUMBERED_HEADING_PATTERN.test('3.1. Budget')).toBe(false);
    });

    test('rejects bare numbers and unspaced text', () => {
      expect(NUMBERED_HEADING_PATTERN.test('12')).toBe(false);
      expect(NUMBERED_HEADING_PATTERN.test('1.Introduction')).toBe(false);
      expect(NUMBERED_HEADING_PATTERN.test('Section 1')).toBe(false);
    });
  });

  describe('SECTION_NUMBER_PATTERN', () => {
    test('matches section numbers with and without trailing dot', () => {
      expect(SECTION_NUMBER_PATTERN.test('1 Scope')).toBe(true);
      expect(SECTION_NUMBER_PATTERN.test('1. Introduction')).toBe(true);
      expect(SECTION_NUMBER_PATTERN.test('3.1. Budget')).toBe(true);
    });

    test('rejects bare numbers and unspaced text', () => {
      expect(SECTION_NUMBER_PATTERN.test('12')).toBe(false);
      expect(SECTION_NUMBER_PATTERN.test('1.Introduction')).toBe(false);
    });
  });

  describe('getLineText', () => {
    test('joins spans without separator and trims', () => {
      expect(getLineText(line(span(' 3.1 ', 0), span('Budget ', 0)))).toBe(
        '3.1 Budget',
      );
    });
  });

  describe('matchesAnyPattern', () => {
    test('returns true when any pattern matches', () => {
      expect(matchesAnyPattern('Page 2', [/^x$/, /^page \d+$/i])).toBe(true);
      expect(matchesAnyPattern('Budget', [/^page \d+$/i])).toBe(false);
      expect(matchesAnyPattern('Budget', [])).toBe(false);
    });
  });
});
