import { describe, expect, test } from 'vitest';

import {
  createSettings,
  line,
  page,
  span,
  textLine,
} from '../testing/fixtures';
import { TitleResolver } from './title-resolver';

describe('TitleResolver', () => {
  describe('fragment search', () => {
    const resolver = new TitleResolver(
      createSettings({
        title: {
          fragments: [['RFP: Request for Proposal', 'To Present a Proposal']],
          bannerPhrases: [],
        },
      }),
    );

    test('joins the lines holding every configured fragment', () => {
      const title = resolver.resolve(
        page(0, [
          textLine('RFP: Request for Proposal', 50, { size: 20 }),
          textLine('To Present a Proposal for Developing the Plan', 80, {
            size: 16,
          }),
          textLine('Body text', 300),
        ]),
      );

      expect(title).toBe(
        'RFP: Request for Proposal To Present a Proposal for Developing the Plan',
      );
    });

    test('matches fragments against merged span text', () => {
      const title = resolver.resolve(
        page(0, [
          line(
            span('RFP: Request f', 50, { x: 72, width: 70, size: 20 }),
            span('quest for Proposal', 50, { x: 100, width: 90, size: 20 }),
          ),
          textLine('To Present a Proposal', 80, { size: 16 }),
        ]),
      );

      expect(title).toBe('RFP: Request for Proposal To Present a Proposal');
    });

    test('ignores fragments in the lower half of the page', () => {
      const title = resolver.resolve(
        page(0, [
          textLine('RFP: Request for Proposal', 50, { size: 20 }),
          textLine('To Present a Proposal', 500, { size: 24 }),
        ]),
      );

      expect(title).toBe('To Present a Proposal');
    });

    test('does not match one line for two fragments', () => {
      const title = new TitleResolver(
        createSettings({
          title: {
            fragments: [['RFP: Request', 'Business Plan']],
            bannerPhrases: [],
          },
        }),
      ).resolve(
        page(0, [
          textLine('RFP: Request for the Business Plan', 50, { size: 20 }),
          textLine('Body text', 300),
        ]),
      );

      expect(title).toBe('RFP: Request for the Business Plan');
    });
  });

  describe('largest size fallback', () => {
    const resolver = new TitleResolver(createSettings());

    test('joins distinct largest texts longest first', () => {
      const title = resolver.resolve(
        page(0, [
          textLine('Annual', 50, { size: 24 }),
          textLine('Report on Budget', 80, { size: 24 }),
          textLine('Annual', 110, { size: 24 }),
          textLine('Prepared by the finance team', 200),
        ]),
      );

      expect(title).toBe('Report on Budget Annual');
    });

    test('rejects titles of five characters or fewer', () => {
      expect(
        resolver.resolve(page(0, [textLine('Hello', 50, { size: 24 })])),
      ).toBe('');
      expect(
        resolver.resolve(page(0, [textLine('Hello!', 50, { size: 24 })])),
      ).toBe('Hello!');
    });

    test('rejects titles matching a noise pattern', () => {
      expect(
        resolver.resolve(page(0, [textLine('Page 1 of 3', 50, { size: 24 })])),
      ).toBe('');
    });

    test('returns empty string for a page without text', () => {
      expect(resolver.resolve(page(0, []))).toBe('');
    });
  });

  test('returns empty string without a first page', () => {
    expect(new TitleResolver(createSettings()).resolve(undefined)).toBe('');
  });

  test('suppresses titles containing a banner phrase', () => {
    const resolver = new TitleResolver(
      createSettings({
        title: {
          fragments: [],
          bannerPhrases: ['TOPJUMP', 'TRAMPOLINE PARK'],
        },
      }),
    );

    const title = resolver.resolve(
      page(0, [
        textLine('TOPJUMP', 50, { size: 30 }),
        textLine('TRAMPOLINE PARK', 90, { size: 30 }),
        textLine('Join us for the party', 200),
      ]),
    );

    expect(title).toBe('');
  });
});
