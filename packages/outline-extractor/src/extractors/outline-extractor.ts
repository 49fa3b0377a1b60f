import type { LoggerMethods } from '@pdf-outline/logger';
import type {
  DocumentOutline,
  LayoutBBox,
  LayoutDocument,
  LayoutLine,
  LayoutPage,
  OutlineEntry,
} from '@pdf-outline/model';

import type { ExtractorSettings } from '../config/settings-loader';
import type { ExtractOptions, HeadingCandidate } from '../types';
import type { ExtractionContext } from './extraction-context';

import { LevelAssigner } from '../assigners/level-assigner';
import { HeadingClassifier } from '../classifiers/heading-classifier';
import { PageCurator } from '../curators/page-curator';
import { OverrideTable } from '../overrides/override-table';
import { StyleProfiler } from '../profilers/style-profiler';
import { TitleResolver } from '../resolvers/title-resolver';
import {
  countWords,
  getLineText,
  matchesAnyPattern,
} from '../utils/text-utils';
import { createDedupKey } from './extraction-context';
import { OutlineExtractError } from './outline-extract-error';

/**
 * Accumulator carried from one line of a page to the next
 */
interface PageFold {
  previousBBox?: LayoutBBox;
  candidates: HeadingCandidate[];
}

/**
 * OutlineExtractor
 *
 * Infers the title and heading outline of a document from its layout.
 *
 * One call profiles the document, resolves the title from the first page and
 * then walks every page that has a logical number of 1 or more. Each line is
 * classified, given a level and deduplicated against everything accepted so
 * far; the page's candidates are then curated.
 *
 * Failures are not partially reported: the result is an empty outline with
 * the error message.
 */
export class OutlineExtractor {
  private readonly profiler = new StyleProfiler();
  private readonly titleResolver: TitleResolver;
  private readonly classifier: HeadingClassifier;
  private readonly assigner: LevelAssigner;
  private readonly curator: PageCurator;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly settings: ExtractorSettings,
  ) {
    const overrides = new OverrideTable(settings.overrides);
    this.titleResolver = new TitleResolver(settings);
    this.classifier = new HeadingClassifier(settings, overrides);
    this.assigner = new LevelAssigner(overrides);
    this.curator = new PageCurator(settings);
  }

  extract(
    document: LayoutDocument,
    options: ExtractOptions = {},
  ): DocumentOutline {
    try {
      const context = this.createContext(document, options);
      this.logger.debug(
        `[OutlineExtractor] ${document.name}: dominant size ${context.profile.dominantFontSize}, page offset ${context.pageOffset}, title "${context.title}"`,
      );

      const outline = document.pages.flatMap((page) =>
        this.extractPage(page, context),
      );
      return { title: context.title, outline };
    } catch (error) {
      const message = OutlineExtractError.getErrorMessage(error);
      this.logger.error(
        `[OutlineExtractor] Failed to extract outline from ${document.name}: ${message}`,
      );
      return { title: '', outline: [], error: message };
    }
  }

  private createContext(
    document: LayoutDocument,
    options: ExtractOptions,
  ): ExtractionContext {
    return {
      profile: this.profiler.profile(document),
      title: this.titleResolver.resolve(document.pages[0]),
      seen: new Set<string>(),
      pageOffset: this.resolvePageOffset(document.name, options),
    };
  }

  private resolvePageOffset(name: string, options: ExtractOptions): number {
    if (options.pageOffset !== undefined) {
      return options.pageOffset;
    }

    const rule = this.settings.pageOffsets.find(({ match }) =>
      match.test(name),
    );
    return rule?.offset ?? 0;
  }

  private extractPage(
    page: LayoutPage,
    context: ExtractionContext,
  ): OutlineEntry[] {
    const pageNumber = page.index + 1 + context.pageOffset;
    if (pageNumber < 1) {
      this.logger.debug(
        `[OutlineExtractor] Skipping physical page ${page.index + 1} (before logical page 1)`,
      );
      return [];
    }

    try {
      const { candidates } = page.blocks
        .flatMap((block) => block.lines)
        .reduce<PageFold>(
          (fold, line) => ({
            previousBBox: line.bbox,
            candidates: this.appendCandidate(
              fold,
              line,
              page,
              pageNumber,
              context,
            ),
          }),
          { candidates: [] },
        );

      const entries = this.curator.curate(
        candidates,
        page,
        pageNumber,
        context.title,
        context.profile,
      );
      this.logger.debug(
        `[OutlineExtractor] Page ${pageNumber}: ${candidates.length} candidate(s), ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`,
      );
      return entries;
    } catch (error) {
      throw OutlineExtractError.fromError(`Page ${page.index + 1}`, error);
    }
  }

  private appendCandidate(
    fold: PageFold,
    line: LayoutLine,
    page: LayoutPage,
    pageNumber: number,
    context: ExtractionContext,
  ): HeadingCandidate[] {
    const text = getLineText(line);
    const [firstSpan] = line.spans;
    if (
      text.length === 0 ||
      !firstSpan ||
      matchesAnyPattern(text, this.settings.noisePatterns)
    ) {
      return fold.candidates;
    }

    const wordCount = countWords(text);
    if (wordCount > this.settings.thresholds.maxWordsForBoldHeading * 2) {
      return fold.candidates;
    }

    const rule = this.classifier.matchRule(
      {
        text,
        span: firstSpan,
        bbox: line.bbox,
        previousBBox: fold.previousBBox,
      },
      context.profile,
    );
    if (rule === null) {
      return fold.candidates;
    }

    // The title repeated as a running header
    if (context.title.length > 0 && text === context.title && page.index > 0) {
      return fold.candidates;
    }

    const level = this.assigner.assign(
      { text, size: firstSpan.size, bold: firstSpan.bold, wordCount },
      context.profile,
    );
    const key = createDedupKey(text, level, pageNumber);
    if (context.seen.has(key)) {
      return fold.candidates;
    }
    context.seen.add(key);

    this.logger.debug(
      `[OutlineExtractor] Page ${pageNumber}: "${text}" -> ${level} (${rule})`,
    );
    return [
      ...fold.candidates,
      { level, text, page: pageNumber, yPosition: line.bbox.y0 },
    ];
  }
}
