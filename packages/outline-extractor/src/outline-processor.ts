import type { LoggerMethods } from '@pdf-outline/logger';
import type { DocumentOutline, LayoutDocument } from '@pdf-outline/model';

import type { ExtractorSettings } from './config/settings-loader';
import type { ExtractOptions } from './types';

import { PdfLayoutReader } from '@pdf-outline/pdf-parser';

import { OutlineExtractError } from './extractors/outline-extract-error';
import { OutlineExtractor } from './extractors/outline-extractor';

/**
 * Source of document layouts
 */
export interface LayoutReader {
  read(pdfPath: string): Promise<LayoutDocument>;
}

/**
 * OutlineProcessor Options
 */
export interface OutlineProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Loaded extractor settings (see `SettingsLoader`)
   */
  settings: ExtractorSettings;

  /**
   * Layout source (default: `PdfLayoutReader`)
   */
  layoutReader?: LayoutReader;
}

/**
 * OutlineProcessor
 *
 * Reads a PDF and extracts its outline. Never rejects: a document that cannot
 * be read or processed yields an empty outline with the error message.
 *
 * @example
 * ```typescript
 * import { Logger } from '@pdf-outline/logger';
 * import { OutlineProcessor, SettingsLoader } from '@pdf-outline/outline-extractor';
 *
 * const processor = new OutlineProcessor({
 *   logger: new Logger(console),
 *   settings: SettingsLoader.load('config/settings.json'),
 * });
 *
 * const { title, outline } = await processor.process('report.pdf');
 * ```
 */
export class OutlineProcessor {
  private readonly logger: LoggerMethods;
  private readonly layoutReader: LayoutReader;
  private readonly extractor: OutlineExtractor;

  constructor(options: OutlineProcessorOptions) {
    this.logger = options.logger;
    this.layoutReader =
      options.layoutReader ?? new PdfLayoutReader(options.logger);
    this.extractor = new OutlineExtractor(options.logger, options.settings);
  }

  async process(
    pdfPath: string,
    options: ExtractOptions = {},
  ): Promise<DocumentOutline> {
    this.logger.info(`[OutlineProcessor] Processing ${pdfPath}`);

    let document: LayoutDocument;
    try {
      document = await this.layoutReader.read(pdfPath);
    } catch (error) {
      const message = OutlineExtractError.getErrorMessage(error);
      this.logger.error(`[OutlineProcessor] ${message}`);
      return { title: '', outline: [], error: message };
    }

    const result = this.extractor.extract(document, options);
    if (result.error === undefined) {
      this.logger.info(
        `[OutlineProcessor] ${document.name}: ${document.pages.length} page(s), ${result.outline.length} heading(s)`,
      );
    }
    return result;
  }
}
