import type { LoggerMethods } from '@pdf-outline/logger';
import type { DocumentOutline } from '@pdf-outline/model';
import type { ExtractOptions } from '@pdf-outline/outline-extractor';

import { ConcurrentPool } from '@pdf-outline/shared';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join, parse } from 'node:path';

import { findPdfFiles } from './pdf-files';

/**
 * Anything that turns a PDF path into an outline
 */
export interface DocumentOutlineSource {
  process(pdfPath: string, options?: ExtractOptions): Promise<DocumentOutline>;
}

export interface BatchRunnerOptions {
  logger: LoggerMethods;
  processor: DocumentOutlineSource;
  outputDir: string;

  /**
   * Documents processed at the same time (default: 1)
   */
  concurrency?: number;

  /**
   * Forces the page offset of every document
   */
  pageOffset?: number;
}

export interface BatchSummary {
  /**
   * Output files written, in input order
   */
  written: string[];

  /**
   * Inputs without an output file
   */
  failed: string[];
}

/**
 * BatchRunner
 *
 * Extracts the outline of every PDF under an input path and writes each one
 * to `<outputDir>/<name>.json`. A document that fails does not stop the batch.
 */
export class BatchRunner {
  private readonly logger: LoggerMethods;

  constructor(private readonly options: BatchRunnerOptions) {
    this.logger = options.logger;
  }

  async run(inputPath: string): Promise<BatchSummary> {
    const files = await findPdfFiles(inputPath);
    if (files.length === 0) {
      this.logger.warn(`[BatchRunner] No PDF files found in ${inputPath}`);
      return { written: [], failed: [] };
    }

    await mkdir(this.options.outputDir, { recursive: true });

    const concurrency = this.options.concurrency ?? 1;
    this.logger.info(
      `[BatchRunner] Processing ${files.length} file(s) with concurrency ${concurrency}`,
    );

    const outcomes = await ConcurrentPool.runSettled(
      files,
      concurrency,
      (file) => this.processFile(file),
    );

    const summary: BatchSummary = { written: [], failed: [] };
    for (const outcome of outcomes) {
      if (outcome.status === 'fulfilled') {
        summary.written.push(outcome.value);
        continue;
      }

      const message =
        outcome.reason instanceof Error
          ? outcome.reason.message
          : String(outcome.reason);
      this.logger.error(
        `[BatchRunner] Failed to write outline for ${outcome.item}: ${message}`,
      );
      summary.failed.push(outcome.item);
    }

    this.logger.info(
      `[BatchRunner] Done: ${summary.written.length} written, ${summary.failed.length} failed`,
    );
    return summary;
  }

  private async processFile(file: string): Promise<string> {
    const outline = await this.options.processor.process(file, {
      pageOffset: this.options.pageOffset,
    });
    if (outline.error !== undefined) {
      this.logger.warn(`[BatchRunner] ${basename(file)}: ${outline.error}`);
    }

    const outputPath = join(this.options.outputDir, `${parse(file).name}.json`);
    await writeFile(outputPath, JSON.stringify(outline, null, 4), 'utf-8');
    this.logger.info(`[BatchRunner] ${basename(file)} -> ${outputPath}`);
    return outputPath;
  }
}
