import type { LoggerMethods } from '@pdf-outline/logger';
import type { LayoutDocument, LayoutPage } from '@pdf-outline/model';
import type {
  PDFDocumentProxy,
  PDFPageProxy,
  TextContent,
  TextItem,
} from 'pdfjs-dist/types/src/display/api';

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Util, getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { TextRun } from '../types/text-run';

import { PDF_LAYOUT_READER } from '../config/constants';
import { PdfLayoutReadError } from '../errors/pdf-layout-read-error';
import {
  LineAssembler,
  type LineAssemblerOptions,
} from '../processors/line-assembler';

export type PdfLayoutReaderOptions = LineAssemblerOptions;

/**
 * PdfLayoutReader - reads the typographic layout of a PDF with pdfjs-dist.
 *
 * Every text item becomes a run in viewport space (top-left origin), and
 * runs are assembled into blocks, lines and spans. The reader never
 * interprets the text; it only reports what is drawn where, and in which font.
 *
 * Image-only pages yield pages without blocks.
 */
export class PdfLayoutReader {
  private readonly assembler: LineAssembler;

  constructor(
    private readonly logger: LoggerMethods,
    options?: PdfLayoutReaderOptions,
  ) {
    this.assembler = new LineAssembler(options);
  }

  /**
   * Read a PDF file from disk
   *
   * @throws {PdfLayoutReadError} When the file cannot be read or parsed
   */
  async read(pdfPath: string): Promise<LayoutDocument> {
    this.logger.debug(`[PdfLayoutReader] Reading ${pdfPath}`);

    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(pdfPath));
    } catch (error) {
      throw PdfLayoutReadError.fromError(pdfPath, error);
    }

    return this.readData(data, basename(pdfPath));
  }

  /**
   * Read a PDF held in memory
   *
   * @param name - Document name reported in the layout and in errors
   * @throws {PdfLayoutReadError} When the data cannot be parsed
   */
  async readData(data: Uint8Array, name: string): Promise<LayoutDocument> {
    let document: PDFDocumentProxy;
    try {
      document = await getDocument({
        data,
        useSystemFonts: true,
        fontExtraProperties: true,
        isEvalSupported: false,
        verbosity: PDF_LAYOUT_READER.VERBOSITY,
      }).promise;
    } catch (error) {
      throw PdfLayoutReadError.fromError(name, error);
    }

    try {
      const pages: LayoutPage[] = [];
      for (let index = 0; index < document.numPages; index++) {
        const page = await document.getPage(index + 1);
        pages.push(await this.readPage(page, index));
      }

      this.logger.debug(
        `[PdfLayoutReader] Read ${pages.length} pages from ${name}`,
      );
      return { name, pages };
    } catch (error) {
      throw PdfLayoutReadError.fromError(name, error);
    } finally {
      await document.destroy();
    }
  }

  private async readPage(
    page: PDFPageProxy,
    index: number,
  ): Promise<LayoutPage> {
    const viewport = page.getViewport({ scale: 1 });
    const content = await page.getTextContent();
    // Fonts land in commonObjs only once the operator list has been built
    await page.getOperatorList();

    const fontNames = new Map<string, string>();
    const runs: TextRun[] = [];

    for (const item of content.items) {
      if (!('str' in item)) {
        continue;
      }

      let fontName = fontNames.get(item.fontName);
      if (fontName === undefined) {
        fontName = this.resolveFontName(page, item.fontName, content.styles);
        fontNames.set(item.fontName, fontName);
      }

      runs.push(this.toRun(item, viewport.transform, fontName));
    }

    return {
      index,
      width: viewport.width,
      height: viewport.height,
      blocks: this.assembler.assemble(runs),
    };
  }

  private toRun(
    item: TextItem,
    viewportTransform: number[],
    fontName: string,
  ): TextRun {
    const [, , c, d, e, f] = Util.transform(viewportTransform, item.transform);

    return {
      text: item.str,
      x: e,
      baselineY: f,
      width: item.width,
      size: Math.hypot(c, d) || item.height,
      fontName,
      hasEOL: item.hasEOL,
    };
  }

  /**
   * Prefer the embedded font name (e.g. "ABCDEF+Arial-BoldMT"); fall back to
   * the style's font family, then to the internal font id.
   */
  private resolveFontName(
    page: PDFPageProxy,
    fontId: string,
    styles: TextContent['styles'],
  ): string {
    if (page.commonObjs.has(fontId)) {
      const font: unknown = page.commonObjs.get(fontId);
      if (
        typeof font === 'object' &&
        font !== null &&
        'name' in font &&
        typeof font.name === 'string'
      ) {
        return font.name;
      }
    }

    return styles[fontId]?.fontFamily ?? fontId;
  }
}
