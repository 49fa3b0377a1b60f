import type {
  LayoutBlock,
  LayoutLine,
  LayoutSpan,
} from '@pdf-outline/model';

import type { TextRun } from '../types/text-run';

import { LINE_ASSEMBLER } from '../config/constants';
import { unionBBox } from '../utils/bbox';
import { detectFontStyle } from '../utils/font-style';

export interface LineAssemblerOptions {
  /**
   * Vertical gap, as a fraction of the previous line height, that starts a
   * new block (default: 1.0)
   */
  blockGapRatio?: number;
}

/**
 * LineAssembler
 *
 * Turns the flat run sequence of one page into blocks of lines of spans.
 *
 * - A run following an end-of-line marker, or whose baseline moved by more
 *   than half its size, starts a new line.
 * - Whitespace-only runs are folded into the previous span as a single space.
 * - A vertical gap larger than `blockGapRatio` times the previous line height
 *   starts a new block.
 */
export class LineAssembler {
  private readonly blockGapRatio: number;

  constructor(options?: LineAssemblerOptions) {
    this.blockGapRatio =
      options?.blockGapRatio ?? LINE_ASSEMBLER.DEFAULT_BLOCK_GAP_RATIO;
  }

  assemble(runs: TextRun[]): LayoutBlock[] {
    return this.groupBlocks(this.groupLines(runs));
  }

  groupLines(runs: TextRun[]): LayoutLine[] {
    const lines: LayoutLine[] = [];
    let spans: LayoutSpan[] = [];
    let baseline: number | null = null;
    let breakPending = false;

    const flush = (): void => {
      if (spans.length > 0) {
        lines.push({ spans, bbox: unionBBox(spans.map((s) => s.bbox)) });
      }
      spans = [];
      baseline = null;
    };

    for (const run of runs) {
      if (breakPending) {
        flush();
        breakPending = false;
      }

      const previous = spans.at(-1);

      if (run.text.trim() === '') {
        if (previous && run.text.length > 0 && !/\s$/.test(previous.text)) {
          previous.text += ' ';
        }
        breakPending = run.hasEOL;
        continue;
      }

      if (
        baseline !== null &&
        Math.abs(run.baselineY - baseline) >
          run.size * LINE_ASSEMBLER.BASELINE_TOLERANCE_RATIO
      ) {
        flush();
      }

      const last = spans.at(-1);
      if (
        last &&
        !/\s$/.test(last.text) &&
        !/^\s/.test(run.text) &&
        run.x - last.bbox.x1 > run.size * LINE_ASSEMBLER.WORD_GAP_RATIO
      ) {
        last.text += ' ';
      }

      spans.push(this.toSpan(run));
      baseline ??= run.baselineY;
      breakPending = run.hasEOL;
    }
    flush();

    return lines;
  }

  groupBlocks(lines: LayoutLine[]): LayoutBlock[] {
    const blocks: LayoutBlock[] = [];
    let current: LayoutLine[] = [];

    for (const line of lines) {
      const previous = current.at(-1);
      if (previous) {
        const gap = line.bbox.y0 - previous.bbox.y1;
        const height = previous.bbox.y1 - previous.bbox.y0;
        if (gap > height * this.blockGapRatio) {
          blocks.push(this.toBlock(current));
          current = [];
        }
      }
      current.push(line);
    }

    if (current.length > 0) {
      blocks.push(this.toBlock(current));
    }

    return blocks;
  }

  private toSpan(run: TextRun): LayoutSpan {
    return {
      text: run.text,
      size: run.size,
      fontName: run.fontName,
      ...detectFontStyle(run.fontName),
      bbox: {
        x0: run.x,
        y0: run.baselineY - run.size,
        x1: run.x + run.width,
        y1: run.baselineY + run.size * LINE_ASSEMBLER.DESCENT_RATIO,
      },
    };
  }

  private toBlock(lines: LayoutLine[]): LayoutBlock {
    return { lines, bbox: unionBBox(lines.map((l) => l.bbox)) };
  }
}
