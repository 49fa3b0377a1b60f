import type { LayoutLine } from '@pdf-outline/model';

/**
 * TitleFragmentMerger
 *
 * Rebuilds the text of title lines whose spans were emitted more than once by
 * the PDF producer (shadowed or overlapping runs). A span that starts before
 * the right edge of the text already placed on its line only contributes the
 * part the line does not hold yet:
 *
 * - "Request f" then an overlapping "quest for" gives "Request for"
 * - an overlapping span whose text is already present is dropped
 *
 * Lines are joined with single spaces, and a word repeated across a line
 * boundary ("Proposal" / "Proposal for ...") is kept once.
 */
export class TitleFragmentMerger {
  merge(lines: LayoutLine[]): string {
    return lines
      .map((line) => this.mergeLine(line))
      .filter((text) => text.length > 0)
      .reduce((merged, text) => this.joinWords(merged, text), '');
  }

  mergeLine(line: LayoutLine): string {
    let text = '';
    let rightEdge = Number.NEGATIVE_INFINITY;

    for (const span of line.spans) {
      if (span.bbox.x0 < rightEdge) {
        if (!text.includes(span.text.trim())) {
          text += span.text.slice(overlapLength(text, span.text));
        }
      } else {
        text += span.text;
      }
      rightEdge = Math.max(rightEdge, span.bbox.x1);
    }

    return collapseWhitespace(text);
  }

  private joinWords(left: string, right: string): string {
    if (left.length === 0) {
      return right;
    }

    const leftWords = left.split(' ');
    const rightWords = right.split(' ');
    if (leftWords[leftWords.length - 1] === rightWords[0]) {
      rightWords.shift();
    }

    return [...leftWords, ...rightWords].join(' ');
  }
}

/**
 * Length of the longest suffix of `text` that is also a prefix of `next`
 */
export function overlapLength(text: string, next: string): number {
  for (let length = Math.min(text.length, next.length); length > 0; length--) {
    if (text.endsWith(next.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
