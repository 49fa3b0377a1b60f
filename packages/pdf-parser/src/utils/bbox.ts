import type { LayoutBBox } from '@pdf-outline/model';

/**
 * Smallest box containing every given box. Expects a non-empty list.
 */
export function unionBBox(boxes: LayoutBBox[]): LayoutBBox {
  return boxes.reduce((acc, box) => ({
    x0: Math.min(acc.x0, box.x0),
    y0: Math.min(acc.y0, box.y0),
    x1: Math.max(acc.x1, box.x1),
    y1: Math.max(acc.y1, box.y1),
  }));
}
