const BOLD_MARKERS = ['bold', 'black', 'heavy'] as const;
const ITALIC_MARKERS = ['italic', 'oblique'] as const;

export interface FontStyle {
  bold: boolean;
  italic: boolean;
}

/**
 * Derive weight and slant from a font name such as "ABCDEF+Arial-BoldItalicMT".
 */
export function detectFontStyle(fontName: string): FontStyle {
  const name = fontName.toLowerCase();
  return {
    bold: BOLD_MARKERS.some((marker) => name.includes(marker)),
    italic: ITALIC_MARKERS.some((marker) => name.includes(marker)),
  };
}
