import { pickFont } from './font-set.js';
import type { FontSet } from './font-set.js';
import type { RunStyle } from './font-variant.js';

export interface TextMeasurer {
  /** Advance width in points of `text` drawn in `style` */
  widthOf(text: string, style: RunStyle): number;
}

/**
 * Widths from the fonts embedded in the document, summed per character:
 * drawn text carries no kerning, so whole-string widths can come out short.
 * Throws when a standard font cannot encode a character.
 */
export class PdfFontMeasurer implements TextMeasurer {
  constructor(
    private readonly fonts: FontSet,
    private readonly fontSize: number
  ) {}

  widthOf(text: string, style: RunStyle): number {
    const font = pickFont(this.fonts, style);
    let width = 0;
    for (const ch of text) width += font.widthOfTextAtSize(ch, this.fontSize);
    return width;
  }
}
