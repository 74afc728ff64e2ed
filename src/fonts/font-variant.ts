import { StandardFonts } from 'pdf-lib';
import type { FontFamilyName, FontVariant } from '../types/fonts.js';

export interface RunStyle {
  bold: boolean;
  italic: boolean;
}

export const FONT_VARIANTS: readonly FontVariant[] = ['regular', 'bold', 'italic', 'boldItalic'];

export const STANDARD_FONT_NAMES: Record<FontFamilyName, Record<FontVariant, StandardFonts>> = {
  Helvetica: {
    regular: StandardFonts.Helvetica,
    bold: StandardFonts.HelveticaBold,
    italic: StandardFonts.HelveticaOblique,
    boldItalic: StandardFonts.HelveticaBoldOblique
  },
  'Times-Roman': {
    regular: StandardFonts.TimesRoman,
    bold: StandardFonts.TimesRomanBold,
    italic: StandardFonts.TimesRomanItalic,
    boldItalic: StandardFonts.TimesRomanBoldItalic
  },
  Courier: {
    regular: StandardFonts.Courier,
    bold: StandardFonts.CourierBold,
    italic: StandardFonts.CourierOblique,
    boldItalic: StandardFonts.CourierBoldOblique
  }
};

export function variantFor(bold: boolean, italic: boolean): FontVariant {
  if (bold && italic) return 'boldItalic';
  if (bold) return 'bold';
  if (italic) return 'italic';
  return 'regular';
}

export function variantOf(style: RunStyle): FontVariant {
  return variantFor(style.bold, style.italic);
}
