import { describe, it, expect, beforeAll } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { embedStandardFontSet, pickFont, toEncodableText } from '../../src/fonts/font-set.js';
import type { FontSet } from '../../src/fonts/font-set.js';
import { variantFor } from '../../src/fonts/font-variant.js';
import { PdfFontMeasurer } from '../../src/fonts/text-measurer.js';

const regular = { bold: false, italic: false };
const bold = { bold: true, italic: false };

describe('variantFor', () => {
  it('maps style flags to variants', () => {
    expect(variantFor(false, false)).toBe('regular');
    expect(variantFor(true, false)).toBe('bold');
    expect(variantFor(false, true)).toBe('italic');
    expect(variantFor(true, true)).toBe('boldItalic');
  });
});

describe('embedded fonts', () => {
  let fonts: FontSet;

  beforeAll(async () => {
    const document = await PDFDocument.create();
    fonts = await embedStandardFontSet(document, 'Helvetica');
  });

  it('measures with the embedded font', () => {
    const measurer = new PdfFontMeasurer(fonts, 10);
    expect(measurer.widthOf('Dear', regular)).toBeCloseTo(21.67, 2);
  });

  it('measures the unkerned advance that drawText produces', () => {
    const measurer = new PdfFontMeasurer(fonts, 10);
    // A=667, V=667 in Helvetica
    expect(measurer.widthOf('AV', regular)).toBeCloseTo(13.34, 5);
  });

  it('picks the variant for a style', () => {
    expect(pickFont(fonts, bold)).toBe(fonts.bold);
    expect(pickFont(fonts, { bold: true, italic: true })).toBe(fonts.boldItalic);
  });

  it('throws on a character the standard font cannot encode', () => {
    const measurer = new PdfFontMeasurer(fonts, 10);
    expect(() => measurer.widthOf('Paid ✓', regular)).toThrow();
  });

  it('replaces unencodable characters and keeps line breaks', () => {
    expect(toEncodableText('Paid ✓\nthanks', fonts.regular)).toBe('Paid ?\nthanks');
  });
});
