import { readFile } from 'node:fs/promises';
import fontkitImport from '@pdf-lib/fontkit';
import type { PDFDocument, PDFFont } from 'pdf-lib';
import type { FontFamilyName, FontFiles, FontVariant } from '../types/fonts.js';
import { FONT_VARIANTS, STANDARD_FONT_NAMES, variantOf } from './font-variant.js';
import type { RunStyle } from './font-variant.js';

export type FontSet = Record<FontVariant, PDFFont>;

export interface FontSetOptions {
  fontFamily: FontFamilyName;
  /** TrueType/OpenType files; when absent the standard-14 family is used */
  fontFiles?: FontFiles;
}

type Fontkit = Parameters<PDFDocument['registerFontkit']>[0];

function isFontkit(value: unknown): value is Fontkit {
  return typeof value === 'object' && value !== null && 'create' in value && typeof value.create === 'function';
}

// The package is a UMD bundle; depending on the loader the API sits on the
// module itself or on its default export.
export function loadFontkit(): Fontkit {
  const candidate: unknown = fontkitImport;
  if (isFontkit(candidate)) return candidate;
  if (typeof candidate === 'object' && candidate !== null && 'default' in candidate && isFontkit(candidate.default)) {
    return candidate.default;
  }
  throw new Error('@pdf-lib/fontkit did not expose a fontkit instance');
}

export async function embedStandardFontSet(document: PDFDocument, family: FontFamilyName): Promise<FontSet> {
  const names = STANDARD_FONT_NAMES[family];
  const [regular, bold, italic, boldItalic] = await Promise.all(
    FONT_VARIANTS.map((variant) => document.embedFont(names[variant]))
  );
  if (!regular || !bold || !italic || !boldItalic) {
    throw new Error(`Could not embed the ${family} font family`);
  }
  return { regular, bold, italic, boldItalic };
}

async function embedFontFiles(document: PDFDocument, files: FontFiles): Promise<FontSet> {
  document.registerFontkit(loadFontkit());

  // Variants without their own file reuse the regular face
  const cache = new Map<string, Promise<PDFFont>>();
  const embed = (path: string): Promise<PDFFont> => {
    let pending = cache.get(path);
    if (!pending) {
      pending = readFile(path).then((bytes) => document.embedFont(bytes, { subset: true }));
      cache.set(path, pending);
    }
    return pending;
  };

  const [regular, bold, italic, boldItalic] = await Promise.all([
    embed(files.regular),
    embed(files.bold ?? files.regular),
    embed(files.italic ?? files.regular),
    embed(files.boldItalic ?? files.bold ?? files.regular)
  ]);
  return { regular, bold, italic, boldItalic };
}

export async function embedFontSet(document: PDFDocument, options: FontSetOptions): Promise<FontSet> {
  if (options.fontFiles) {
    return embedFontFiles(document, options.fontFiles);
  }
  return embedStandardFontSet(document, options.fontFamily);
}

export function pickFont(fonts: FontSet, style: RunStyle): PDFFont {
  return fonts[variantOf(style)];
}

const characterSets = new WeakMap<PDFFont, Set<number>>();

function characterSetOf(font: PDFFont): Set<number> {
  let set = characterSets.get(font);
  if (!set) {
    set = new Set(font.getCharacterSet());
    characterSets.set(font, set);
  }
  return set;
}

/**
 * Replaces every character the font cannot encode with `replacement`.
 * Line breaks are kept; layout consumes them before drawing.
 */
export function toEncodableText(text: string, font: PDFFont, replacement = '?'): string {
  const supported = characterSetOf(font);
  let out = '';
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    out += ch === '\n' || supported.has(code) ? ch : replacement;
  }
  return out;
}
