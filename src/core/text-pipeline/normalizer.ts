export const PARAGRAPH_BREAK = '\n\n';
export const LINE_BREAK = '\n';
export const BULLET = '•';

// Stand-ins for brackets the author escaped, so decoded text never forms a tag
const LITERAL_LT = '\uE000';
const LITERAL_GT = '\uE001';

/**
 * Turns escaped-bracket stand-ins in normalized text back into `<` and `>`.
 * Call only once tag parsing is done.
 */
export function restoreLiteralBrackets(s: string): string {
  return s.split(LITERAL_LT).join('<').split(LITERAL_GT).join('>');
}

export interface NormalizedMarkup {
  /**
   * Text using only <strong>, <em>, "\n" and "\n\n" as structure. Escaped
   * brackets are held as stand-ins until {@link restoreLiteralBrackets}.
   */
  text: string;
  ambiguities: string[];
}

const BLOCK_OR_BREAK_TAG = /<\s*\/?\s*(?:p|div|br|li|ul|ol)\b[^>]*>/i;
const CANONICAL_TAG = /^<\/?(?:strong|em)>$/;
const ANY_TAG = /<\/?[a-zA-Z][\w:-]*(?:\s[^<>]*)?\/?>/g;

function stripZeroWidth(s: string): string {
  return s
    .split('\u200B').join('')
    .split('\u200C').join('')
    .split('\u200D').join('')
    .split('\uFEFF').join('');
}

function stripDocumentWrappers(s: string): string {
  return s
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<!DOCTYPE[^>]*>/gi, '')
    .replace(/<head\b[^>]*>[\s\S]*?<\/head\s*>/gi, '')
    .replace(/<style\b[^>]*>[\s\S]*?<\/style\s*>/gi, '')
    .replace(/<script\b[^>]*>[\s\S]*?<\/script\s*>/gi, '')
    .replace(/<\s*\/?\s*(?:html|body)\b[^>]*>/gi, '');
}

function canonicalizeTagSpellings(s: string): string {
  return s
    .replace(/<\s*(?:strong|b)(?:\s[^>]*)?>/gi, '<strong>')
    .replace(/<\s*\/\s*(?:strong|b)\s*>/gi, '</strong>')
    .replace(/<\s*(?:em|i)(?:\s[^>]*)?>/gi, '<em>')
    .replace(/<\s*\/\s*(?:em|i)\s*>/gi, '</em>');
}

function convertHtmlLists(s: string): string {
  const numbered = s.replace(/<ol\b[^>]*>([\s\S]*?)<\/ol\s*>/gi, (_match, inner: string) => {
    let n = 0;
    const items = inner.replace(/<li\b[^>]*>/gi, () => {
      n += 1;
      return `${LINE_BREAK}${n}. `;
    });
    return `${PARAGRAPH_BREAK}${items}${PARAGRAPH_BREAK}`;
  });

  return numbered
    .replace(/<li\b[^>]*>/gi, `${LINE_BREAK}${BULLET} `)
    .replace(/<\/li\s*>/gi, '')
    .replace(/<\s*\/?\s*(?:ul|ol)\b[^>]*>/gi, PARAGRAPH_BREAK);
}

function convertBlocks(s: string): string {
  return s
    .replace(/<\s*\/?\s*(?:p|div)\b[^>]*>/gi, PARAGRAPH_BREAK)
    .replace(/<\s*br\s*\/?\s*>/gi, LINE_BREAK);
}

function canonicalizePlainListMarkers(s: string): string {
  return s.replace(/^[ \t]*[-*•][ \t]+/gm, `${BULLET} `);
}

/**
 * Strong must be rewritten before plain emphasis: run the other way round and
 * "**x**" reads as two empty emphasis spans around "x".
 */
function convertEmphasisNotation(s: string): string {
  return s
    .replace(/\*\*\*(?=\S)([^*\n]+?)\*\*\*/g, '<strong><em>$1</em></strong>')
    .replace(/\*\*(?=\S)(.+?)\*\*/g, '<strong>$1</strong>')
    .replace(/(^|[^\w])__(?=\S)(.+?)__(?!\w)/gm, '$1<strong>$2</strong>')
    .replace(/(?<!\*)\*(?=[^\s*])([^*\n]+?)\*(?!\*)/g, '<em>$1</em>')
    .replace(/(^|[^\w])_(?=[^\s_])([^_\n]+?)_(?!\w)/gm, '$1<em>$2</em>');
}

function removeUnknownTags(s: string): string {
  return s.replace(ANY_TAG, (tag) => (CANONICAL_TAG.test(tag) ? tag : ''));
}

function decodeEntities(s: string): string {
  return s
    .replace(/&nbsp;/gi, ' ')
    .replace(/&lt;/gi, LITERAL_LT)
    .replace(/&gt;/gi, LITERAL_GT)
    .replace(/&quot;/gi, '"')
    .replace(/&(?:#39|apos);/gi, "'")
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(Number(code), match))
    .replace(/&#x([0-9a-f]+);/gi, (match, code: string) => fromCodePoint(parseInt(code, 16), match))
    .replace(/&amp;/gi, '&');
}

function fromCodePoint(code: number, fallback: string): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return fallback;
  if (code === 0x3c) return LITERAL_LT;
  if (code === 0x3e) return LITERAL_GT;
  return String.fromCodePoint(code);
}

function tidyWhitespace(s: string, htmlMode: boolean): string {
  let out = s;
  if (htmlMode) out = out.replace(/[ \t]{2,}/g, ' ');
  return out
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/\n{3,}/g, PARAGRAPH_BREAK)
    .replace(/^\s+|\s+$/g, '');
}

export function findMarkupAmbiguities(text: string): string[] {
  const out: string[] = [];

  if (/\*\*|(?<=\S)\*|\*(?=\S)/.test(text)) {
    out.push("unpaired '*' delimiter kept as text");
  }

  const open: string[] = [];
  for (const match of text.matchAll(/<(\/?)(strong|em)>/g)) {
    const closing = match[1] === '/';
    const tag = match[2] ?? '';
    if (!closing) {
      open.push(tag);
      continue;
    }
    const top = open.lastIndexOf(tag);
    if (top === -1) {
      out.push(`closing </${tag}> without an opening tag`);
    } else {
      if (top !== open.length - 1) out.push(`<${tag}> overlaps <${open[open.length - 1] ?? ''}>`);
      open.splice(top, 1);
    }
  }
  for (const tag of open) out.push(`<${tag}> is never closed`);

  return out;
}

export function normalizeMarkup(input: string): NormalizedMarkup {
  let s = stripZeroWidth(input).replace(/\r\n?/g, '\n');
  s = stripDocumentWrappers(s);

  // In HTML, source newlines are whitespace; structure comes from the tags
  const htmlMode = BLOCK_OR_BREAK_TAG.test(s);
  if (htmlMode) s = s.replace(/[ \t]*\n[ \t]*/g, ' ');

  s = canonicalizeTagSpellings(s);
  s = convertHtmlLists(s);
  s = convertBlocks(s);
  s = canonicalizePlainListMarkers(s);
  s = convertEmphasisNotation(s);
  s = removeUnknownTags(s);
  s = decodeEntities(s);
  s = tidyWhitespace(s, htmlMode);

  return { text: s, ambiguities: findMarkupAmbiguities(s) };
}
