import type { FormattingSegment } from '../../types/receipt.js';
import { restoreLiteralBrackets } from './normalizer.js';

const INLINE_TAG = /<\s*(\/?)\s*(strong|b|em|i)(?:\s[^>]*)?\s*>/gi;

function isBoldTag(name: string): boolean {
  const lower = name.toLowerCase();
  return lower === 'strong' || lower === 'b';
}

/**
 * Splits text carrying <strong>/<b> and <em>/<i> tags into styled runs.
 *
 * Nesting is tracked with depth counters, so `<b><b>x</b>y</b>` keeps "y" bold
 * and a stray closing tag is ignored. Tags left open style the rest of the
 * text. Adjacent runs with the same style are merged. Escaped brackets from
 * the normalizer come out as plain `<` and `>`.
 */
export function parseInlineFormatting(text: string): FormattingSegment[] {
  const segments: FormattingSegment[] = [];
  let boldDepth = 0;
  let italicDepth = 0;
  let cursor = 0;

  const emit = (raw: string): void => {
    if (raw.length === 0) return;
    const chunk = restoreLiteralBrackets(raw);
    const bold = boldDepth > 0;
    const italic = italicDepth > 0;
    const last = segments[segments.length - 1];
    if (last && last.bold === bold && last.italic === italic) {
      segments[segments.length - 1] = { text: last.text + chunk, bold, italic };
    } else {
      segments.push({ text: chunk, bold, italic });
    }
  };

  for (const match of text.matchAll(INLINE_TAG)) {
    const index = match.index ?? 0;
    emit(text.slice(cursor, index));
    cursor = index + match[0].length;

    const closing = match[1] === '/';
    const bold = isBoldTag(match[2] ?? '');
    if (bold) {
      boldDepth = closing ? Math.max(0, boldDepth - 1) : boldDepth + 1;
    } else {
      italicDepth = closing ? Math.max(0, italicDepth - 1) : italicDepth + 1;
    }
  }
  emit(text.slice(cursor));

  if (segments.length === 0) {
    return [{ text: '', bold: false, italic: false }];
  }
  return segments;
}

export function stripInlineTags(text: string): string {
  return restoreLiteralBrackets(text.replace(INLINE_TAG, ''));
}

export function segmentsToPlainText(segments: readonly FormattingSegment[]): string {
  return segments.map((s) => s.text).join('');
}
