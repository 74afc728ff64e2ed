import type { FormattingSegment } from '../../types/receipt.js';

export const DEFAULT_BOLD_KEYWORDS = ['dear', 'donation amount', 'donation(s) year'];

/**
 * Content-based bolding for text whose markup has already been stripped.
 * A paragraph is bold as a whole when it mentions any keyword. It cannot
 * recover the author's real emphasis; it only keeps salutations and amount
 * lines standing out.
 */
export function styleByKeywords(
  plainText: string,
  keywords: readonly string[] = DEFAULT_BOLD_KEYWORDS
): FormattingSegment[] {
  const needles = keywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0);
  const segments: FormattingSegment[] = [];
  let bold = false;

  for (const part of plainText.split(/(\n{2,})/)) {
    if (part.length === 0) continue;
    // Separators keep the previous paragraph's style so they merge into it
    if (!/^\n+$/.test(part)) {
      const lower = part.toLowerCase();
      bold = needles.some((needle) => lower.includes(needle));
    }

    const last = segments[segments.length - 1];
    if (last && last.bold === bold) {
      segments[segments.length - 1] = { text: last.text + part, bold, italic: false };
    } else {
      segments.push({ text: part, bold, italic: false });
    }
  }

  if (segments.length === 0) {
    return [{ text: '', bold: false, italic: false }];
  }
  return segments;
}
