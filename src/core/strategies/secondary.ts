import { embedStandardFontSet } from '../../fonts/font-set.js';
import type { FontSet } from '../../fonts/font-set.js';
import { PdfFontMeasurer } from '../../fonts/text-measurer.js';
import { createContentSurface, renderLayout, saveSurface } from '../../pdf/page-renderer.js';
import type { RenderedReceipt, ReceiptJob } from '../../types/output.js';
import type { LayoutResult, ReceiptWarning } from '../../types/receipt.js';
import { layoutSegments } from '../layout/line-layout.js';
import type { LineLayoutOptions } from '../layout/line-layout.js';
import { substituteVariables } from '../substitution.js';
import { stripInlineTags } from '../text-pipeline/inline-parser.js';
import { styleByKeywords } from '../text-pipeline/keyword-styler.js';
import { normalizeMarkup } from '../text-pipeline/normalizer.js';
import {
  finishReceipt,
  layoutOptionsFor,
  markupWarnings,
  overflowWarnings,
  renderStage,
  substitutionWarnings
} from './shared.js';
import type { ReceiptStrategy, StrategyContext } from './types.js';

/**
 * Lays out normalized text with the author's tags removed and keyword
 * paragraphs in bold, measured with the fonts that will draw it.
 */
export function layoutByKeywords(
  normalizedText: string,
  keywords: readonly string[],
  fonts: FontSet,
  fontSize: number,
  options: LineLayoutOptions
): LayoutResult {
  const segments = styleByKeywords(stripInlineTags(normalizedText), keywords);
  return layoutSegments(segments, options, new PdfFontMeasurer(fonts, fontSize));
}

/**
 * Drops the author's markup and bolds whole paragraphs by keyword. Always
 * uses the standard fonts, so custom font files play no part.
 */
export class SecondaryStrategy implements ReceiptStrategy {
  readonly name = 'secondary';

  async render(job: ReceiptJob, context: StrategyContext): Promise<RenderedReceipt> {
    const { config } = context;
    const { typography } = config;

    const { bytes, warnings } = await renderStage(this.name, async () => {
      const substituted = substituteVariables(job.template, job.record, {
        now: job.now,
        locale: config.locale,
        amountFields: config.amountFields
      });
      const normalized = normalizeMarkup(substituted.text);

      const surface = await createContentSurface(context.geometry);
      const fonts = await embedStandardFontSet(surface.document, typography.fontFamily);
      const options = layoutOptionsFor(context);
      const layout = layoutByKeywords(normalized.text, config.boldKeywords, fonts, typography.fontSize, options);
      renderLayout(surface, layout, fonts, typography);

      const collected: ReceiptWarning[] = [
        ...substitutionWarnings(substituted, context),
        ...markupWarnings(normalized),
        ...overflowWarnings(layout, options, context)
      ];
      return { bytes: await saveSurface(surface), warnings: collected };
    });

    return finishReceipt(bytes, warnings, context);
  }
}
