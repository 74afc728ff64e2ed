import { embedFontSet } from '../../fonts/font-set.js';
import { PdfFontMeasurer } from '../../fonts/text-measurer.js';
import { createContentSurface, renderLayout, saveSurface } from '../../pdf/page-renderer.js';
import type { RenderedReceipt, ReceiptJob } from '../../types/output.js';
import type { ReceiptWarning } from '../../types/receipt.js';
import { layoutSegments } from '../layout/line-layout.js';
import { substituteVariables } from '../substitution.js';
import { parseInlineFormatting } from '../text-pipeline/inline-parser.js';
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
 * Full fidelity: the author's bold and italic spans, measured with the fonts
 * actually embedded, composited onto the letterhead.
 */
export class PrimaryStrategy implements ReceiptStrategy {
  readonly name = 'primary';

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
      const segments = parseInlineFormatting(normalized.text);

      const surface = await createContentSurface(context.geometry);
      const fonts = await embedFontSet(surface.document, typography);
      const options = layoutOptionsFor(context);
      const layout = layoutSegments(segments, options, new PdfFontMeasurer(fonts, typography.fontSize));
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
