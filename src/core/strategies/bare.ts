import { embedStandardFontSet, toEncodableText } from '../../fonts/font-set.js';
import { PdfFontMeasurer } from '../../fonts/text-measurer.js';
import { createContentSurface, renderLayout, saveSurface } from '../../pdf/page-renderer.js';
import type { RenderedReceipt, ReceiptJob } from '../../types/output.js';
import type { ReceiptWarning } from '../../types/receipt.js';
import { CompositeFailure } from '../errors.js';
import { layoutSegments } from '../layout/line-layout.js';
import { substituteVariables } from '../substitution.js';
import { stripInlineTags } from '../text-pipeline/inline-parser.js';
import { normalizeMarkup } from '../text-pipeline/normalizer.js';
import { finishReceipt, layoutOptionsFor, overflowWarnings, renderStage, substitutionWarnings } from './shared.js';
import type { ReceiptStrategy, StrategyContext } from './types.js';

/**
 * Last resort: unstyled Helvetica, unencodable characters replaced, and the
 * content page written alone if compositing fails.
 */
export class BareStrategy implements ReceiptStrategy {
  readonly name = 'bare';

  private prepareText(job: ReceiptJob, context: StrategyContext, warnings: ReceiptWarning[]): string {
    const { config, logger } = context;

    let text = job.template;
    try {
      const substituted = substituteVariables(job.template, job.record, {
        now: job.now,
        locale: config.locale,
        amountFields: config.amountFields
      });
      warnings.push(...substitutionWarnings(substituted, context));
      text = substituted.text;
    } catch (error) {
      logger.warn('Substitution failed; using the raw template', { error });
    }

    try {
      return stripInlineTags(normalizeMarkup(text).text);
    } catch (error) {
      logger.warn('Markup normalization failed; removing tags only', { error });
      return text.replace(/<[^>]*>/g, '');
    }
  }

  async render(job: ReceiptJob, context: StrategyContext): Promise<RenderedReceipt> {
    const { typography } = context.config;
    const warnings: ReceiptWarning[] = [];

    const bytes = await renderStage(this.name, async () => {
      const plain = this.prepareText(job, context, warnings);

      const surface = await createContentSurface(context.geometry);
      const fonts = await embedStandardFontSet(surface.document, 'Helvetica');
      const segments = [{ text: toEncodableText(plain.replace(/\t/g, ' '), fonts.regular), bold: false, italic: false }];
      const options = layoutOptionsFor(context);
      const layout = layoutSegments(segments, options, new PdfFontMeasurer(fonts, typography.fontSize));
      renderLayout(surface, layout, fonts, typography);
      warnings.push(...overflowWarnings(layout, options, context));
      return saveSurface(surface);
    });

    try {
      return await finishReceipt(bytes, warnings, context);
    } catch (error) {
      if (!(error instanceof CompositeFailure)) throw error;
      context.logger.warn('Letterhead compositing failed; writing the content page alone', { error });
      return { bytes, letterheadPath: null, warnings };
    }
  }
}
