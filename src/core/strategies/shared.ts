import { compositeOnLetterheadFile } from '../../pdf/letterhead-compositor.js';
import { ReceiptError, RenderFailure } from '../errors.js';
import { contentBox } from '../layout/geometry.js';
import type { LineLayoutOptions } from '../layout/line-layout.js';
import type { SubstitutionResult } from '../substitution.js';
import type { NormalizedMarkup } from '../text-pipeline/normalizer.js';
import type { RenderedReceipt } from '../../types/output.js';
import type { LayoutResult, ReceiptWarning, StrategyName } from '../../types/receipt.js';
import type { StrategyContext } from './types.js';

export function layoutOptionsFor(context: StrategyContext): LineLayoutOptions {
  const box = contentBox(context.geometry);
  const { typography } = context.config;
  return {
    contentWidth: box.width,
    contentHeight: box.height,
    lineHeight: typography.lineHeight,
    paragraphGap: typography.paragraphGap,
    listIndent: typography.listIndent
  };
}

export function substitutionWarnings(result: SubstitutionResult, context: StrategyContext): ReceiptWarning[] {
  if (result.unresolved.length === 0) return [];
  context.logger.warn('Template placeholders left unresolved', { placeholders: result.unresolved });
  return [{ kind: 'SubstitutionWarning', placeholders: result.unresolved }];
}

export function markupWarnings(normalized: NormalizedMarkup): ReceiptWarning[] {
  if (normalized.ambiguities.length === 0) return [];
  return [{ kind: 'MarkupAmbiguity', details: normalized.ambiguities }];
}

export function overflowWarnings(layout: LayoutResult, options: LineLayoutOptions, context: StrategyContext): ReceiptWarning[] {
  if (!layout.overflowed) return [];
  context.logger.warn('Receipt text runs past the bottom margin', {
    contentHeight: layout.contentHeight,
    availableHeight: options.contentHeight
  });
  return [{ kind: 'LayoutOverflow', contentHeight: layout.contentHeight, availableHeight: options.contentHeight }];
}

/**
 * Runs the layout and drawing steps of a tier. Anything that is not already a
 * receipt error becomes a RenderFailure for that tier.
 */
export async function renderStage<T>(strategy: StrategyName, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof ReceiptError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderFailure(strategy, `${strategy} rendering failed: ${message}`, { cause: error });
  }
}

export async function finishReceipt(
  contentBytes: Uint8Array,
  warnings: ReceiptWarning[],
  context: StrategyContext
): Promise<RenderedReceipt> {
  if (!context.letterheadPath) {
    return { bytes: contentBytes, letterheadPath: null, warnings };
  }
  const bytes = await compositeOnLetterheadFile(contentBytes, context.letterheadPath);
  return { bytes, letterheadPath: context.letterheadPath, warnings };
}
