import { resolveConfig } from './config/schema.js';
import { TotalFailure } from './core/errors.js';
import { FallbackChainController, donorLabel } from './core/fallback-chain.js';
import { LETTERHEAD_MARGINS, PLAIN_MARGINS } from './core/layout/geometry.js';
import type { ReceiptStrategy } from './core/strategies/index.js';
import type {
  BatchSummary,
  CompositorConfig,
  CompositorPreset,
  DonorRecord,
  ProgressCallback,
  ReceiptResult,
  ResolvedCompositorConfig,
  StrategyName
} from './types/index.js';

// Convenience configuration presets
export const ConfigPresets = {
  /**
   * Printed letterhead behind the text
   * Wide top and left margins keep clear of the masthead and sidebar
   */
  letterhead: {
    letterhead: { enabled: true },
    page: { size: 'LETTER', margins: LETTERHEAD_MARGINS }
  },

  /**
   * Plain page, one-inch margins all round
   */
  plain: {
    letterhead: { enabled: false },
    page: { size: 'LETTER', margins: PLAIN_MARGINS }
  }
} satisfies Record<string, CompositorPreset>;

export class ReceiptCompositor {
  private config: CompositorConfig;
  private resolved: ResolvedCompositorConfig;
  private strategies: ReceiptStrategy[] | undefined;

  constructor(config: CompositorConfig, strategies?: ReceiptStrategy[]) {
    this.config = { ...config };
    this.resolved = resolveConfig(this.config);
    this.strategies = strategies;
  }

  private update(patch: Partial<CompositorConfig>): this {
    const next = { ...this.config, ...patch };
    this.resolved = resolveConfig(next);
    this.config = next;
    return this;
  }

  get options(): Readonly<ResolvedCompositorConfig> {
    return this.resolved;
  }

  setOutputDir(outputDir: string): this {
    return this.update({ outputDir });
  }

  setOrganizationName(organizationName: string | undefined): this {
    return this.update({ organizationName });
  }

  setLetterheadPath(path: string | undefined): this {
    return this.update({ letterhead: { ...this.config.letterhead, path } });
  }

  setStrategies(strategies: StrategyName[]): this {
    return this.update({ strategies });
  }

  // Apply a preset configuration
  applyPreset(preset: keyof typeof ConfigPresets): this {
    const presetConfig = ConfigPresets[preset];
    return this.update({
      letterhead: { ...this.config.letterhead, ...presetConfig.letterhead },
      page: { ...presetConfig.page }
    });
  }

  async generateReceipt(record: DonorRecord, template: string): Promise<ReceiptResult> {
    const controller = new FallbackChainController(this.resolved, this.strategies);
    return controller.generate({ record, template, now: this.resolved.clock() });
  }

  /**
   * Generates one receipt per donor, in order. A donor for whom every tier
   * fails is counted and skipped; the batch carries on.
   */
  async generateBatch(
    records: readonly DonorRecord[],
    template: string,
    progressCallback?: ProgressCallback
  ): Promise<BatchSummary> {
    const summary: BatchSummary = { generated: 0, failed: 0, results: [], failures: [] };
    const controller = new FallbackChainController(this.resolved, this.strategies);
    const { logger } = this.resolved;

    for (const [index, record] of records.entries()) {
      const donor = donorLabel(record);
      try {
        const result = await controller.generate({ record, template, now: this.resolved.clock() });
        summary.results.push(result);
        summary.generated += 1;
        progressCallback?.({ completed: index + 1, total: records.length, donor, ok: true });
      } catch (error) {
        if (!(error instanceof TotalFailure)) throw error;
        summary.failures.push({ index, donor, error: error.message });
        summary.failed += 1;
        progressCallback?.({ completed: index + 1, total: records.length, donor, ok: false });
      }
    }

    logger.info('Receipt batch finished', { generated: summary.generated, failed: summary.failed });
    return summary;
  }
}

export async function generateReceipt(
  config: CompositorConfig,
  record: DonorRecord,
  template: string
): Promise<ReceiptResult> {
  return new ReceiptCompositor(config).generateReceipt(record, template);
}

export { resolveConfig, compositorConfigSchema } from './config/schema.js';
export * from './types/index.js';
export * from './core/index.js';
export * from './fonts/index.js';
export * from './pdf/index.js';
export { createLogger, silentLogger, logger, LogLevel } from './utils/logger.js';
export type { Logger, LogEntry, LogSink, LoggerOptions } from './utils/logger.js';
