import { letterheadCandidates, locateLetterhead } from '../pdf/letterhead-locator.js';
import { DEFAULT_RECEIPT_PREFIX, buildReceiptFileName, receiptPrefix, writeReceipt } from '../pdf/receipt-writer.js';
import type { ResolvedCompositorConfig } from '../types/config.js';
import type { ReceiptJob, ReceiptResult } from '../types/output.js';
import type { DonorRecord, ReceiptWarning, StrategyName } from '../types/receipt.js';
import { CompositeFailure, TotalFailure, describeAttempt } from './errors.js';
import type { StrategyAttempt } from './errors.js';
import { resolvePageGeometry } from './layout/geometry.js';
import { defaultStrategies } from './strategies/index.js';
import type { ReceiptStrategy } from './strategies/index.js';
import { stringifyDonorValue } from './substitution.js';

interface LocatedLetterhead {
  path: string | null;
  warnings: ReceiptWarning[];
}

export function donorLabel(record: DonorRecord): string {
  const name = `${stringifyDonorValue(record['First Name'])} ${stringifyDonorValue(record['Last Name'])}`.trim();
  return name || 'unknown donor';
}

/**
 * Tries each configured tier in order until one produces a file. A failed
 * letterhead merge skips the remaining styled tiers and goes straight to
 * bare, which then writes without the letterhead.
 */
export class FallbackChainController {
  private strategies: Map<StrategyName, ReceiptStrategy>;

  constructor(
    private config: ResolvedCompositorConfig,
    strategies: ReceiptStrategy[] = defaultStrategies()
  ) {
    this.strategies = new Map(strategies.map((s) => [s.name, s]));
  }

  private async findLetterhead(): Promise<LocatedLetterhead> {
    const { letterhead, logger } = this.config;
    if (!letterhead.enabled) return { path: null, warnings: [] };

    const candidates = letterheadCandidates(letterhead);
    const path = await locateLetterhead(candidates, logger);
    if (path) return { path, warnings: [] };

    logger.warn('No letterhead found; receipts will be written without one', { candidates });
    return { path: null, warnings: [{ kind: 'LetterheadMissing', candidates }] };
  }

  private prefixFor(strategy: StrategyName): string {
    return strategy === 'bare' ? DEFAULT_RECEIPT_PREFIX : receiptPrefix(this.config.organizationName);
  }

  async generate(job: ReceiptJob): Promise<ReceiptResult> {
    const { logger } = this.config;
    const donor = donorLabel(job.record);
    const geometry = resolvePageGeometry(this.config.page.size, this.config.page.margins);
    const located = await this.findLetterhead();
    const order = this.config.strategies;
    const attempts: StrategyAttempt[] = [];
    let letterheadPath = located.path;

    for (let i = 0; i < order.length; i++) {
      const name = order[i];
      if (!name) continue;
      const strategy = this.strategies.get(name);
      if (!strategy) {
        attempts.push({ strategy: name, error: `No strategy registered as "${name}"`, kind: 'Error' });
        continue;
      }

      logger.debug('Trying receipt strategy', { strategy: name, donor });
      try {
        const rendered = await strategy.render(job, { config: this.config, geometry, letterheadPath, logger });
        const fileName = buildReceiptFileName({ prefix: this.prefixFor(name), record: job.record, timestamp: job.now });
        const path = await writeReceipt(this.config.outputDir, fileName, rendered.bytes);

        logger.info('Receipt written', { path, strategy: name, letterhead: rendered.letterheadPath, donor });
        return {
          path,
          strategy: name,
          letterheadPath: rendered.letterheadPath,
          warnings: [...located.warnings, ...rendered.warnings],
          attempts
        };
      } catch (error) {
        attempts.push(describeAttempt(name, error));
        logger.warn('Receipt strategy failed; falling back', { strategy: name, donor, error });

        if (error instanceof CompositeFailure) {
          letterheadPath = null;
          const bare = order.indexOf('bare', i + 1);
          if (bare === -1) break;
          i = bare - 1;
        }
      }
    }

    logger.error('Every receipt strategy failed', { donor, attempts: attempts.map((a) => `${a.strategy}: ${a.error}`) });
    throw new TotalFailure(attempts);
  }
}
