import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigPresets, ReceiptCompositor } from '../../src/index.js';
import { ConfigError, RenderFailure } from '../../src/core/errors.js';
import { LETTERHEAD_MARGINS, PLAIN_MARGINS } from '../../src/core/layout/geometry.js';
import type { ReceiptStrategy, StrategyContext } from '../../src/core/strategies/index.js';
import type { BatchProgress, RenderedReceipt, ReceiptJob } from '../../src/types/output.js';
import { silentLogger } from '../../src/utils/logger.js';

const now = new Date(2026, 9, 18, 14, 30, 0);

// Fails for donors whose first name is "Bad"
const pickyStrategy: ReceiptStrategy = {
  name: 'primary',
  async render(job: ReceiptJob, context: StrategyContext): Promise<RenderedReceipt> {
    if (job.record['First Name'] === 'Bad') throw new RenderFailure('primary', 'cannot render');
    return { bytes: new TextEncoder().encode('%PDF-fake'), letterheadPath: context.letterheadPath, warnings: [] };
  }
};

describe('ReceiptCompositor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'compositor-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('rejects invalid configuration up front', () => {
    expect(() => new ReceiptCompositor({ outputDir: '' })).toThrow(ConfigError);
  });

  it('chains setters and validates each change', () => {
    const compositor = new ReceiptCompositor({ outputDir: dir, logger: silentLogger })
      .setOrganizationName('Acme')
      .setLetterheadPath('/tmp/letterhead.pdf');

    expect(compositor.options.organizationName).toBe('Acme');
    expect(compositor.options.letterhead.path).toBe('/tmp/letterhead.pdf');
    expect(() => compositor.setStrategies(['bare', 'bare'])).toThrow(ConfigError);
    expect(compositor.options.strategies).toEqual(['primary', 'secondary', 'bare']);
  });

  it('applies presets without losing the letterhead override', () => {
    const compositor = new ReceiptCompositor({ outputDir: dir, letterhead: { path: '/tmp/l.pdf' } }).applyPreset('plain');
    expect(compositor.options.letterhead.enabled).toBe(false);
    expect(compositor.options.letterhead.path).toBe('/tmp/l.pdf');
    expect(compositor.options.page.margins).toEqual(PLAIN_MARGINS);

    compositor.applyPreset('letterhead');
    expect(compositor.options.letterhead.enabled).toBe(true);
    expect(compositor.options.page.margins).toEqual(LETTERHEAD_MARGINS);
    expect(Object.keys(ConfigPresets)).toEqual(['letterhead', 'plain']);
  });

  it('counts failed donors and keeps going', async () => {
    const compositor = new ReceiptCompositor(
      {
        outputDir: dir,
        letterhead: { enabled: false },
        strategies: ['primary'],
        logger: silentLogger,
        clock: () => now
      },
      [pickyStrategy]
    );
    const progress: BatchProgress[] = [];

    const summary = await compositor.generateBatch(
      [
        { 'First Name': 'Jane', 'Last Name': 'Doe' },
        { 'First Name': 'Bad', 'Last Name': 'Row' },
        { 'First Name': 'John', 'Last Name': 'Roe' }
      ],
      'Dear {First Name},',
      (p) => progress.push(p)
    );

    expect(summary.generated).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      { index: 1, donor: 'Bad Row', error: 'Every receipt strategy failed (tried: primary)' }
    ]);
    expect(progress.map((p) => [p.completed, p.ok])).toEqual([
      [1, true],
      [2, false],
      [3, true]
    ]);
  });

  it('finishes the batch when the letterhead path cannot be checked', async () => {
    const loop = join(dir, 'loop.pdf');
    await symlink(loop, loop);
    const compositor = new ReceiptCompositor(
      {
        outputDir: join(dir, 'out'),
        letterhead: { enabled: true, path: loop, fileNames: ['none.pdf'] },
        strategies: ['primary'],
        logger: silentLogger,
        clock: () => now
      },
      [pickyStrategy]
    );

    const summary = await compositor.generateBatch(
      [
        { 'First Name': 'Jane', 'Last Name': 'Doe' },
        { 'First Name': 'John', 'Last Name': 'Roe' }
      ],
      'Dear {First Name},'
    );

    expect(summary.generated).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.results.map((r) => r.warnings)).toEqual([
      [{ kind: 'LetterheadMissing', candidates: [loop] }],
      [{ kind: 'LetterheadMissing', candidates: [loop] }]
    ]);
  });
});
