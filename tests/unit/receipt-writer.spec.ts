import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import {
  buildReceiptFileName,
  formatTimestamp,
  receiptPrefix,
  sanitizeNameFragment,
  writeReceipt
} from '../../src/pdf/receipt-writer.js';

const timestamp = new Date(2026, 0, 5, 9, 3, 7);

describe('receipt file names', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(timestamp)).toBe('20260105_090307');
  });

  it('joins prefix, donor name and timestamp', () => {
    const name = buildReceiptFileName({
      prefix: 'receipt',
      record: { 'First Name': 'Jane', 'Last Name': 'Doe' },
      timestamp
    });
    expect(name).toBe('receipt_Jane_Doe_20260105_090307.pdf');
  });

  it('falls back to Donor and skips an empty last name', () => {
    expect(buildReceiptFileName({ prefix: 'receipt', record: {}, timestamp })).toBe('receipt_Donor_20260105_090307.pdf');
  });

  it('keeps only letters, digits and hyphens in name fragments', () => {
    expect(sanitizeNameFragment('Mary Ann')).toBe('Mary_Ann');
    expect(sanitizeNameFragment("O'Brien-Smith")).toBe('O_Brien-Smith');
    expect(sanitizeNameFragment('../../etc')).toBe('etc');
  });

  it('builds an organization prefix', () => {
    expect(receiptPrefix('Friends of the Park')).toBe('Friends_of_the_Park_Receipt');
    expect(receiptPrefix()).toBe('receipt');
  });
});

describe('writeReceipt', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'receipts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and never overwrites', async () => {
    const out = join(dir, 'nested');
    const first = await writeReceipt(out, 'receipt_Jane.pdf', new TextEncoder().encode('one'));
    const second = await writeReceipt(out, 'receipt_Jane.pdf', new TextEncoder().encode('two'));

    expect(basename(first)).toBe('receipt_Jane.pdf');
    expect(basename(second)).toBe('receipt_Jane_2.pdf');
    expect(await readFile(first, 'utf8')).toBe('one');
    expect(await readFile(second, 'utf8')).toBe('two');
  });
});
