import { mkdir, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { stringifyDonorValue } from '../core/substitution.js';
import type { DonorRecord } from '../types/receipt.js';
import { hasErrorCode } from '../utils/fs-errors.js';

export const DEFAULT_RECEIPT_PREFIX = 'receipt';

const MAX_NAME_ATTEMPTS = 1000;

export function sanitizeNameFragment(value: string): string {
  return value
    .trim()
    .replace(/[^A-Za-z0-9-]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function receiptPrefix(organizationName?: string): string {
  const org = organizationName ? sanitizeNameFragment(organizationName) : '';
  return org ? `${org}_Receipt` : DEFAULT_RECEIPT_PREFIX;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function buildReceiptFileName(args: { prefix: string; record: DonorRecord; timestamp: Date }): string {
  const first = sanitizeNameFragment(stringifyDonorValue(args.record['First Name'])) || 'Donor';
  const last = sanitizeNameFragment(stringifyDonorValue(args.record['Last Name']));
  const parts = [args.prefix, first, last, formatTimestamp(args.timestamp)].filter((p) => p.length > 0);
  return `${parts.join('_')}.pdf`;
}

/**
 * Writes without overwriting: when the name is taken, `_2`, `_3` … is added
 * before the extension. Returns the path written.
 */
export async function writeReceipt(dir: string, fileName: string, bytes: Uint8Array): Promise<string> {
  await mkdir(dir, { recursive: true });
  const ext = extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);

  for (let n = 1; n <= MAX_NAME_ATTEMPTS; n++) {
    const path = join(dir, n === 1 ? fileName : `${stem}_${n}${ext}`);
    try {
      await writeFile(path, bytes, { flag: 'wx' });
      return path;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) continue;
      throw error;
    }
  }
  throw new Error(`No free file name for ${fileName} in ${dir}`);
}
