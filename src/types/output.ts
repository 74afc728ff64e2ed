import type { StrategyAttempt } from '../core/errors.js';
import type { DonorRecord, ReceiptWarning, StrategyName } from './receipt.js';

export interface RenderedReceipt {
  bytes: Uint8Array;
  letterheadPath: string | null;
  warnings: ReceiptWarning[];
}

export interface ReceiptResult {
  path: string;
  strategy: StrategyName;
  letterheadPath: string | null;
  warnings: ReceiptWarning[];
  /** Tiers that failed before the one that produced the file */
  attempts: StrategyAttempt[];
}

export interface BatchFailure {
  index: number;
  donor: string;
  error: string;
}

export interface BatchSummary {
  generated: number;
  failed: number;
  results: ReceiptResult[];
  failures: BatchFailure[];
}

export interface ReceiptJob {
  record: DonorRecord;
  template: string;
  now: Date;
}

export interface BatchProgress {
  completed: number;
  total: number;
  donor: string;
  ok: boolean;
}

export type ProgressCallback = (progress: BatchProgress) => void;
