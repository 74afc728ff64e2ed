import type { StrategyName } from '../types/receipt.js';

export type ReceiptErrorKind = 'RenderFailure' | 'CompositeFailure' | 'TotalFailure' | 'ConfigError';

export class ReceiptError extends Error {
  readonly kind: ReceiptErrorKind;

  constructor(kind: ReceiptErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/**
 * Layout or drawing failed for one strategy tier (unencodable glyph, unreadable
 * font file, resource exhaustion). The controller moves on to the next tier.
 */
export class RenderFailure extends ReceiptError {
  readonly strategy: StrategyName;

  constructor(strategy: StrategyName, message: string, options?: { cause?: unknown }) {
    super('RenderFailure', message, options);
    this.strategy = strategy;
  }
}

/**
 * Merging the content page onto the letterhead failed, usually because the
 * letterhead file is not a loadable PDF.
 */
export class CompositeFailure extends ReceiptError {
  readonly letterheadPath: string;

  constructor(letterheadPath: string, message: string, options?: { cause?: unknown }) {
    super('CompositeFailure', message, options);
    this.letterheadPath = letterheadPath;
  }
}

export interface StrategyAttempt {
  strategy: StrategyName;
  error: string;
  kind: ReceiptErrorKind | 'Error';
}

export class TotalFailure extends ReceiptError {
  readonly attempts: StrategyAttempt[];

  constructor(attempts: StrategyAttempt[], options?: { cause?: unknown }) {
    const tried = attempts.map((a) => a.strategy).join(', ') || 'none';
    super('TotalFailure', `Every receipt strategy failed (tried: ${tried})`, options);
    this.attempts = attempts;
  }
}

export class ConfigError extends ReceiptError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigError', `Invalid compositor configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function describeAttempt(strategy: StrategyName, error: unknown): StrategyAttempt {
  return {
    strategy,
    error: error instanceof Error ? error.message : String(error),
    kind: error instanceof ReceiptError ? error.kind : 'Error'
  };
}
