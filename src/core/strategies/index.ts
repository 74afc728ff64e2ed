import { BareStrategy } from './bare.js';
import { PrimaryStrategy } from './primary.js';
import { SecondaryStrategy } from './secondary.js';
import type { ReceiptStrategy } from './types.js';

export { BareStrategy, PrimaryStrategy, SecondaryStrategy };
export type { ReceiptStrategy, StrategyContext } from './types.js';

export function defaultStrategies(): ReceiptStrategy[] {
  return [new PrimaryStrategy(), new SecondaryStrategy(), new BareStrategy()];
}
