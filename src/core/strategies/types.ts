import type { PageGeometry } from '../layout/geometry.js';
import type { ResolvedCompositorConfig } from '../../types/config.js';
import type { RenderedReceipt, ReceiptJob } from '../../types/output.js';
import type { StrategyName } from '../../types/receipt.js';
import type { Logger } from '../../utils/logger.js';

export interface StrategyContext {
  config: ResolvedCompositorConfig;
  geometry: PageGeometry;
  /** Letterhead to composite onto; null writes the content page alone */
  letterheadPath: string | null;
  logger: Logger;
}

export interface ReceiptStrategy {
  readonly name: StrategyName;
  render(job: ReceiptJob, context: StrategyContext): Promise<RenderedReceipt>;
}
