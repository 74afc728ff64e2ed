import type { z } from 'zod';
import type { compositorConfigSchema } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export type CompositorOptions = z.input<typeof compositorConfigSchema>;

export type ResolvedCompositorOptions = z.output<typeof compositorConfigSchema>;

export interface RuntimeHooks {
  logger?: Logger;
  /** Source of "now" for the Date placeholders and file timestamps */
  clock?: () => Date;
}

export type CompositorConfig = CompositorOptions & RuntimeHooks;

export type ResolvedCompositorConfig = ResolvedCompositorOptions & Required<RuntimeHooks>;

export type TypographyOptions = ResolvedCompositorOptions['typography'];

export type LetterheadOptions = ResolvedCompositorOptions['letterhead'];

// Presets leave outputDir to the caller
export type CompositorPreset = Omit<CompositorOptions, 'outputDir'>;
