import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { LETTERHEAD_MARGINS, PAGE_SIZES } from '../core/layout/geometry.js';
import { DEFAULT_AMOUNT_FIELDS } from '../core/substitution.js';
import { DEFAULT_BOLD_KEYWORDS } from '../core/text-pipeline/keyword-styler.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { CompositorConfig, ResolvedCompositorConfig } from '../types/config.js';

const marginsSchema = z.object({
  top: z.number().nonnegative(),
  right: z.number().nonnegative(),
  bottom: z.number().nonnegative(),
  left: z.number().nonnegative()
});

const pageSchema = z.object({
  size: z.enum(['LETTER', 'A4']).default('LETTER'),
  margins: marginsSchema.default(LETTERHEAD_MARGINS)
});

const fontFilesSchema = z.object({
  regular: z.string().min(1),
  bold: z.string().min(1).optional(),
  italic: z.string().min(1).optional(),
  boldItalic: z.string().min(1).optional()
});

const typographySchema = z.object({
  fontFamily: z.enum(['Helvetica', 'Times-Roman', 'Courier']).default('Helvetica'),
  fontSize: z.number().positive().default(12),
  lineHeight: z.number().positive().default(18),
  paragraphGap: z.number().nonnegative().default(18),
  listIndent: z.number().nonnegative().default(18),
  color: z.string().regex(/^#?[0-9a-fA-F]{6}$/, 'expected a hex colour such as #1a1a1a').default('#000000'),
  fontFiles: fontFilesSchema.optional()
});

const letterheadSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).optional(),
  assetDirs: z.array(z.string().min(1)).default([]),
  fileNames: z.array(z.string().min(1)).min(1).default(['letterhead.pdf', 'letterhead_template.pdf']),
  userDataDir: z.string().min(1).optional()
});

const strategyNameSchema = z.enum(['primary', 'secondary', 'bare']);

export const compositorConfigSchema = z
  .object({
    outputDir: z.string().min(1),
    organizationName: z.string().min(1).optional(),
    letterhead: letterheadSchema.default({}),
    page: pageSchema.default({}),
    typography: typographySchema.default({}),
    strategies: z
      .array(strategyNameSchema)
      .min(1)
      .default(['primary', 'secondary', 'bare'])
      .refine((list) => new Set(list).size === list.length, 'strategies must not repeat'),
    boldKeywords: z.array(z.string().min(1)).default(() => [...DEFAULT_BOLD_KEYWORDS]),
    amountFields: z.array(z.string().min(1)).default(() => [...DEFAULT_AMOUNT_FIELDS]),
    locale: z.string().min(2).default('en-US')
  })
  .superRefine((config, ctx) => {
    const dims = PAGE_SIZES[config.page.size];
    const { margins } = config.page;
    if (dims.width - margins.left - margins.right <= config.typography.fontSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['page', 'margins'],
        message: 'horizontal margins leave no room for content'
      });
    }
    if (dims.height - margins.top - margins.bottom < config.typography.lineHeight) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['page', 'margins'],
        message: 'vertical margins leave no room for a single line'
      });
    }
    if (config.typography.lineHeight < config.typography.fontSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['typography', 'lineHeight'],
        message: 'lineHeight must be at least fontSize'
      });
    }
  });

export function resolveConfig(config: CompositorConfig): ResolvedCompositorConfig {
  const { logger, clock, ...options } = config;
  const parsed = compositorConfigSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  return {
    ...parsed.data,
    logger: logger ?? defaultLogger,
    clock: clock ?? (() => new Date())
  };
}
