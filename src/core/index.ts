export * from './errors.js';
export * from './substitution.js';
export * from './fallback-chain.js';
export * from './layout/geometry.js';
export * from './layout/line-layout.js';
export * from './text-pipeline/normalizer.js';
export * from './text-pipeline/inline-parser.js';
export * from './text-pipeline/keyword-styler.js';
export * from './strategies/index.js';
