export * from './font-variant.js';
export * from './font-set.js';
export * from './text-measurer.js';
