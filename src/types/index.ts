export * from './receipt.js';
export * from './fonts.js';
export * from './output.js';
export * from './config.js';
