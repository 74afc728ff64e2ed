export * from './page-renderer.js';
export * from './letterhead-locator.js';
export * from './letterhead-compositor.js';
export * from './receipt-writer.js';
