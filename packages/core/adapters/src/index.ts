/**
 * Source adapters - main exports
 */

export * from './retry.js';
export * from './http-errors.js';
export * from './time.js';
export * from './google-drive.js';
export * from './notion.js';
export * from './static.js';
