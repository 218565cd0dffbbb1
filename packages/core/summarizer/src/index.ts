/**
 * Summarizers - main exports
 */

export * from './refs.js';
export * from './extractive.js';
export * from './openai.js';
