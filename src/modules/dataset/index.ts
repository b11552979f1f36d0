/**
 * Dataset Module Index
 */

export * from './dataset.types.js';
export * from './dataset.fetcher.js';
