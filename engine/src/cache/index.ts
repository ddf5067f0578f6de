export * from './ResultCache.js';
export * from './Fingerprint.js';
export * from './MemoryResultCache.js';
export * from './DataCopy.js';
