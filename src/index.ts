export * from './types.js';
export * from './patterns.js';
export * from './extractor.js';
export * from './lines.js';
export * from './renderer.js';
export * from './loader.js';
