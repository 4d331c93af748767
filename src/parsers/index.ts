/**
 * Parsers module exports
 */
export * from './xml-document.js';
export * from './variables.js';
export * from './cbp-parser.js';
