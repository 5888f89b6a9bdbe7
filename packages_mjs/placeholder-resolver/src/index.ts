export * from './types.js';
export { PATTERNS, UNSAFE_SEGMENTS } from './patterns.js';
export { parsePath } from './path-parser.js';
export { lookupPath, describeFailure } from './resolver.js';
export { extractPlaceholders, hasPlaceholders, isPathExpression, type Placeholder } from './extractor.js';
export { coerceToString } from './coercion.js';
export { expandTemplate, expandDeep, DEFAULT_MAX_DEPTH } from './expander.js';
