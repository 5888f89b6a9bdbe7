export * from './types.js';
export { ContextBuilder } from './context.js';
export { ResolutionPipeline, DEFAULT_DEFERRED_VARIABLES } from './pipeline.js';
export { resolveVariant, variantScope, type ResolvedVariant } from './variants.js';
export { ConfigLoader, loadConfig, DEFAULT_CONFIG_PATH, type LoaderOptions } from './loader.js';
