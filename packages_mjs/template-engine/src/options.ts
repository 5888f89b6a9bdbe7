import type { ImageforgeLogger } from '@imageforge/build-logger';

export const DEFAULT_MAX_PASSES = 5;

/** Name under which a per-item scope is bound for one render call */
export const ITEM_SCOPE_NAME = 'this';

export interface EngineOptions {
    maxPasses?: number;
    /** Fail on names missing from the context (default true) */
    strict?: boolean;
    logger?: ImageforgeLogger;
}
