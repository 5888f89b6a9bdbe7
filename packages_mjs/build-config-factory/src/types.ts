import type { ImageforgeLogger } from '@imageforge/build-logger';
import type { BuildConfig } from '@imageforge/build-yaml-config';
import type { TemplateMapping } from '@imageforge/placeholder-resolver';
import type { ConvergenceEngine } from '@imageforge/template-engine';
import type { ResolvedVariant } from './variants.js';

export type PathField =
    | 'base'
    | 'downloads'
    | 'sources'
    | 'build'
    | 'generated.libraries'
    | 'generated.applications';

/**
 * `partially-resolved` is a normal outcome: the value still holds a
 * placeholder filled in per build (e.g. `{{ package.name }}`).
 */
export type PathState = 'resolved' | 'partially-resolved';

export interface PipelineOptions {
    engine?: ConvergenceEngine;
    /** Root names that may stay unresolved in `path.generated.applications` */
    deferredVariables?: string[];
    logger?: ImageforgeLogger;
}

export interface ResolvedBuildConfig {
    /** The validated configuration with every path field resolved */
    config: BuildConfig;
    variants: Record<string, ResolvedVariant>;
    pathStates: Record<PathField, PathState>;
    /** Context as it stood for the variant stage */
    context: TemplateMapping;
}
