/**
 * Staged resolution of a validated build configuration.
 *
 * Order matters: variant images may reference `path.*` and registry values,
 * which only hold final strings once the path stage has run and the context
 * has been updated.
 */
import { createLogger, type ImageforgeLogger } from '@imageforge/build-logger';
import type { BuildConfig, PathConfig } from '@imageforge/build-yaml-config';
import { extractPlaceholders, parsePath, type TemplateMapping } from '@imageforge/placeholder-resolver';
import { ConvergenceEngine, UndefinedVariableError } from '@imageforge/template-engine';
import { ContextBuilder } from './context.js';
import type { PathField, PathState, PipelineOptions, ResolvedBuildConfig } from './types.js';
import { resolveVariant, type ResolvedVariant } from './variants.js';

export const DEFAULT_DEFERRED_VARIABLES = ['package'];

interface ResolvedPaths {
    paths: PathConfig;
    states: Record<PathField, PathState>;
}

export class ResolutionPipeline {
    private readonly engine: ConvergenceEngine;
    private readonly deferredVariables: ReadonlySet<string>;
    private readonly logger: ImageforgeLogger;

    constructor(options: PipelineOptions = {}) {
        this.logger = options.logger ?? createLogger('build-config');
        this.engine = options.engine ?? new ConvergenceEngine({ logger: this.logger });
        this.deferredVariables = new Set(options.deferredVariables ?? DEFAULT_DEFERRED_VARIABLES);
    }

    /**
     * Resolve paths, then variant images. The input configuration is left as
     * it was; any template failure other than a deferred variable aborts.
     */
    resolve(config: BuildConfig): ResolvedBuildConfig {
        this.logger.debug('Resolving configuration templates...');

        const initialContext = ContextBuilder.build(config);
        const { paths, states } = this.resolvePaths(config.path, initialContext);

        // Later stages see final path values, not the placeholders
        const context = ContextBuilder.withResolvedPaths(initialContext, paths);
        const variants = this.resolveVariants(config, context);

        return {
            config: { ...config, path: paths },
            variants,
            pathStates: states,
            context
        };
    }

    private resolvePaths(path: PathConfig, context: TemplateMapping): ResolvedPaths {
        const base = this.resolvePath('base', path.base, context);
        const downloads = this.resolvePath('downloads', path.downloads, context);
        const sources = this.resolvePath('sources', path.sources, context);
        const build = this.resolvePath('build', path.build, context);
        const libraries = this.resolvePath('generated.libraries', path.generated.libraries, context);
        const applications = this.resolveDeferredPath(path.generated.applications, context);

        return {
            paths: {
                base,
                downloads,
                sources,
                build,
                generated: { libraries, applications: applications.value }
            },
            states: {
                'base': 'resolved',
                'downloads': 'resolved',
                'sources': 'resolved',
                'build': 'resolved',
                'generated.libraries': 'resolved',
                'generated.applications': applications.state
            }
        };
    }

    private resolvePath(field: PathField, value: string, context: TemplateMapping): string {
        if (!ConvergenceEngine.hasTemplateVars(value)) {
            return value;
        }
        const resolved = this.engine.render(value, context);
        this.logger.debug(`Resolved path.${field}: ${resolved}`);
        return resolved;
    }

    // May legitimately keep a placeholder that is only known per build
    private resolveDeferredPath(value: string, context: TemplateMapping): { value: string; state: PathState } {
        try {
            return { value: this.resolvePath('generated.applications', value, context), state: 'resolved' };
        } catch (error) {
            if (this.isDeferred(error)) {
                this.checkNonDeferredPlaceholders(value, context);
                this.logger.debug(
                    `Path contains runtime variable '${error.path}': ${value} (will be resolved at build time)`
                );
                return { value, state: 'partially-resolved' };
            }
            throw error;
        }
    }

    private isDeferred(error: unknown): error is UndefinedVariableError {
        return error instanceof UndefinedVariableError && this.deferredVariables.has(error.rootName);
    }

    /**
     * The first failure of a render hides everything after it, so each
     * placeholder not rooted at a deferred name is rendered on its own.
     * Those may only fail through a deferred name they lead to.
     */
    private checkNonDeferredPlaceholders(value: string, context: TemplateMapping): void {
        for (const placeholder of extractPlaceholders(value)) {
            const [root = ''] = parsePath(placeholder.path);
            if (this.deferredVariables.has(root)) {
                continue;
            }
            try {
                this.engine.render(placeholder.raw, context);
            } catch (error) {
                if (!this.isDeferred(error)) {
                    throw error;
                }
            }
        }
    }

    private resolveVariants(config: BuildConfig, context: TemplateMapping): Record<string, ResolvedVariant> {
        const variants: Record<string, ResolvedVariant> = {};

        for (const [name, variant] of Object.entries(config.build.variant ?? {})) {
            const resolved = resolveVariant(name, variant, context, this.engine);
            this.logger.debug(`Resolved ${name} image: ${resolved.resolvedImage}`);
            variants[name] = resolved;
        }

        return variants;
    }
}
