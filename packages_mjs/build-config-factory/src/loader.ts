import * as path from 'path';
import { createLogger } from '@imageforge/build-logger';
import {
    ConfigurationError,
    loadYamlDocuments,
    validateConfigFile,
    type ConfigFile,
    type LoadOptions
} from '@imageforge/build-yaml-config';
import { ResolutionPipeline } from './pipeline.js';
import type { PipelineOptions, ResolvedBuildConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = path.join('config', 'config.yaml');

export interface LoaderOptions extends LoadOptions, PipelineOptions {
    /** Extra files layered over the main one, in order */
    overlays?: string[];
}

const logger = createLogger('build-config');

/**
 * Load, validate and resolve a build configuration file.
 *
 * Workflow:
 * 1. Load YAML (plus overlays)
 * 2. Validate structure
 * 3. Resolve templates
 */
export class ConfigLoader {
    private readonly pipeline: ResolutionPipeline;

    constructor(
        private readonly configPath: string = DEFAULT_CONFIG_PATH,
        private readonly options: LoaderOptions = {}
    ) {
        this.pipeline = new ResolutionPipeline(options);
    }

    load(): ResolvedBuildConfig {
        const { data } = loadYamlDocuments([this.configPath, ...(this.options.overlays ?? [])], this.options);
        const resolved = this.resolveDocument(data);

        logger.info('Configuration loaded successfully');
        return resolved;
    }

    /** Validate and resolve an already-parsed document. */
    resolveDocument(raw: unknown): ResolvedBuildConfig {
        const file = ConfigLoader.validate(raw);
        return this.pipeline.resolve(file.config);
    }

    static validate(raw: unknown): ConfigFile {
        const result = validateConfigFile(raw);
        if (!result.success) {
            throw new ConfigurationError('Configuration validation failed', result.violations);
        }
        return result.file;
    }
}

export function loadConfig(configPath?: string, options: LoaderOptions = {}): ResolvedBuildConfig {
    return new ConfigLoader(configPath, options).load();
}
