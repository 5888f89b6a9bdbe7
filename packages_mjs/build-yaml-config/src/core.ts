/**
 * Reading YAML configuration files and validating their structure.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { createLogger } from '@imageforge/build-logger';
import { ConfigFileSchema } from './schema.js';
import { ConfigurationError } from './validators.js';
import type { LoadOptions, LoadResult, ValidationResult } from './domain.js';

const logger = createLogger('build-config');

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveAppEnv(appEnv?: string): string {
    return (appEnv || process.env.APP_ENV || 'dev').toLowerCase();
}

/**
 * Locate a configuration file.
 * `{APP_ENV}` in the name is substituted, and an environment-specific sibling
 * (`config.prod.yaml` next to `config.yaml`) wins when it exists.
 */
export function resolveConfigPath(file: string, options: LoadOptions = {}): string {
    const env = resolveAppEnv(options.appEnv);

    // 1. Substitute {APP_ENV}
    const resolvedName = file.replace('{APP_ENV}', env);

    // 2. Resolve relative
    const resolvedPath = options.configDir && !path.isAbsolute(resolvedName)
        ? path.join(options.configDir, resolvedName)
        : path.resolve(resolvedName);

    // 3. Env specific override ({name}.{env}.yaml)
    const ext = path.extname(resolvedPath);
    const base = resolvedPath.substring(0, resolvedPath.length - ext.length);
    const envSpecificPath = `${base}.${env}${ext}`;

    if (fs.existsSync(envSpecificPath)) {
        return envSpecificPath;
    }
    if (fs.existsSync(resolvedPath)) {
        return resolvedPath;
    }
    throw new ConfigurationError(`Config file not found: ${resolvedPath}`);
}

/** Merge `source` into `target`; mappings merge recursively, anything else is replaced. */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    for (const key of Object.keys(source)) {
        const val = source[key];
        const existing = target[key];
        if (isRecord(val) && isRecord(existing)) {
            deepMerge(existing, val);
        } else {
            target[key] = val; // Replace primitives and arrays
        }
    }
    return target;
}

export function parseYaml(content: string, source: string): Record<string, unknown> {
    let data: unknown;
    try {
        // CORE_SCHEMA keeps dates such as support_until as plain strings
        data = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: source });
    } catch (error) {
        if (error instanceof yaml.YAMLException) {
            throw new ConfigurationError(`Invalid YAML syntax in ${source}: ${error.message}`);
        }
        throw error;
    }

    if (data === undefined || data === null) {
        return {};
    }
    if (!isRecord(data)) {
        throw new ConfigurationError(`Config file must contain a YAML mapping: ${source}`);
    }
    return data;
}

/** Load several files, later ones layered over earlier ones. */
export function loadYamlDocuments(files: string[], options: LoadOptions = {}): LoadResult {
    const appEnv = resolveAppEnv(options.appEnv);
    const result: LoadResult = { filesLoaded: [], appEnv, data: {} };

    for (const file of files) {
        const filePath = resolveConfigPath(file, { ...options, appEnv });
        logger.info(`Loading configuration from: ${filePath}`);

        const content = fs.readFileSync(filePath, 'utf8');
        deepMerge(result.data, parseYaml(content, filePath));
        result.filesLoaded.push(filePath);
    }

    return result;
}

export function loadYamlDocument(file: string, options: LoadOptions = {}): LoadResult {
    return loadYamlDocuments([file], options);
}

/** Check a parsed document against the file schema. */
export function validateConfigFile(raw: unknown): ValidationResult {
    const result = ConfigFileSchema.safeParse(raw);

    if (result.success) {
        logger.debug(`Config schema validated: ${result.data.schema} v${result.data.version}`);
        return { success: true, file: result.data };
    }

    return {
        success: false,
        violations: result.error.errors.map(issue => ({
            path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
            message: issue.message
        }))
    };
}
