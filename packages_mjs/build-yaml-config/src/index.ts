export * from './domain.js';
export * from './schema.js';
export * from './validators.js';
export * from './accessors.js';
export { expandEnvReference, expandHomePath } from './env-expansion.js';
export {
    isRecord,
    resolveAppEnv,
    resolveConfigPath,
    deepMerge,
    parseYaml,
    loadYamlDocument,
    loadYamlDocuments,
    validateConfigFile
} from './core.js';
