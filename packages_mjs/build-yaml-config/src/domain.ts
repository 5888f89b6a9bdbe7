/**
 * Data models for the build configuration.
 */
import type { z } from 'zod';
import type {
    BuildConfigSchema,
    BuildUserSchema,
    BuildVariantSchema,
    ConfigFileSchema,
    ContainerBuildTypeSchema,
    PathSchema,
    RegistryEndpointSchema,
    RepositoryEndpointSchema,
    RuntimeSchema,
    VariantMetadataSchema
} from './schema.js';
import type { FieldViolation } from './validators.js';

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PathConfig = z.infer<typeof PathSchema>;
export type BuildUser = z.infer<typeof BuildUserSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type BuildVariant = z.infer<typeof BuildVariantSchema>;
export type VariantMetadata = z.infer<typeof VariantMetadataSchema>;
export type ContainerBuildType = z.infer<typeof ContainerBuildTypeSchema>;
export type RegistryEndpoint = z.infer<typeof RegistryEndpointSchema>;
export type RepositoryEndpoint = z.infer<typeof RepositoryEndpointSchema>;

export type ValidationResult =
    | { success: true; file: ConfigFile }
    | { success: false; violations: FieldViolation[] };

export interface LoadOptions {
    /** Directory that relative file names are resolved against */
    configDir?: string;
    /** Environment name; falls back to APP_ENV, then `dev` */
    appEnv?: string;
}

export interface LoadResult {
    filesLoaded: string[];
    appEnv: string;
    data: Record<string, unknown>;
}
