/**
 * Validation schemas for the build configuration file.
 */
import { z } from 'zod';
import type { TemplateValue } from '@imageforge/placeholder-resolver';
import { expandEnvReference, expandHomePath } from './env-expansion.js';

export const TemplateValueSchema: z.ZodType<TemplateValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(TemplateValueSchema),
        z.record(TemplateValueSchema)
    ])
);

// `${NAME}` credentials are read from the environment before validation
const secretField = () => z.preprocess(value => expandEnvReference(value), z.string().nullish());

const pathField = () => z.preprocess(value => expandHomePath(value), z.string());

// ============================================================================
// Enums
// ============================================================================

export const BuildRuntimeSchema = z.enum(['docker', 'podman']);
export const PullPolicySchema = z.enum(['always', 'if-not-present', 'never']);
export const RegistryStrategySchema = z.enum(['primary-only', 'primary-with-fallback', 'round-robin']);
export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']);
export const LogFormatSchema = z.enum(['json', 'text']);

// ============================================================================
// Options
// ============================================================================

export const BuildUserSchema = z.object({
    name: z.string(),
    group: z.string(),
    uid: z.number().int().min(1000),
    gid: z.number().int().min(1000),
    homedir: z.string(),
    shell: z.string().default('/bin/bash')
});

export const TmpfsSchema = z.object({
    enabled: z.boolean().default(true),
    size: z.string().regex(/^\d+[kmg]$/, 'must look like 512m or 2g').default('2g'),
    mount_point: z.string().default('/tmp')
});

export const SecuritySchema = z.object({
    no_new_privileges: z.boolean().default(true),
    drop_capabilities: z.array(z.string()).default(['ALL']),
    add_capabilities: z.array(z.string()).default([])
});

export const RuntimeSchema = z.object({
    tmpfs: TmpfsSchema.default({}),
    fakeroot: z.object({ enabled: z.boolean().default(true) }).default({}),
    security: SecuritySchema.default({})
});

export const OptionSchema = z.object({
    build_user: BuildUserSchema.optional(),
    runtime: RuntimeSchema.optional()
});

// ============================================================================
// Paths and build
// ============================================================================

export const PathSchema = z.object({
    base: pathField(),
    downloads: pathField(),
    sources: pathField(),
    build: pathField(),
    generated: z.object({
        libraries: pathField(),
        applications: pathField()
    })
});

export const VariantMetadataSchema = z.object({
    alpine_version: z.string().regex(/^\d+\.\d+$/, 'expected MAJOR.MINOR'),
    musl_version: z.string().regex(/^\d+\.\d+\.\d+$/, 'expected MAJOR.MINOR.PATCH'),
    kernel: z.string().regex(/^\d+\.\d+$/, 'expected MAJOR.MINOR'),
    arch: z.string().default('amd64')
}).catchall(TemplateValueSchema);

export const BuildVariantSchema = z.object({
    image: z.string(),
    metadata: VariantMetadataSchema,
    description: z.string().nullish(),
    support_until: z.string().nullish()
});

export const ContainerBuildTypeSchema = z.object({
    image_basename: z.string().default('builda-bar'),
    runtime: BuildRuntimeSchema.default('docker'),
    pull_policy: PullPolicySchema.default('if-not-present')
});

export const BuildSchema = z.object({
    type: z.object({ container: ContainerBuildTypeSchema.default({}) }).optional(),
    variant: z.record(BuildVariantSchema).optional()
});

// ============================================================================
// Registry and repository
// ============================================================================

export const RegistryEndpointSchema = z.object({
    public: z.boolean().default(true),
    url: z.string(),
    namespace: z.string(),
    username: secretField(),
    password: secretField(),
    token: secretField(),
    timeout: z.number().int().min(1).default(30),
    retry: z.number().int().min(0).default(3)
});

export const RegistrySchema = z.object({
    strategy: RegistryStrategySchema.default('primary-with-fallback'),
    primary: z.record(RegistryEndpointSchema).refine(
        entries => Object.keys(entries).length > 0,
        'At least one primary registry must be configured'
    ),
    fallback: z.record(RegistryEndpointSchema).nullish()
});

const DEFAULT_PATH_TEMPLATE = '{package}/{major_minor}/{full_version}';

export const NexusRepositorySchema = z.object({
    type: z.literal('nexus').default('nexus'),
    url: z.string(),
    repository: z.string(),
    path_template: z.string().default(DEFAULT_PATH_TEMPLATE),
    username: secretField(),
    password: secretField(),
    timeout: z.number().int().min(1).default(60),
    retry: z.number().int().min(0).default(3)
});

export const S3RepositorySchema = z.object({
    type: z.literal('s3'),
    bucket: z.string(),
    region: z.string(),
    endpoint: z.string().nullish(),
    path_template: z.string().default(DEFAULT_PATH_TEMPLATE),
    access_key: secretField(),
    secret_key: secretField(),
    timeout: z.number().int().min(1).default(60),
    retry: z.number().int().min(0).default(3)
});

export const RepositoryEndpointSchema = z.union([NexusRepositorySchema, S3RepositorySchema]);

export const RepositorySchema = z.object({
    strategy: RegistryStrategySchema.default('primary-with-fallback'),
    primary: z.record(RepositoryEndpointSchema),
    fallback: z.record(RepositoryEndpointSchema).nullish()
});

// ============================================================================
// Defaults, logging, integrations
// ============================================================================

export const DefaultsSchema = z.object({
    build: z.object({
        variant: z.string().default('stable'),
        arch: z.string().default('amd64'),
        cleanup_on_success: z.boolean().default(true),
        cleanup_on_failure: z.boolean().default(false)
    }).default({}),
    packaging: z.object({
        format: z.string().default('tar.gz'),
        generate_checksum: z.boolean().default(true),
        generate_sbom: z.boolean().default(true),
        generate_signature: z.boolean().default(false)
    }).default({})
});

export const LoggingSchema = z.object({
    level: LogLevelSchema.default('INFO'),
    format: LogFormatSchema.default('json'),
    output: z.enum(['stdout', 'file']).default('stdout'),
    file: z.string().nullish()
});

export const GitHubSchema = z.object({
    token: secretField(),
    api_url: z.string().default('https://api.github.com')
});

// ============================================================================
// Document
// ============================================================================

export const BuildConfigSchema = z.object({
    variables: z.record(TemplateValueSchema).default({}),
    defaults: DefaultsSchema.default({}),
    path: PathSchema,
    option: OptionSchema.default({}),
    build: BuildSchema,
    registry: RegistrySchema,
    repository: RepositorySchema,
    logging: LoggingSchema.default({}),
    github: GitHubSchema.default({})
});

export const DEFAULT_SCHEMA_NAME = 'imageforge-config';

export const ConfigFileSchema = z.object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, 'expected MAJOR.MINOR.PATCH'),
    schema: z.string().default(DEFAULT_SCHEMA_NAME),
    config: BuildConfigSchema
});
