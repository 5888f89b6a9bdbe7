/**
 * The package catalogue (`packages.yaml`): per package its tags, sources,
 * versions per variant and the command templates for each build stage.
 */
import { z } from 'zod';
import {
    ConfigurationError,
    TemplateValueSchema,
    loadYamlDocument,
    type LoadOptions
} from '@imageforge/build-yaml-config';

const VersionSchema = z.union([z.string(), z.number()]);

export const PackageVariantSchema = z.object({
    name: z.union([z.string(), z.array(z.string()).min(1)]),
    full_version: VersionSchema,
    major_version: VersionSchema,
    patch_version: VersionSchema
}).catchall(TemplateValueSchema);

export const PackageSchema = z.object({
    tags: z.array(z.string()).default([]),
    website: z.string().default(''),
    git: z.record(TemplateValueSchema).default({}),
    variant: z.array(PackageVariantSchema).min(1),
    commands: z.record(z.string()).default({})
});

export const PackagesFileSchema = z.object({
    package: z.record(PackageSchema)
});

export type PackageVariant = z.infer<typeof PackageVariantSchema>;
export type PackageDefinition = z.infer<typeof PackageSchema>;
export type PackagesFile = z.infer<typeof PackagesFileSchema>;

export const DEFAULT_PACKAGES_PATH = 'config/packages.yaml';

export function parsePackages(raw: unknown): PackagesFile {
    const result = PackagesFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(
            'Package catalogue validation failed',
            result.error.errors.map(issue => ({
                path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
                message: issue.message
            }))
        );
    }
    return result.data;
}

export function loadPackages(file: string = DEFAULT_PACKAGES_PATH, options: LoadOptions = {}): PackagesFile {
    return parsePackages(loadYamlDocument(file, options).data);
}

/** A variant entry matches by name, or by membership when it lists several names. */
export function findPackageVariant(pkg: PackageDefinition, variantName: string): PackageVariant | undefined {
    return pkg.variant.find(entry =>
        Array.isArray(entry.name) ? entry.name.includes(variantName) : entry.name === variantName
    );
}
