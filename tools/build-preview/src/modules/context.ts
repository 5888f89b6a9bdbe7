/**
 * Per-package lookup scope used to expand build commands.
 */
import type { ImageforgeLogger } from '@imageforge/build-logger';
import { BuildError, ConfigurationError, TemplateValueSchema } from '@imageforge/build-yaml-config';
import {
    expandDeep,
    isTemplateMapping,
    lookupPath,
    type TemplateMapping
} from '@imageforge/placeholder-resolver';
import { findPackageVariant, type PackageDefinition, type PackageVariant } from './packages.js';

export type PackageTag = 'library' | 'application';

export const PACKAGE_TAGS: readonly PackageTag[] = ['library', 'application'];

const PREFIX_PATHS: Record<PackageTag, string> = {
    library: 'libraries.default_prefix',
    application: 'applications.default_prefix'
};

export function isPackageTag(value: string): value is PackageTag {
    return PACKAGE_TAGS.some(tag => tag === value);
}

export interface PreviewTarget {
    packageName: string;
    variantName: string;
    tag: PackageTag;
}

export interface PreviewContext {
    context: TemplateMapping;
    variant: PackageVariant;
}

/** The `config` section of a parsed (not validated) configuration document. */
export function configSection(document: Record<string, unknown>): TemplateMapping {
    const parsed = TemplateValueSchema.safeParse(document.config);
    if (!parsed.success || !isTemplateMapping(parsed.data)) {
        throw new ConfigurationError("Configuration document has no 'config' mapping");
    }
    return parsed.data;
}

/**
 * Assemble the lookup scope for one package build.
 *
 * `git` values may reference the rest of the scope (`{{ full_version }}`),
 * so they are expanded once against it before being exposed.
 */
export function buildPreviewContext(
    config: TemplateMapping,
    pkg: PackageDefinition,
    target: PreviewTarget,
    logger?: ImageforgeLogger
): PreviewContext {
    const variant = findPackageVariant(pkg, target.variantName);
    if (!variant) {
        throw new BuildError(`Variant '${target.variantName}' not found for package '${target.packageName}'`);
    }

    const prefix = lookupPath(config, PREFIX_PATHS[target.tag]);
    if (!prefix.found) {
        throw new ConfigurationError(`Missing 'config.${PREFIX_PATHS[target.tag]}' for tag '${target.tag}'`);
    }

    const context: TemplateMapping = {
        config,
        package_name: target.packageName,
        name: target.packageName,
        default_prefix: prefix.value,
        full_version: variant.full_version,
        major_version: variant.major_version,
        patch_version: variant.patch_version,
        git: pkg.git,
        website: pkg.website
    };

    context.git = expandDeep(pkg.git, context, undefined, logger);

    return { context, variant };
}
