import type { BuildVariant, VariantMetadata } from '@imageforge/build-yaml-config';
import type { TemplateMapping } from '@imageforge/placeholder-resolver';
import type { ConvergenceEngine } from '@imageforge/template-engine';

export interface ResolvedVariant {
    readonly name: string;
    /** Image template as configured */
    readonly image: string;
    readonly resolvedImage: string;
    readonly metadata: VariantMetadata;
    readonly description: string | null;
    readonly supportUntil: string | null;
}

/** Scope bound as `this` while rendering a variant's image. */
export function variantScope(name: string, variant: BuildVariant): TemplateMapping {
    return { name, metadata: { ...variant.metadata } };
}

export function resolveVariant(
    name: string,
    variant: BuildVariant,
    context: TemplateMapping,
    engine: ConvergenceEngine
): ResolvedVariant {
    const resolvedImage = engine.render(variant.image, context, variantScope(name, variant));

    return Object.freeze({
        name,
        image: variant.image,
        resolvedImage,
        metadata: variant.metadata,
        description: variant.description ?? null,
        supportUntil: variant.support_until ?? null
    });
}
