import { ConvergenceEngine, UndefinedVariableError } from '@imageforge/template-engine';
import { resolveVariant, variantScope } from '../src/variants.js';
import { STABLE_METADATA, buildConfig, createTestLogger } from './helpers.js';

function stableVariant(image: string) {
    const config = buildConfig({
        build: {
            variant: {
                stable: { image, metadata: STABLE_METADATA, description: 'Current', support_until: '2026-06-30' }
            }
        }
    });
    const variant = config.build.variant?.stable;
    if (!variant) {
        throw new Error('stable variant missing');
    }
    return variant;
}

describe('variantScope', () => {
    test('exposes the variant name and a copy of its metadata', () => {
        const variant = stableVariant('img');

        const scope = variantScope('stable', variant);

        expect(scope).toEqual({ name: 'stable', metadata: { ...STABLE_METADATA, arch: 'amd64' } });
        expect(scope.metadata).not.toBe(variant.metadata);
    });
});

describe('resolveVariant', () => {
    const engine = new ConvergenceEngine({ logger: createTestLogger() });
    const context = { registry_url: 'example.com', registry_namespace: 'toolchains' };

    test('renders the image with the variant bound as this', () => {
        const variant = stableVariant('{{ registry_url }}/{{ registry_namespace }}/{{ this.name }}:{{ this.metadata.alpine_version }}');

        const resolved = resolveVariant('stable', variant, context, engine);

        expect(resolved.resolvedImage).toBe('example.com/toolchains/stable:3.19');
        expect(resolved.image).toBe(variant.image);
        expect(resolved.description).toBe('Current');
        expect(resolved.supportUntil).toBe('2026-06-30');
    });

    test('does not leak the item scope into the shared context', () => {
        const variant = stableVariant('{{ this.name }}');

        resolveVariant('stable', variant, context, engine);

        expect(context).toEqual({ registry_url: 'example.com', registry_namespace: 'toolchains' });
    });

    test('returns a frozen value', () => {
        const resolved = resolveVariant('stable', stableVariant('plain'), context, engine);

        expect(Object.isFrozen(resolved)).toBe(true);
        expect(resolved.resolvedImage).toBe('plain');
    });

    test('fails on metadata the variant does not declare', () => {
        const variant = stableVariant('{{ this.metadata.codename }}');

        expect(() => resolveVariant('stable', variant, context, engine)).toThrow(UndefinedVariableError);
    });
});
