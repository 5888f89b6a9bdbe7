import type { BuildConfig, BuildVariant, RegistryEndpoint, RepositoryEndpoint } from './domain.js';
import { RegistryError, RepositoryError } from './validators.js';

// Entries keep the order they were written in; the first one is the primary
function firstEntry<T>(entries: Record<string, T> | null | undefined): [string, T] | null {
    if (!entries) return null;
    const [name] = Object.keys(entries);
    return name === undefined ? null : [name, entries[name]];
}

export function getVariant(config: BuildConfig, name: string): BuildVariant | undefined {
    const variants = config.build.variant ?? {};
    return Object.prototype.hasOwnProperty.call(variants, name) ? variants[name] : undefined;
}

export function listVariants(config: BuildConfig): string[] {
    return Object.keys(config.build.variant ?? {});
}

export function getPrimaryRegistry(config: BuildConfig): [string, RegistryEndpoint] {
    const entry = firstEntry(config.registry.primary);
    if (!entry) {
        throw new RegistryError('No primary registry configured');
    }
    return entry;
}

export function getFallbackRegistry(config: BuildConfig): [string, RegistryEndpoint] | null {
    return firstEntry(config.registry.fallback);
}

export function getPrimaryRepository(config: BuildConfig): [string, RepositoryEndpoint] {
    const entry = firstEntry(config.repository.primary);
    if (!entry) {
        throw new RepositoryError('No primary repository configured');
    }
    return entry;
}

export function getFallbackRepository(config: BuildConfig): [string, RepositoryEndpoint] | null {
    return firstEntry(config.repository.fallback);
}

export function getRepositoryBaseUrl(endpoint: RepositoryEndpoint): string {
    if (endpoint.type === 'nexus') {
        return `${endpoint.url}/${endpoint.repository}`;
    }
    if (endpoint.endpoint) {
        return `${endpoint.endpoint}/${endpoint.bucket}`;
    }
    return `https://s3.${endpoint.region}.amazonaws.com/${endpoint.bucket}`;
}
