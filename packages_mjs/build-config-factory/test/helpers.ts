import type { ImageforgeLogger } from '@imageforge/build-logger';
import { validateConfigFile, type BuildConfig } from '@imageforge/build-yaml-config';

export function createTestLogger(): jest.Mocked<ImageforgeLogger> {
    return {
        error: jest.fn(),
        warn: jest.fn(),
        info: jest.fn(),
        debug: jest.fn(),
        trace: jest.fn()
    };
}

/** A validated configuration with plain paths and one registry, overridable per test. */
export function buildConfig(overrides: Record<string, unknown> = {}): BuildConfig {
    const result = validateConfigFile({
        version: '1.0.0',
        config: {
            path: {
                base: '/data',
                downloads: '/data/downloads',
                sources: '/data/sources',
                build: '/data/build',
                generated: { libraries: '/data/libs', applications: '/data/apps' }
            },
            build: {},
            registry: { primary: { main: { url: 'example.com', namespace: 'toolchains' } } },
            repository: { primary: { nexus: { url: 'https://nexus.test', repository: 'raw' } } },
            ...overrides
        }
    });
    if (!result.success) {
        throw new Error(`Invalid test configuration: ${JSON.stringify(result.violations)}`);
    }
    return result.file.config;
}

export const STABLE_METADATA = { alpine_version: '3.19', musl_version: '1.2.4', kernel: '6.6' };
