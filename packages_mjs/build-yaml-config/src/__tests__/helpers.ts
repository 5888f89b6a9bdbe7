import * as path from 'path';
import { loadYamlDocument, validateConfigFile } from '../core';
import type { ConfigFile } from '../domain';

export const FIXTURES = path.join(__dirname, 'fixtures');

export function loadFixture(name: string, appEnv: string = 'test'): ConfigFile {
    const { data } = loadYamlDocument(name, { configDir: FIXTURES, appEnv });
    const result = validateConfigFile(data);
    if (!result.success) {
        throw new Error(`Fixture ${name} is invalid: ${JSON.stringify(result.violations)}`);
    }
    return result.file;
}

export function minimalConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        path: {
            base: '/b',
            downloads: '/d',
            sources: '/s',
            build: '/w',
            generated: { libraries: '/l', applications: '/a' }
        },
        build: {},
        registry: { primary: { main: { url: 'registry.test', namespace: 'ns' } } },
        repository: { primary: { nexus: { url: 'https://nexus.test', repository: 'raw' } } },
        ...overrides
    };
}
