import { ConfigurationError } from '@imageforge/build-yaml-config';
import { findPackageVariant, loadPackages, parsePackages } from '../src/modules/packages.js';
import { fixture } from './helpers.js';

describe('package catalogue', () => {
    test('loads packages in file order with defaults applied', () => {
        const catalogue = loadPackages(fixture('packages.yaml'), { appEnv: 'test' });

        expect(Object.keys(catalogue.package)).toEqual(['zlib', 'htop']);
        expect(catalogue.package.zlib.tags).toEqual(['library']);
        expect(catalogue.package.htop.website).toBe('');
        expect(catalogue.package.htop.commands).toEqual({
            build: 'make -j{{ config.variables.jobs }} PREFIX={{ default_prefix }}'
        });
    });

    test('keeps unquoted versions as numbers', () => {
        const catalogue = loadPackages(fixture('packages.yaml'), { appEnv: 'test' });

        expect(catalogue.package.htop.variant[0].major_version).toBe(3);
        expect(catalogue.package.htop.variant[0].full_version).toBe('3.3.0');
    });

    test('rejects a package without variants', () => {
        let caught: unknown;
        try {
            parsePackages({ package: { broken: { variant: [] } } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        if (caught instanceof ConfigurationError) {
            expect(caught.violations).toEqual([
                { path: 'package.broken.variant', message: 'Array must contain at least 1 element(s)' }
            ]);
        }
    });
});

describe('findPackageVariant', () => {
    const pkg = parsePackages({
        package: {
            demo: {
                variant: [
                    { name: ['stable', 'legacy'], full_version: '2.0.0', major_version: '2', patch_version: '0' },
                    { name: 'edge', full_version: '3.0.0-rc1', major_version: '3', patch_version: '0' }
                ]
            }
        }
    }).package.demo;

    test('matches a name listed among several', () => {
        expect(findPackageVariant(pkg, 'legacy')?.full_version).toBe('2.0.0');
    });

    test('matches a single name exactly', () => {
        expect(findPackageVariant(pkg, 'edge')?.full_version).toBe('3.0.0-rc1');
    });

    test('returns undefined for an unknown variant', () => {
        expect(findPackageVariant(pkg, 'stab')).toBeUndefined();
    });
});
