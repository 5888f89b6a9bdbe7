import { getLogLevel } from '@imageforge/build-logger';
import { applyLogLevel, runCheck, runPreview, type PreviewOptions } from '../src/commands.js';
import { RecordingRunner, captureIO, fixture } from './helpers.js';

function previewOptions(overrides: Partial<PreviewOptions> = {}): PreviewOptions {
    return {
        package: 'zlib',
        variant: 'stable',
        tag: 'library',
        config: fixture('config.yaml'),
        packages: fixture('packages.yaml'),
        appEnv: 'test',
        logLevel: 'silent',
        ...overrides
    };
}

describe('applyLogLevel', () => {
    afterEach(() => {
        applyLogLevel('silent');
    });

    test('maps the configured level', () => {
        applyLogLevel(undefined, 'WARNING');
        expect(getLogLevel()).toBe('warn');
    });

    test('prefers the requested level', () => {
        applyLogLevel('DEBUG', 'ERROR');
        expect(getLogLevel()).toBe('debug');
    });

    test('rejects an unknown level', () => {
        expect(() => applyLogLevel('loud')).toThrow("Unknown log level 'loud'");
    });
});

describe('runCheck', () => {
    test('prints a summary of the resolved configuration', () => {
        const io = captureIO();

        const code = runCheck({ config: fixture('config.yaml'), appEnv: 'test', logLevel: 'silent' }, io);

        expect(code).toBe(0);
        expect(io.errors).toEqual([]);
        expect(io.lines[0]).toBe('Loading configuration...');
        expect(io.lines[io.lines.length - 1]).toBe('All checks passed!');
        expect(io.lines).toEqual(expect.arrayContaining([
            '    Base:       /srv/imageforge',
            '    Apps:       /srv/imageforge/apps/{{ package.name }}',
            '    UID:GID:  1500:1500',
            '    stable:',
            '      Image:  registry.example.com/toolchains/builda-bar:3.19',
            '    Type:      harbor',
            '    URL:  https://nexus.example.com/artifacts',
            '    Cleanup on success: true'
        ]));
    });

    test('reports template failures with exit code 1', () => {
        const io = captureIO();

        const code = runCheck({ config: fixture('broken-variant.yaml'), appEnv: 'test', logLevel: 'silent' }, io);

        expect(code).toBe(1);
        expect(io.errors).toHaveLength(1);
        expect(io.errors[0]).toMatch(
            /^Error: Template rendering failed at pass 1: 'this\.metadata\.codename' is undefined \(missing 'codename'\)/
        );
    });

    test('reports a missing file with exit code 1', () => {
        const io = captureIO();
        const missing = fixture('absent.yaml');

        const code = runCheck({ config: missing, appEnv: 'test', logLevel: 'silent' }, io);

        expect(code).toBe(1);
        expect(io.errors).toEqual([`Error: Config file not found: ${missing}`]);
    });
});

describe('runPreview', () => {
    test('expands every command of a library package', () => {
        const io = captureIO();
        const runner = new RecordingRunner();

        const code = runPreview(previewOptions(), io, runner);

        expect(code).toBe(0);
        expect(io.lines).toEqual(['Building zlib - variant: stable (1.3.1)', 'Prefix: /opt/imageforge/libs']);
        expect(runner.calls).toEqual([
            ['download', 'curl -L https://git.example.org/zlib/archive/v1.3.1.tar.gz -o /srv/imageforge/downloads/zlib-1.3.1.tar.gz'],
            ['configure', './configure --prefix=/opt/imageforge/libs/zlib/1.3.1'],
            ['install', 'make install DESTDIR=/srv/imageforge/build {{ missing.value }}']
        ]);
    });

    test('uses the application prefix and numeric versions', () => {
        const io = captureIO();
        const runner = new RecordingRunner();

        const code = runPreview(previewOptions({ package: 'htop', tag: 'application' }), io, runner);

        expect(code).toBe(0);
        expect(io.lines).toEqual(['Building htop - variant: stable (3.3.0)', 'Prefix: /opt/imageforge/apps']);
        expect(runner.calls).toEqual([['build', 'make -j4 PREFIX=/opt/imageforge/apps']]);
    });

    test('matches a variant listed among several names', () => {
        const runner = new RecordingRunner();

        expect(runPreview(previewOptions({ variant: 'legacy' }), captureIO(), runner)).toBe(0);
        expect(runner.calls).toHaveLength(3);
    });

    test('a tag missing from the package is only a warning', () => {
        const io = captureIO();

        const code = runPreview(previewOptions({ tag: 'application' }), io, new RecordingRunner());

        expect(code).toBe(0);
        expect(io.lines[1]).toBe('Prefix: /opt/imageforge/apps');
    });

    test('prints stages through the default runner', () => {
        const io = captureIO();

        runPreview(previewOptions({ package: 'htop', tag: 'application' }), io);

        expect(io.lines).toEqual([
            'Building htop - variant: stable (3.3.0)',
            'Prefix: /opt/imageforge/apps',
            '',
            '='.repeat(60),
            'Stage: build',
            '='.repeat(60),
            'make -j4 PREFIX=/opt/imageforge/apps'
        ]);
    });

    test.each([
        [{ package: 'curl' }, `Error: Package 'curl' not found in ${fixture('packages.yaml')}`],
        [{ variant: 'edge' }, "Error: Variant 'edge' not found for package 'zlib'"],
        [{ tag: 'tool' }, "Error: Tag 'tool' is not valid (expected library or application)"]
    ])('rejects %j', (overrides, message) => {
        const io = captureIO();

        const code = runPreview(previewOptions(overrides), io, new RecordingRunner());

        expect(code).toBe(1);
        expect(io.errors).toEqual([message]);
    });
});
