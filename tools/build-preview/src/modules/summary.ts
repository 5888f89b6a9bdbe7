import type { ResolvedBuildConfig } from '@imageforge/build-config-factory';
import { getPrimaryRegistry, getPrimaryRepository, getRepositoryBaseUrl } from '@imageforge/build-yaml-config';

const RULE = '-'.repeat(60);

function field(label: string, value: string | number | boolean, width: number): string {
    return `    ${`${label}:`.padEnd(width + 1)} ${value}`;
}

/** Human readable overview of a resolved configuration, one line per entry. */
export function formatSummary(resolved: ResolvedBuildConfig): string[] {
    const { config, variants } = resolved;
    const lines: string[] = ['Configuration Summary:', RULE];

    lines.push('', 'Paths:');
    lines.push(
        field('Base', config.path.base, 10),
        field('Downloads', config.path.downloads, 10),
        field('Sources', config.path.sources, 10),
        field('Build', config.path.build, 10),
        field('Libraries', config.path.generated.libraries, 10),
        field('Apps', config.path.generated.applications, 10)
    );

    const user = config.option.build_user;
    lines.push('', 'Build User:');
    if (user) {
        lines.push(
            field('Name', user.name, 8),
            field('UID:GID', `${user.uid}:${user.gid}`, 8),
            field('Home', user.homedir, 8)
        );
    }

    lines.push('', 'Build Variants:');
    for (const variant of Object.values(variants)) {
        lines.push(
            `    ${variant.name}:`,
            `  ${field('Alpine', variant.metadata.alpine_version, 6)}`,
            `  ${field('musl', variant.metadata.musl_version, 6)}`,
            `  ${field('Image', variant.resolvedImage, 6)}`
        );
    }

    const [registryName, registry] = getPrimaryRegistry(config);
    lines.push(
        '',
        'Primary Registry:',
        field('Type', registryName, 9),
        field('URL', registry.url, 9),
        field('Namespace', registry.namespace, 9)
    );

    const [repositoryName, repository] = getPrimaryRepository(config);
    lines.push(
        '',
        'Primary Repository:',
        field('Type', repositoryName, 4),
        field('URL', getRepositoryBaseUrl(repository), 4)
    );

    const { build, packaging } = config.defaults;
    lines.push(
        '',
        'Defaults:',
        field('Variant', build.variant, 18),
        field('Architecture', build.arch, 18),
        field('Cleanup on success', build.cleanup_on_success, 18),
        field('Generate SBOM', packaging.generate_sbom, 18)
    );

    return lines;
}
