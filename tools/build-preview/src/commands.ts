/**
 * Command handlers. Each returns the process exit code; output goes through
 * the given writers so the handlers can run without a terminal.
 */
import { ConfigLoader, DEFAULT_CONFIG_PATH, ResolutionPipeline } from '@imageforge/build-config-factory';
import { createLogger, isLogLevel, setLogLevel, type LogLevel } from '@imageforge/build-logger';
import {
    BuildError,
    ImageforgeError,
    loadYamlDocument,
    type BuildConfig
} from '@imageforge/build-yaml-config';
import { coerceToString } from '@imageforge/placeholder-resolver';
import { TemplateError } from '@imageforge/template-engine';
import { buildPreviewContext, configSection, isPackageTag, PACKAGE_TAGS } from './modules/context.js';
import { DEFAULT_PACKAGES_PATH, loadPackages } from './modules/packages.js';
import { executeCommands, PrintingRunner, type CommandRunner, type LineWriter } from './modules/runner.js';
import { formatSummary } from './modules/summary.js';

const logger = createLogger('build-preview');

export interface CommandIO {
    out: LineWriter;
    err: LineWriter;
}

export const consoleIO: CommandIO = {
    out: line => console.log(line),
    err: line => console.error(line)
};

export interface CommonOptions {
    config: string;
    appEnv?: string;
    logLevel?: string;
}

export interface PreviewOptions extends CommonOptions {
    package: string;
    variant: string;
    tag: string;
    packages: string;
}

const CONFIG_LOG_LEVELS: Record<BuildConfig['logging']['level'], LogLevel> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARNING: 'warn',
    ERROR: 'error'
};

/** `--log-level` wins over the level configured in the file. */
export function applyLogLevel(requested: string | undefined, configured?: BuildConfig['logging']['level']): void {
    const level = requested?.toLowerCase();
    if (level !== undefined) {
        if (!isLogLevel(level)) {
            throw new BuildError(`Unknown log level '${requested}'`);
        }
        setLogLevel(level);
    } else if (configured) {
        setLogLevel(CONFIG_LOG_LEVELS[configured]);
    }
}

function reportFailure(error: unknown, io: CommandIO): number {
    if (error instanceof TemplateError || error instanceof ImageforgeError) {
        io.err(`Error: ${error.message}`);
        return 1;
    }
    throw error;
}

export function runCheck(options: CommonOptions, io: CommandIO = consoleIO): number {
    try {
        applyLogLevel(options.logLevel);

        io.out('Loading configuration...');
        const { data } = loadYamlDocument(options.config, { appEnv: options.appEnv });
        const file = ConfigLoader.validate(data);
        applyLogLevel(options.logLevel, file.config.logging.level);

        const resolved = new ResolutionPipeline().resolve(file.config);
        io.out('Configuration loaded successfully!');
        io.out('');

        for (const line of formatSummary(resolved)) {
            io.out(line);
        }
        io.out('');
        io.out('All checks passed!');
        return 0;
    } catch (error) {
        return reportFailure(error, io);
    }
}

export function runPreview(
    options: PreviewOptions,
    io: CommandIO = consoleIO,
    runner: CommandRunner = new PrintingRunner(io.out)
): number {
    try {
        applyLogLevel(options.logLevel);

        const { data } = loadYamlDocument(options.config, { appEnv: options.appEnv });
        const catalogue = loadPackages(options.packages, { appEnv: options.appEnv });

        const pkg = Object.prototype.hasOwnProperty.call(catalogue.package, options.package)
            ? catalogue.package[options.package]
            : undefined;
        if (!pkg) {
            throw new BuildError(`Package '${options.package}' not found in ${options.packages}`);
        }

        const { tag } = options;
        if (!isPackageTag(tag)) {
            throw new BuildError(`Tag '${tag}' is not valid (expected ${PACKAGE_TAGS.join(' or ')})`);
        }
        if (!pkg.tags.includes(tag)) {
            logger.warn(`Tag '${tag}' is not listed in the tags of package '${options.package}'`);
        }

        const { context, variant } = buildPreviewContext(configSection(data), pkg, {
            packageName: options.package,
            variantName: options.variant,
            tag
        });

        io.out(`Building ${options.package} - variant: ${options.variant} (${variant.full_version})`);
        io.out(`Prefix: ${coerceToString(context.default_prefix)}`);

        executeCommands(pkg.commands, context, runner);
        return 0;
    } catch (error) {
        return reportFailure(error, io);
    }
}

export { DEFAULT_CONFIG_PATH, DEFAULT_PACKAGES_PATH };
