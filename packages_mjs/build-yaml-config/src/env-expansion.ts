import * as os from 'os';
import * as path from 'path';

const ENV_REFERENCE = /^\$\{([^}]+)\}$/;

/**
 * Replace a value that is exactly `${NAME}` with the environment variable
 * NAME. An unset variable gives `undefined`; anything else passes through.
 */
export function expandEnvReference(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value !== 'string') return value;

    const match = value.match(ENV_REFERENCE);
    if (!match) return value;

    return env[match[1]];
}

/** Expand a leading `~` to the home directory. */
export function expandHomePath(value: unknown): unknown {
    if (typeof value !== 'string') return value;

    if (value === '~') return os.homedir();
    if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));

    return value;
}
