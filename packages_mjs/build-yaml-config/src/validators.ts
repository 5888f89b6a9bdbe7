/**
 * Error taxonomy for configuration loading and the collaborators around it.
 */

export interface FieldViolation {
    /** Dotted location inside the file, e.g. `config.path.base` */
    path: string;
    message: string;
}

export class ImageforgeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ImageforgeError';
    }
}

export class ConfigurationError extends ImageforgeError {
    constructor(message: string, public readonly violations: FieldViolation[] = []) {
        super(
            violations.length > 0
                ? `${message}:\n${violations.map(v => `  - ${v.path}: ${v.message}`).join('\n')}`
                : message
        );
        this.name = 'ConfigurationError';
    }
}

export class RegistryError extends ImageforgeError {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}

export class RepositoryError extends ImageforgeError {
    constructor(message: string) {
        super(message);
        this.name = 'RepositoryError';
    }
}

export class BuildError extends ImageforgeError {
    constructor(message: string) {
        super(message);
        this.name = 'BuildError';
    }
}
