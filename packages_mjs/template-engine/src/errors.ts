export type TemplateErrorKind = 'UndefinedVariable' | 'NonConvergence' | 'InvalidExpression';

export interface TemplateErrorDetails {
    /** 1-based pass during which rendering stopped */
    pass: number;
    /** Leading part of the template as it was handed to render() */
    template: string;
    /** Leading part of the last intermediate result */
    lastResult: string;
    /** Top-level names that were in scope */
    availableKeys: string[];
}

export const SNIPPET_LENGTH = 200;

export function snippet(text: string, length: number = SNIPPET_LENGTH): string {
    return text.length > length ? `${text.slice(0, length)}...` : text;
}

export class TemplateError extends Error {
    public readonly pass: number;
    public readonly template: string;
    public readonly lastResult: string;
    public readonly availableKeys: string[];

    constructor(public readonly kind: TemplateErrorKind, summary: string, details: TemplateErrorDetails) {
        super(
            `${summary}\n` +
            `Template: ${details.template}\n` +
            `Last result: ${details.lastResult}\n` +
            `Context keys: ${details.availableKeys.join(', ')}`
        );
        this.name = 'TemplateError';
        this.pass = details.pass;
        this.template = details.template;
        this.lastResult = details.lastResult;
        this.availableKeys = details.availableKeys;
    }
}

export class UndefinedVariableError extends TemplateError {
    constructor(
        public readonly path: string,
        public readonly segment: string,
        details: TemplateErrorDetails
    ) {
        super(
            'UndefinedVariable',
            `Template rendering failed at pass ${details.pass}: '${path}' is undefined (missing '${segment}')`,
            details
        );
        this.name = 'UndefinedVariableError';
    }

    /** First segment of the referenced path, e.g. `package` for `package.name` */
    get rootName(): string {
        return this.path.split(/[.[]/, 1)[0];
    }
}

export class NonConvergenceError extends TemplateError {
    constructor(public readonly maxPasses: number, details: TemplateErrorDetails) {
        super('NonConvergence', `Template did not converge after ${maxPasses} passes`, details);
        this.name = 'NonConvergenceError';
    }
}

export class InvalidExpressionError extends TemplateError {
    constructor(public readonly expression: string, details: TemplateErrorDetails) {
        super(
            'InvalidExpression',
            `Template rendering failed at pass ${details.pass}: '${expression}' is not a dotted path`,
            details
        );
        this.name = 'InvalidExpressionError';
    }
}
