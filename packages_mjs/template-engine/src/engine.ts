/**
 * Multi-pass template renderer for validated configuration.
 *
 * A template is rendered pass after pass until a pass finds nothing left to
 * substitute, so values that are themselves templates (`registry_url` pointing
 * at `{{ variables.host }}`) resolve through the chain. An item scope can be
 * bound as `this` for a single call:
 *
 *     engine.render('{{ registry_url }}/{{ this.name }}', context, { name: 'stable' })
 */
import { createLogger, type ImageforgeLogger } from '@imageforge/build-logger';
import {
    type LookupResult,
    type TemplateMapping,
    type TemplateValue,
    coerceToString,
    extractPlaceholders,
    hasPlaceholders,
    isPathExpression,
    lookupPath
} from '@imageforge/placeholder-resolver';
import {
    InvalidExpressionError,
    NonConvergenceError,
    UndefinedVariableError,
    snippet,
    type TemplateErrorDetails
} from './errors.js';
import { DEFAULT_MAX_PASSES, ITEM_SCOPE_NAME, type EngineOptions } from './options.js';

interface RenderState {
    template: string;
    context: TemplateMapping;
    itemScope?: TemplateMapping;
}

export class ConvergenceEngine {
    readonly maxPasses: number;
    readonly strict: boolean;
    private readonly logger: ImageforgeLogger;

    constructor(options: EngineOptions = {}) {
        const { maxPasses = DEFAULT_MAX_PASSES, strict = true } = options;
        if (!Number.isInteger(maxPasses) || maxPasses < 1) {
            throw new RangeError(`maxPasses must be a positive integer, got ${maxPasses}`);
        }
        this.maxPasses = maxPasses;
        this.strict = strict;
        this.logger = options.logger ?? createLogger('template-engine');
    }

    static hasTemplateVars(text: string): boolean {
        return hasPlaceholders(text);
    }

    /**
     * Render `template` until it stops changing.
     *
     * @param itemScope - bound as `this` for this call only; never copied into `context`
     * @throws UndefinedVariableError when a name is missing (strict mode)
     * @throws NonConvergenceError when placeholders remain after `maxPasses`
     * @throws InvalidExpressionError when a placeholder holds something other than a path
     */
    render(template: string, context: TemplateMapping, itemScope?: TemplateMapping): string {
        const state: RenderState = { template, context, itemScope };
        let current = template;

        for (let pass = 1; pass <= this.maxPasses; pass++) {
            if (extractPlaceholders(current).length === 0) {
                this.logger.trace(`Converged at pass ${pass}`);
                return current;
            }

            const next = this.renderPass(current, pass, state);

            // Lenient mode keeps unresolved placeholders; once nothing changes we are done
            if (!this.strict && next === current) {
                return current;
            }
            current = next;
        }

        throw new NonConvergenceError(this.maxPasses, this.details(this.maxPasses, current, state));
    }

    /** Render a string leaf; any other value is returned unchanged. */
    renderValue(value: TemplateValue, context: TemplateMapping, itemScope?: TemplateMapping): TemplateValue {
        if (typeof value === 'string') {
            return this.render(value, context, itemScope);
        }
        if (Array.isArray(value)) {
            return this.renderList(value, context, itemScope);
        }
        if (value !== null && typeof value === 'object') {
            return this.renderDict(value, context, itemScope);
        }
        return value;
    }

    /** Render every string leaf of a mapping, keeping keys and their order. */
    renderDict(data: TemplateMapping, context: TemplateMapping, itemScope?: TemplateMapping): TemplateMapping {
        const result: TemplateMapping = {};
        for (const [key, value] of Object.entries(data)) {
            result[key] = this.renderValue(value, context, itemScope);
        }
        return result;
    }

    renderList(data: TemplateValue[], context: TemplateMapping, itemScope?: TemplateMapping): TemplateValue[] {
        return data.map(item => this.renderValue(item, context, itemScope));
    }

    private renderPass(current: string, pass: number, state: RenderState): string {
        let output = '';
        let cursor = 0;

        for (const placeholder of extractPlaceholders(current)) {
            output += current.slice(cursor, placeholder.start);
            cursor = placeholder.end;

            if (!isPathExpression(placeholder.path)) {
                throw new InvalidExpressionError(placeholder.path, this.details(pass, current, state));
            }

            const result = this.lookup(placeholder.path, state);
            if (result.found) {
                output += coerceToString(result.value);
            } else if (this.strict) {
                throw new UndefinedVariableError(
                    placeholder.path,
                    result.failure.segment,
                    this.details(pass, current, state)
                );
            } else {
                output += placeholder.raw;
            }
        }

        return output + current.slice(cursor);
    }

    private lookup(path: string, state: RenderState): LookupResult {
        // `this.*` only ever sees the item scope, bare names only the context
        const isItemPath = path === ITEM_SCOPE_NAME
            || path.startsWith(`${ITEM_SCOPE_NAME}.`)
            || path.startsWith(`${ITEM_SCOPE_NAME}[`);

        if (!isItemPath) {
            return lookupPath(state.context, path);
        }
        if (!state.itemScope) {
            return {
                found: false,
                failure: { path, segment: ITEM_SCOPE_NAME, index: 0, reason: 'missing-key' }
            };
        }
        return lookupPath({ [ITEM_SCOPE_NAME]: state.itemScope }, path);
    }

    private details(pass: number, lastResult: string, state: RenderState): TemplateErrorDetails {
        const availableKeys = Object.keys(state.context).filter(key => key !== ITEM_SCOPE_NAME);
        if (state.itemScope) {
            availableKeys.push(ITEM_SCOPE_NAME);
        }
        return {
            pass,
            template: snippet(state.template),
            lastResult: snippet(lastResult),
            availableKeys
        };
    }
}
