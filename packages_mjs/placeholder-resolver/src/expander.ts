/**
 * Lenient placeholder expansion.
 *
 * Used for previewing build commands: every placeholder is resolved on its
 * own and one that cannot be resolved is left in the output as written, with
 * a warning. Nothing here throws for a missing variable.
 */
import { createLogger, type ImageforgeLogger } from '@imageforge/build-logger';
import { coerceToString } from './coercion.js';
import { extractPlaceholders, type Placeholder } from './extractor.js';
import { describeFailure, lookupPath } from './resolver.js';
import type { TemplateValue } from './types.js';

export const DEFAULT_MAX_DEPTH = 10;

const defaultLogger = createLogger('placeholder-resolver');

function substitute(
    template: string,
    placeholders: Placeholder[],
    context: TemplateValue,
    maxDepth: number,
    logger: ImageforgeLogger
): string {
    let output = '';
    let cursor = 0;

    for (const placeholder of placeholders) {
        output += template.slice(cursor, placeholder.start);
        cursor = placeholder.end;

        const result = lookupPath(context, placeholder.path);
        if (!result.found) {
            logger.warn(`Unable to resolve '${placeholder.path}': ${describeFailure(result.failure)}`);
            output += placeholder.raw;
            continue;
        }

        let value = result.value;
        // A value that is itself a template gets the remaining depth budget
        if (typeof value === 'string' && value.includes('{{')) {
            value = expandTemplate(value, context, maxDepth - 1, logger);
        }
        output += coerceToString(value);
    }

    return output + template.slice(cursor);
}

/**
 * Expand `{{ dotted.path }}` placeholders in `text` against `context`.
 *
 * Runs at most `maxDepth` whole-string passes and stops as soon as no
 * placeholder is left or a pass changes nothing.
 */
export function expandTemplate(
    text: string,
    context: TemplateValue,
    maxDepth: number = DEFAULT_MAX_DEPTH,
    logger: ImageforgeLogger = defaultLogger
): string {
    let result = text;

    for (let pass = 0; pass < maxDepth; pass++) {
        const placeholders = extractPlaceholders(result);
        if (placeholders.length === 0) {
            break;
        }

        const next = substitute(result, placeholders, context, maxDepth, logger);
        if (next === result) {
            break;
        }
        result = next;
    }

    return result;
}

/** Apply `expandTemplate` to every string leaf, keeping the shape. */
export function expandDeep(
    value: TemplateValue,
    context: TemplateValue,
    maxDepth: number = DEFAULT_MAX_DEPTH,
    logger: ImageforgeLogger = defaultLogger
): TemplateValue {
    if (typeof value === 'string') {
        return expandTemplate(value, context, maxDepth, logger);
    }

    if (Array.isArray(value)) {
        return value.map(item => expandDeep(item, context, maxDepth, logger));
    }

    if (value !== null && typeof value === 'object') {
        const result: Record<string, TemplateValue> = {};
        for (const [key, item] of Object.entries(value)) {
            result[key] = expandDeep(item, context, maxDepth, logger);
        }
        return result;
    }

    return value;
}
