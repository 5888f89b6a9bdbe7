import type { TemplateValue } from './types.js';

/**
 * String form of a looked-up value as it is spliced into a template.
 * null renders empty; containers render as JSON.
 */
export function coerceToString(value: TemplateValue): string {
    if (typeof value === 'string') return value;
    if (value === null) return '';
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}
