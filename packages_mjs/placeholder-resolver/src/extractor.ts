import { PATTERNS } from './patterns.js';

export interface Placeholder {
    /** Full matched text, braces included */
    raw: string;
    /** Inner expression, trimmed */
    path: string;
    start: number;
    end: number;
}

/** All `{{ ... }}` spans in textual order. */
export function extractPlaceholders(template: string): Placeholder[] {
    const placeholders: Placeholder[] = [];

    // Reset lastIndex for global regex
    PATTERNS.PLACEHOLDER.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = PATTERNS.PLACEHOLDER.exec(template)) !== null) {
        placeholders.push({
            raw: match[0],
            path: match[1].trim(),
            start: match.index,
            end: match.index + match[0].length
        });
    }

    return placeholders;
}

export function hasPlaceholders(value: string): boolean {
    if (!value) return false;
    return PATTERNS.HAS_PLACEHOLDER.test(value);
}

export function isPathExpression(expression: string): boolean {
    return PATTERNS.EXPRESSION.test(expression);
}
