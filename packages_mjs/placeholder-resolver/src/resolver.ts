import { parsePath } from './path-parser.js';
import { UNSAFE_SEGMENTS } from './patterns.js';
import {
    type LookupFailure,
    type LookupFailureReason,
    type LookupResult,
    type TemplateValue,
    isTemplateMapping
} from './types.js';

const INDEX_SEGMENT = /^\d+$/;

function fail(path: string, segment: string, index: number, reason: LookupFailureReason): LookupResult {
    return { found: false, failure: { path, segment, index, reason } };
}

/**
 * Walk `root` one segment at a time.
 * Mappings are indexed by own keys, sequences by non-negative integers; any
 * other value cannot be indexed.
 */
export function lookupPath(root: TemplateValue, path: string): LookupResult {
    const segments = parsePath(path);
    let current: TemplateValue = root;

    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i];

        if (UNSAFE_SEGMENTS.has(segment)) {
            return fail(path, segment, i, 'unsafe-segment');
        }

        if (Array.isArray(current)) {
            if (!INDEX_SEGMENT.test(segment)) {
                return fail(path, segment, i, 'not-indexable');
            }
            const position = Number(segment);
            if (position >= current.length) {
                return fail(path, segment, i, 'index-out-of-range');
            }
            current = current[position];
        } else if (isTemplateMapping(current)) {
            if (!Object.prototype.hasOwnProperty.call(current, segment)) {
                return fail(path, segment, i, 'missing-key');
            }
            current = current[segment];
        } else {
            return fail(path, segment, i, 'not-indexable');
        }
    }

    return { found: true, value: current };
}

export function describeFailure(failure: LookupFailure): string {
    switch (failure.reason) {
        case 'missing-key':
            return `key '${failure.segment}' not found`;
        case 'not-indexable':
            return `cannot index '${failure.segment}' into a non-container value`;
        case 'index-out-of-range':
            return `index ${failure.segment} is out of range`;
        case 'unsafe-segment':
            return `unsafe path segment '${failure.segment}'`;
    }
}
