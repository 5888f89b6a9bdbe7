/**
 * Value model shared by every resolver: a parsed document tree of mappings,
 * sequences and scalar leaves.
 */

export type TemplateScalar = string | number | boolean | null;

export type TemplateValue = TemplateScalar | TemplateValue[] | TemplateMapping;

export interface TemplateMapping {
    [key: string]: TemplateValue;
}

export type LookupFailureReason =
    | 'missing-key'
    | 'not-indexable'
    | 'index-out-of-range'
    | 'unsafe-segment';

export interface LookupFailure {
    /** Full dotted path that was requested */
    path: string;
    /** First segment that could not be resolved */
    segment: string;
    /** Zero-based position of that segment */
    index: number;
    reason: LookupFailureReason;
}

export type LookupResult =
    | { found: true; value: TemplateValue }
    | { found: false; failure: LookupFailure };

export function isTemplateMapping(value: TemplateValue | undefined): value is TemplateMapping {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
