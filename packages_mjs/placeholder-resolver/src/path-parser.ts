// name | [0] | ["key"] | ['key']
const SEGMENT_TOKEN = /([^.[\]]+)|\[(\d+)\]|\["([^"]*)"\]|\['([^']*)'\]/g;

/**
 * Split a dotted path into lookup segments.
 *
 * `a.b.c` splits on dots only, so an empty segment (`a..b`) is kept and fails
 * its lookup later. Bracket forms (`items[0]`, `a['b']`) are tokenized.
 */
export function parsePath(path: string): string[] {
    if (!path) return [];

    if (!path.includes('[')) {
        return path.split('.');
    }

    const segments: string[] = [];
    SEGMENT_TOKEN.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = SEGMENT_TOKEN.exec(path)) !== null) {
        const segment = match[1] ?? match[2] ?? match[3] ?? match[4];
        if (segment !== undefined) {
            segments.push(segment);
        }
    }

    return segments;
}
