export const PATTERNS = {
    // {{ path.to.value }}
    PLACEHOLDER: /\{\{\s*([^{}]+?)\s*\}\}/g,

    // Cheap presence test, no capture
    HAS_PLACEHOLDER: /\{\{.*?\}\}/,

    // path.to.value, items.0, items[0], a['b'], a["b"]
    EXPRESSION: /^[A-Za-z_][\w-]*(?:\.[\w-]+|\[\d+\]|\["[^"]+"\]|\['[^']+'\])*$/,
};

export const UNSAFE_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);
