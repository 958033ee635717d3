const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

function skipWhitespace(text: string, i: number): number {
    while (i < text.length && WHITESPACE.has(text.charAt(i))) i++;
    return i;
}

// index just past the closing quote of the string opening at i
function skipString(text: string, i: number): number {
    i++;
    while (i < text.length) {
        const ch = text.charAt(i);
        if (ch === '\\') i += 2;
        else if (ch === '"') return i + 1;
        else i++;
    }
    return i;
}

// index just past the value starting at i
function skipValue(text: string, i: number): number {
    const first = text.charAt(i);
    if (first === '"') return skipString(text, i);
    if (first === '{' || first === '[') {
        let depth = 0;
        while (i < text.length) {
            const ch = text.charAt(i);
            if (ch === '"') {
                i = skipString(text, i);
                continue;
            }
            if (ch === '{' || ch === '[') depth++;
            else if (ch === '}' || ch === ']') {
                depth--;
                if (depth === 0) return i + 1;
            }
            i++;
        }
        return i;
    }
    while (i < text.length && !WHITESPACE.has(text.charAt(i)) && !',}]'.includes(text.charAt(i))) i++;
    return i;
}

/**
 * Source text of a top-level member of a JSON object, exactly as sent.
 * Expects `text` to be valid JSON; the last duplicate key wins, as with JSON.parse.
 */
export function rawMember(text: string, key: string): string | undefined {
    let i = skipWhitespace(text, 0);
    if (text.charAt(i) !== '{') return undefined;
    i++;
    let found: string | undefined;
    while (i < text.length) {
        i = skipWhitespace(text, i);
        if (text.charAt(i) !== '"') break;
        const keyEnd = skipString(text, i);
        const name: unknown = JSON.parse(text.slice(i, keyEnd));
        i = skipWhitespace(text, keyEnd);
        if (text.charAt(i) !== ':') break;
        const valueStart = skipWhitespace(text, i + 1);
        const valueEnd = skipValue(text, valueStart);
        if (name === key) found = text.slice(valueStart, valueEnd);
        i = skipWhitespace(text, valueEnd);
        if (text.charAt(i) !== ',') break;
        i++;
    }
    return found;
}
