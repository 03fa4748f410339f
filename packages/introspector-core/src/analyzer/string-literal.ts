import type { SyntaxNode } from 'tree-sitter';

const STRING_OPENING = /^([rRbBuUfF]{0,2})('''|"""|'|")/;

const SIMPLE_ESCAPES: Record<string, string> = {
    '\n': '',
    '\\': '\\',
    "'": "'",
    '"': '"',
    a: '\x07',
    b: '\b',
    f: '\f',
    n: '\n',
    r: '\r',
    t: '\t',
    v: '\v',
};

const ESCAPE_SEQUENCE = /\\(\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/g;

const MAX_CODE_POINT = 0x10ffff;

function decodeEscape(sequence: string): string {
    const simple = SIMPLE_ESCAPES[sequence];
    if (simple !== undefined) return simple;
    switch (sequence[0]) {
        case 'x':
        case 'u':
        case 'U':
            return String.fromCodePoint(parseInt(sequence.slice(1), 16));
        default:
            return String.fromCodePoint(parseInt(sequence, 8));
    }
}

/**
 * First `\U` escape of a text literal that lies beyond the Unicode range, or null.
 * Raw and bytes literals have no such escapes.
 */
export function findInvalidUnicodeEscape(text: string): string | null {
    const opening = STRING_OPENING.exec(text);
    if (!opening) return null;
    const prefix = (opening[1] ?? '').toLowerCase();
    if (prefix.includes('r') || prefix.includes('b')) return null;
    for (const match of text.matchAll(ESCAPE_SEQUENCE)) {
        const sequence = match[1] ?? '';
        if (sequence.startsWith('U') && parseInt(sequence.slice(1), 16) > MAX_CODE_POINT) {
            return match[0];
        }
    }
    return null;
}

/**
 * Evaluates a single string literal token to its runtime value.
 * Returns null for anything that is not a plain text constant: f-strings,
 * bytes literals and malformed tokens.
 * Unknown escapes (and `\N{...}`) are kept verbatim, as the interpreter does for unknown ones.
 */
export function evaluateStringLiteral(text: string): string | null {
    const opening = STRING_OPENING.exec(text);
    if (!opening) return null;

    const prefix = (opening[1] ?? '').toLowerCase();
    const quote = opening[2] ?? '';
    if (prefix.includes('f') || prefix.includes('b')) return null;
    if (text.length < opening[0].length + quote.length || !text.endsWith(quote)) return null;

    const body = text.slice(opening[0].length, text.length - quote.length);
    if (prefix.includes('r')) return body;
    if (findInvalidUnicodeEscape(text) !== null) return null;
    return body.replace(ESCAPE_SEQUENCE, (_match, sequence: string) => decodeEscape(sequence));
}

/**
 * Constant value of a `string` or `concatenated_string` node, or null when the
 * node is not a text constant.
 */
export function evaluateStringNode(node: SyntaxNode): string | null {
    if (node.type === 'string') {
        return evaluateStringLiteral(node.text);
    }
    if (node.type === 'concatenated_string') {
        let value = '';
        for (const part of node.namedChildren) {
            if (part.type === 'comment') continue;
            const partValue = part.type === 'string' ? evaluateStringLiteral(part.text) : null;
            if (partValue === null) return null;
            value += partValue;
        }
        return value;
    }
    return null;
}

function expandTabs(line: string, tabSize = 8): string {
    let result = '';
    for (const char of line) {
        if (char === '\t') {
            result += ' '.repeat(tabSize - (result.length % tabSize));
        } else {
            result += char;
        }
    }
    return result;
}

/**
 * Normalises docstring indentation the way `inspect.cleandoc` does:
 * tabs expanded, first line left-stripped, common margin of the remaining
 * lines removed, leading and trailing empty lines dropped.
 */
export function cleanDocstring(docstring: string): string {
    const lines = docstring.split('\n').map(line => expandTabs(line));

    let margin = Number.POSITIVE_INFINITY;
    for (const line of lines.slice(1)) {
        const content = line.trimStart();
        if (content.length > 0) {
            margin = Math.min(margin, line.length - content.length);
        }
    }

    lines[0] = (lines[0] ?? '').trimStart();
    if (Number.isFinite(margin)) {
        for (let i = 1; i < lines.length; i++) {
            lines[i] = (lines[i] ?? '').slice(margin);
        }
    }

    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    while (lines.length > 0 && lines[0] === '') lines.shift();
    return lines.join('\n');
}

/**
 * Python `repr()` of a text constant.
 */
export function pythonStringRepr(value: string): string {
    const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
    let body = '';
    for (const char of value) {
        const code = char.codePointAt(0) ?? 0;
        if (char === '\\') body += '\\\\';
        else if (char === quote) body += `\\${quote}`;
        else if (char === '\n') body += '\\n';
        else if (char === '\r') body += '\\r';
        else if (char === '\t') body += '\\t';
        else if (code < 0x20 || (code >= 0x7f && code < 0xa0)) body += `\\x${code.toString(16).padStart(2, '0')}`;
        else body += char;
    }
    return `${quote}${body}${quote}`;
}
