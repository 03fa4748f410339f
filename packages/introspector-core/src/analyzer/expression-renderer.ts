import type { SyntaxNode } from 'tree-sitter';
import { evaluateStringNode, pythonStringRepr } from './string-literal.js';

/**
 * Constant literals, already evaluated.
 */
export type PythonConstant =
    | { type: 'str'; value: string }
    | { type: 'int'; text: string }
    | { type: 'float'; text: string }
    | { type: 'bool'; value: boolean }
    | { type: 'none' }
    | { type: 'ellipsis' };

/**
 * The expression shapes rendered specially. Everything else is `unrecognized`
 * and rendered from its source text.
 */
export type ExpressionShape =
    | { kind: 'name'; identifier: string }
    | { kind: 'constant'; constant: PythonConstant }
    | { kind: 'attribute'; object: SyntaxNode; attribute: string }
    | { kind: 'subscript'; value: SyntaxNode; slices: SyntaxNode[] }
    | { kind: 'union'; left: SyntaxNode; right: SyntaxNode }
    | { kind: 'unrecognized'; node: SyntaxNode };

function classifyConstant(node: SyntaxNode): PythonConstant | null {
    switch (node.type) {
        case 'string':
        case 'concatenated_string': {
            const value = evaluateStringNode(node);
            return value === null ? null : { type: 'str', value };
        }
        case 'integer':
            return { type: 'int', text: node.text };
        case 'float':
            return { type: 'float', text: node.text };
        case 'true':
            return { type: 'bool', value: true };
        case 'false':
            return { type: 'bool', value: false };
        case 'none':
            return { type: 'none' };
        case 'ellipsis':
            return { type: 'ellipsis' };
        default:
            return null;
    }
}

export function classifyExpression(node: SyntaxNode): ExpressionShape {
    if (node.type === 'identifier') {
        return { kind: 'name', identifier: node.text };
    }

    const constant = classifyConstant(node);
    if (constant) {
        return { kind: 'constant', constant };
    }

    if (node.type === 'attribute') {
        const object = node.childForFieldName('object');
        const attribute = node.childForFieldName('attribute');
        if (object && attribute) {
            return { kind: 'attribute', object, attribute: attribute.text };
        }
    }

    // Annotation-only forms: `a.B`, `List[int]`, `int | None`
    const [first, second, ...rest] = node.namedChildren.filter(child => child.type !== 'comment');
    if (first && second && rest.length === 0) {
        if (node.type === 'member_type') {
            return { kind: 'attribute', object: first, attribute: second.text };
        }
        if (node.type === 'union_type') {
            return { kind: 'union', left: first, right: second };
        }
        if (node.type === 'generic_type' && second.type === 'type_parameter') {
            const slices = second.namedChildren.filter(child => child.type !== 'comment');
            if (slices.length > 0) {
                return { kind: 'subscript', value: first, slices };
            }
        }
    }

    return { kind: 'unrecognized', node };
}

function renderInteger(text: string): string {
    const cleaned = text.replace(/_/g, '');
    if (/[jJ]$/.test(cleaned)) return cleaned;
    try {
        return BigInt(cleaned).toString();
    } catch {
        // Not a literal BigInt understands (e.g. py2 long suffix); keep the source
        return text;
    }
}

function renderFloat(text: string): string {
    const cleaned = text.replace(/_/g, '');
    if (/[jJ]$/.test(cleaned)) return cleaned;
    const value = Number(cleaned);
    if (Number.isNaN(value)) return text;
    if (!Number.isFinite(value)) return 'inf';

    const magnitude = Math.abs(value);
    if (value !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
        // Exponent form with at least two exponent digits: 1e-05, 1.5e+16
        return value.toExponential().replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
    }
    const rendered = String(value);
    return /[.e]/.test(rendered) ? rendered : `${rendered}.0`;
}

function renderConstant(constant: PythonConstant): string {
    switch (constant.type) {
        case 'str':
            return pythonStringRepr(constant.value);
        case 'int':
            return renderInteger(constant.text);
        case 'float':
            return renderFloat(constant.text);
        case 'bool':
            return constant.value ? 'True' : 'False';
        case 'none':
            return 'None';
        case 'ellipsis':
            return 'Ellipsis';
    }
}

/**
 * Source text of an expression on one line. Line breaks (and continuation
 * backslashes) collapse to a single space, or to nothing next to a bracket.
 */
export function reconstructSource(node: SyntaxNode): string {
    return node.text.replace(
        /([([{]?)[ \t]*\\?\n\s*([)\]}]?)/g,
        (_match, open: string, close: string) => (open || close ? `${open}${close}` : ' ')
    );
}

/**
 * Renders an expression node (annotation, default value, decorator, base class) as text.
 * `type` wrapper nodes are unwrapped first. Shapes without a dedicated arm fall back
 * to {@link reconstructSource}; rendering never throws on an unknown node type.
 */
export function renderExpression(node: SyntaxNode): string {
    if (node.type === 'type') {
        const inner = node.namedChildren.find(child => child.type !== 'comment');
        if (inner) return renderExpression(inner);
    }

    const shape = classifyExpression(node);
    switch (shape.kind) {
        case 'name':
            return shape.identifier;
        case 'constant':
            return renderConstant(shape.constant);
        case 'attribute':
            return `${renderExpression(shape.object)}.${shape.attribute}`;
        case 'subscript':
            return `${renderExpression(shape.value)}[${shape.slices.map(renderExpression).join(', ')}]`;
        case 'union':
            return `${renderExpression(shape.left)} | ${renderExpression(shape.right)}`;
        case 'unrecognized':
            return reconstructSource(shape.node);
        default: {
            const exhaustive: never = shape;
            return exhaustive;
        }
    }
}
