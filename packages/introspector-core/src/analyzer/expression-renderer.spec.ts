// packages/introspector-core/src/analyzer/expression-renderer.spec.ts
import { describe, it, expect, vi } from 'vitest';
import type { SyntaxNode } from 'tree-sitter';
import { ParserFactory } from './parsers/parser-factory.js';
import { classifyExpression, renderExpression } from './expression-renderer.js';

vi.mock('../utils/logger.js', () => {
    const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    return { createContextLogger: vi.fn().mockReturnValue(mockLogger), logger: mockLogger };
});

/**
 * Right-hand side of `value = <expression>`.
 */
function parseExpression(expression: string): SyntaxNode {
    const tree = ParserFactory.parse(`value = ${expression}\n`);
    const assignment = tree.rootNode.firstNamedChild?.firstNamedChild;
    const right = assignment?.childForFieldName('right');
    if (!right) throw new Error(`No expression parsed from: ${expression}`);
    return right;
}

describe('expression-renderer', () => {

    it('should render names and attribute chains', () => {
        expect(renderExpression(parseExpression('sentinel'))).toBe('sentinel');
        expect(renderExpression(parseExpression('os.path.sep'))).toBe('os.path.sep');
    });

    it('should render integers in canonical form', () => {
        expect(renderExpression(parseExpression('1_000'))).toBe('1000');
        expect(renderExpression(parseExpression('0x1F'))).toBe('31');
    });

    it('should render floats the way the interpreter prints them', () => {
        expect(renderExpression(parseExpression('1.50'))).toBe('1.5');
        expect(renderExpression(parseExpression('2.0'))).toBe('2.0');
        expect(renderExpression(parseExpression('1e20'))).toBe('1e+20');
        expect(renderExpression(parseExpression('0.00001'))).toBe('1e-05');
    });

    it('should render singleton constants', () => {
        expect(renderExpression(parseExpression('True'))).toBe('True');
        expect(renderExpression(parseExpression('None'))).toBe('None');
        expect(renderExpression(parseExpression('...'))).toBe('Ellipsis');
    });

    it('should render string constants with canonical quotes', () => {
        expect(renderExpression(parseExpression('"hi"'))).toBe("'hi'");
        expect(renderExpression(parseExpression('"it\'s"'))).toBe('"it\'s"');
        expect(renderExpression(parseExpression('"a" "b"'))).toBe("'ab'");
    });

    it('should render subscripts with normalised separators', () => {
        expect(renderExpression(parseExpression('Dict[str,int]'))).toBe('Dict[str, int]');
    });

    it('should fall back to the source text for shapes without a dedicated renderer', () => {
        const call = parseExpression('make(1, key="v")');
        expect(classifyExpression(call).kind).toBe('unrecognized');
        expect(renderExpression(call)).toBe('make(1, key="v")');
        expect(renderExpression(parseExpression('-1'))).toBe('-1');
    });

    it('should collapse multi-line expressions onto one line', () => {
        expect(renderExpression(parseExpression('(\n    1,\n    2\n)'))).toBe('(1, 2)');
    });
});
