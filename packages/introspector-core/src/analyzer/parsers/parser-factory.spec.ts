// packages/introspector-core/src/analyzer/parsers/parser-factory.spec.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { getGrammar } from '@scriptscope/grammar-loader';
import { ParserFactory } from './parser-factory.js';
import { GrammarLoadError } from '../../utils/errors.js';

// Keep the real loader but let individual tests make it fail
vi.mock('@scriptscope/grammar-loader', async (importOriginal) => {
    const actual = await importOriginal<typeof import('@scriptscope/grammar-loader')>();
    return { ...actual, getGrammar: vi.fn(actual.getGrammar) };
});

vi.mock('../../utils/logger.js', () => {
    const mockLogger = {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    };
    return {
        createContextLogger: vi.fn().mockReturnValue(mockLogger),
        logger: mockLogger,
    };
});

describe('ParserFactory', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should parse Python source into a module tree', () => {
        const tree = ParserFactory.parse('def main():\n    return 1\n');

        expect(tree.rootNode.type).toBe('module');
        expect(tree.rootNode.firstNamedChild?.type).toBe('function_definition');
        expect(getGrammar).toHaveBeenCalledWith('Python');
    });

    it('should parse sources larger than the default input chunk', () => {
        const body = Array.from({ length: 5000 }, (_, i) => `value_${i} = ${i}`).join('\n');
        const tree = ParserFactory.parse(`${body}\n`);

        expect(tree.rootNode.namedChildren).toHaveLength(5000);
        expect(tree.rootNode.lastNamedChild?.startPosition.row).toBe(4999);
    });

    it('should create a new parser on every call', () => {
        expect(ParserFactory.createPythonParser()).not.toBe(ParserFactory.createPythonParser());
    });

    it('should wrap grammar loading failures in GrammarLoadError', () => {
        vi.mocked(getGrammar).mockImplementationOnce(() => {
            throw new Error("Required tree-sitter language package 'tree-sitter-python' is not installed.");
        });

        expect(() => ParserFactory.parse('x = 1\n')).toThrow(GrammarLoadError);
    });
});
