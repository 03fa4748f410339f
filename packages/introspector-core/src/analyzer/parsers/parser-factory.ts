import TreeSitterParser from 'tree-sitter';
import { getGrammar, type LoadedLanguageGrammar } from '@scriptscope/grammar-loader';
import { createContextLogger } from '../../utils/logger.js';
import { GrammarLoadError, getErrorMessage } from '../../utils/errors.js';

const logger = createContextLogger('ParserFactory');

// Input buffer handed to tree-sitter; strings longer than its default chunk fail to parse
const MIN_BUFFER_SIZE = 64 * 1024;

/**
 * Creates Tree-sitter parsers configured for Python.
 * A fresh parser is created per call so no parser state outlives one invocation.
 */
export class ParserFactory {
    public static createPythonParser(): TreeSitterParser {
        let grammar: LoadedLanguageGrammar;
        try {
            grammar = getGrammar('Python');
        } catch (error: unknown) {
            logger.error(`Could not load the Python grammar: ${getErrorMessage(error)}`);
            throw new GrammarLoadError('Python grammar is unavailable', error);
        }
        const parser = new TreeSitterParser();
        parser.setLanguage(grammar);
        return parser;
    }

    /**
     * Parses Python source into a syntax tree. Syntax errors do not throw;
     * they show up as ERROR or missing nodes in the returned tree.
     */
    public static parse(source: string): TreeSitterParser.Tree {
        const parser = ParserFactory.createPythonParser();
        logger.debug(`Parsing ${source.length} characters of Python source`);
        return parser.parse(source, undefined, {
            bufferSize: Math.max(MIN_BUFFER_SIZE, source.length + 1),
        });
    }
}
