// packages/introspector-core/src/analyzer/string-literal.spec.ts
import { describe, it, expect } from 'vitest';
import { cleanDocstring, evaluateStringLiteral, findInvalidUnicodeEscape, pythonStringRepr } from './string-literal.js';

describe('string-literal', () => {

    describe('evaluateStringLiteral', () => {
        it('should strip quotes from plain and triple-quoted strings', () => {
            expect(evaluateStringLiteral('"hello"')).toBe('hello');
            expect(evaluateStringLiteral("'hello'")).toBe('hello');
            expect(evaluateStringLiteral('"""doc"""')).toBe('doc');
            expect(evaluateStringLiteral("u'text'")).toBe('text');
        });

        it('should decode escape sequences', () => {
            expect(evaluateStringLiteral('"a\\nb"')).toBe('a\nb');
            expect(evaluateStringLiteral('"tab\\there"')).toBe('tab\there');
            expect(evaluateStringLiteral('"\\x41\\u00e9\\101"')).toBe('Aé' + 'A');
            expect(evaluateStringLiteral('"keep\\q"')).toBe('keep\\q');
        });

        it('should return null for a unicode escape beyond the code point range', () => {
            expect(evaluateStringLiteral('"\\U00110000"')).toBeNull();
            expect(evaluateStringLiteral('"\\U0001F600"')).toBe('\u{1F600}');
        });

        it('should leave raw strings untouched', () => {
            expect(evaluateStringLiteral('r"a\\nb"')).toBe('a\\nb');
        });

        it('should return null for f-strings and bytes', () => {
            expect(evaluateStringLiteral('f"{name}"')).toBeNull();
            expect(evaluateStringLiteral("b'raw'")).toBeNull();
            expect(evaluateStringLiteral("rb'raw'")).toBeNull();
        });
    });

    describe('findInvalidUnicodeEscape', () => {
        it('should return the first out-of-range escape of a text literal', () => {
            expect(findInvalidUnicodeEscape('"ok \\U0010FFFF bad \\U00110000"')).toBe('\\U00110000');
        });

        it('should ignore raw and bytes literals and escaped backslashes', () => {
            expect(findInvalidUnicodeEscape('r"\\U00110000"')).toBeNull();
            expect(findInvalidUnicodeEscape('b"\\U00110000"')).toBeNull();
            expect(findInvalidUnicodeEscape('"\\\\U00110000"')).toBeNull();
        });
    });

    describe('cleanDocstring', () => {
        it('should remove the common indentation and surrounding blank lines', () => {
            const raw = 'Summary.\n\n    Details here.\n    More.\n    ';
            expect(cleanDocstring(raw)).toBe('Summary.\n\nDetails here.\nMore.');
        });

        it('should strip leading whitespace of the first line', () => {
            expect(cleanDocstring('   One line.   ')).toBe('One line.   ');
        });
    });

    describe('pythonStringRepr', () => {
        it('should prefer single quotes', () => {
            expect(pythonStringRepr('world')).toBe("'world'");
        });

        it('should switch to double quotes when the text contains only single quotes', () => {
            expect(pythonStringRepr("it's")).toBe('"it\'s"');
        });

        it('should escape control characters and backslashes', () => {
            expect(pythonStringRepr('a\nb\\c')).toBe("'a\\nb\\\\c'");
        });
    });
});
