// packages/introspector-core/tests/introspection/result-assembler.spec.ts
import { describe, it, expect } from 'vitest';
import { assembleResult, getInterpreterVersion, serializeResult } from '../../src/introspection/result-assembler.js';
import { computeContentHash } from '../../src/introspection/content-hash.js';
import { createFallbackMetadata, SCHEMA_VERSION } from '../../src/introspection/schema.js';
import { ErrorKind } from '../../src/types/index.js';

const script = { name: 'hello', path: '/scripts/hello.py' };
const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('result-assembler', () => {

    it('should hash the raw bytes with SHA-256', () => {
        expect(computeContentHash(encode('hello'))).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
        expect(computeContentHash(new Uint8Array())).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should produce the same hash whatever metadata is wrapped', () => {
        const raw = encode('def broken(:\n');
        const success = assembleResult(raw, { ...createFallbackMetadata(script, []), docstring: 'Doc.' });
        const failure = assembleResult(raw, createFallbackMetadata(script, [
            { kind: ErrorKind.SyntaxError, message: 'invalid syntax (hello.py, line 1)', line: 1 },
        ]));

        expect(success.content_hash).toBe(failure.content_hash);
        expect(success.content_hash).toBe(computeContentHash(raw));
    });

    it('should order the envelope fields and stamp the schema version', () => {
        const result = assembleResult(encode('pass\n'), createFallbackMetadata(script, []), 'Node.js 20.0.0');

        expect(Object.keys(result)).toEqual(['schema_version', 'interpreter_version', 'content_hash', 'metadata']);
        expect(result.schema_version).toBe(SCHEMA_VERSION);
        expect(result.interpreter_version).toBe('Node.js 20.0.0');
    });

    it('should identify the running runtime by default', () => {
        expect(getInterpreterVersion()).toBe(`Node.js ${process.versions.node}`);
        expect(assembleResult(encode(''), createFallbackMetadata(script, [])).interpreter_version).toBe(getInterpreterVersion());
    });

    it('should serialize non-ASCII text verbatim and pretty-printed', () => {
        const metadata = { ...createFallbackMetadata(script, []), docstring: 'Grüße ✓' };
        const text = serializeResult(assembleResult(encode('"""Grüße ✓"""\n'), metadata, 'Node.js 20.0.0'));

        expect(text).toContain('"docstring": "Grüße ✓"');
        expect(text.split('\n')[1]).toBe(`  "schema_version": "${SCHEMA_VERSION}",`);
    });

    it('should serialize identical inputs to identical text', () => {
        const raw = encode('import os\n');
        const first = serializeResult(assembleResult(raw, createFallbackMetadata(script, []), 'Node.js 20.0.0'));
        const second = serializeResult(assembleResult(raw, createFallbackMetadata(script, []), 'Node.js 20.0.0'));

        expect(first).toBe(second);
    });
});
