import { computeContentHash } from './content-hash.js';
import { SCHEMA_VERSION, type IntrospectionResult, type ScriptMetadata } from './schema.js';

/**
 * Identifier of the runtime that produced the envelope.
 */
export function getInterpreterVersion(): string {
    return `Node.js ${process.versions.node}`;
}

/**
 * Wraps metadata in the versioned envelope. The hash is taken over the raw bytes,
 * whether the metadata is a full result or the failure fallback.
 */
export function assembleResult(
    raw: Uint8Array,
    metadata: ScriptMetadata,
    interpreterVersion: string = getInterpreterVersion()
): IntrospectionResult {
    return {
        schema_version: SCHEMA_VERSION,
        interpreter_version: interpreterVersion,
        content_hash: computeContentHash(raw),
        metadata,
    };
}

/**
 * Pretty-printed JSON. Non-ASCII text is written as-is.
 */
export function serializeResult(result: IntrospectionResult): string {
    return JSON.stringify(result, null, 2);
}
