import { createContextLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { config } from '../config/index.js';
import type { ScriptMetadata } from '../introspection/schema.js';
import {
    documentationResponseSchema,
    type DocumentationGenerator,
    type DocumentationRequest,
    type DocumentationResponse,
} from './contract.js';

const logger = createContextLogger('Documentation');

const ELLIPSIS = '...';
const UNKNOWN_ENTRY_POINT = 'Unknown';

/**
 * Shortens a description to at most `maxLength` characters, breaking at a word
 * boundary and appending "...". A single over-long word is cut hard.
 */
export function truncateDescription(text: string, maxLength: number): string {
    const trimmed = text.trim();
    if (trimmed.length <= maxLength) {
        return trimmed;
    }

    const words = trimmed.slice(0, maxLength).split(/\s+/).filter(word => word.length > 0);
    words.pop(); // Possibly cut mid-word
    while (words.length > 0 && words.join(' ').length + ELLIPSIS.length > maxLength) {
        words.pop();
    }
    if (words.length === 0) {
        return `${trimmed.slice(0, Math.max(0, maxLength - ELLIPSIS.length))}${ELLIPSIS}`;
    }
    return `${words.join(' ')}${ELLIPSIS}`;
}

export function buildDocumentationRequest(
    source: string,
    metadata: ScriptMetadata,
    maxLength: number = config.documentationMaxLength
): DocumentationRequest {
    return {
        script_content: source,
        entry_point: metadata.entry_points[0]?.kind ?? UNKNOWN_ENTRY_POINT,
        functions: metadata.functions.map(fn => ({ name: fn.name, docstring: fn.docstring })),
        dependencies: [...new Set(metadata.dependencies.map(dep => dep.name))],
        current_description: metadata.description ?? '',
        max_length: maxLength,
    };
}

/**
 * Calls a generator and normalises its reply. Never throws: generator failures and
 * malformed replies come back as `success: false` with the reason in `error`.
 */
export async function requestDocumentation(
    generator: DocumentationGenerator,
    request: DocumentationRequest
): Promise<DocumentationResponse> {
    let reply: unknown;
    try {
        reply = await generator.generate(request);
    } catch (error: unknown) {
        logger.warn(`Documentation generator failed: ${getErrorMessage(error)}`);
        return { success: false, description: null, error: getErrorMessage(error) };
    }

    const parsed = documentationResponseSchema.safeParse(reply);
    if (!parsed.success) {
        logger.warn('Documentation generator returned a malformed response');
        return { success: false, description: null, error: `Invalid generator response: ${parsed.error.message}` };
    }

    const response = parsed.data;
    if (!response.success || response.description === null) {
        return { success: false, description: null, error: response.error ?? 'Generator returned no description' };
    }
    return { success: true, description: truncateDescription(response.description, request.max_length), error: null };
}
