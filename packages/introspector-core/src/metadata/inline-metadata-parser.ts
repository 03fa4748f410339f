import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { createContextLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { InlineMetadataBlock } from '../introspection/schema.js';

const logger = createContextLogger('InlineMetadataParser');

export const BLOCK_OPEN_MARKER = '# /// script';
export const BLOCK_CLOSE_MARKER = '# ///';

// Only the keys we surface are checked; anything else in the document is ignored
const blockDocumentSchema = z.object({
    dependencies: z.array(z.string()).optional(),
    'requires-python': z.string().optional(),
    tool: z.record(z.unknown()).optional(),
});

const DEPENDENCIES_LINE = /^\s*dependencies\s*=\s*\[(.*)\]/;

/**
 * Body lines between the markers with the comment prefix removed,
 * or null when no complete marker pair exists.
 */
function extractBlockBody(source: string): string | null {
    const lines = source.split(/\r?\n/);
    const openIndex = lines.findIndex(line => line.trim() === BLOCK_OPEN_MARKER);
    if (openIndex === -1) return null;

    const body: string[] = [];
    for (const line of lines.slice(openIndex + 1)) {
        if (line.trim() === BLOCK_CLOSE_MARKER) {
            return body.join('\n');
        }
        const content = line.trimStart();
        if (content.startsWith('#')) {
            const uncommented = content.slice(1);
            body.push(uncommented.startsWith(' ') ? uncommented.slice(1) : uncommented);
        }
    }

    logger.debug('Inline metadata block opened but never closed');
    return null;
}

/**
 * Line-oriented fallback for blocks that are not valid TOML:
 * picks up a single-line `dependencies = [...]` and splits it on commas.
 */
function parseDependenciesLine(body: string): string[] {
    for (const line of body.split('\n')) {
        const match = DEPENDENCIES_LINE.exec(line);
        if (!match) continue;
        return (match[1] ?? '')
            .split(',')
            .map(item => item.trim().replace(/^["']|["']$/g, '').trim())
            .filter(item => item.length > 0);
    }
    return [];
}

/**
 * Finds and parses the inline script metadata block.
 * Absence, an unclosed block or an unreadable block are all "no block": this never throws.
 * @param source - Script text.
 */
export function parseInlineMetadataBlock(source: string): InlineMetadataBlock | null {
    const body = extractBlockBody(source);
    if (body === null) return null;

    try {
        const document = blockDocumentSchema.parse(parseToml(body));
        return {
            dependencies: document.dependencies ?? [],
            min_interpreter: document['requires-python'] ?? null,
            tool_config: document.tool ?? {},
        };
    } catch (error: unknown) {
        logger.warn(`Inline metadata block is not valid TOML, trying line fallback: ${getErrorMessage(error)}`);
    }

    const dependencies = parseDependenciesLine(body);
    if (dependencies.length === 0) {
        return null;
    }
    return { dependencies, min_interpreter: null, tool_config: {} };
}
