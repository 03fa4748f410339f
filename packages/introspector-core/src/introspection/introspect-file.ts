import fs from 'fs/promises';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { ScriptNotFoundError, ScriptReadError } from '../utils/errors.js';
import { IntrospectionMode } from '../types/index.js';
import { createIntrospectionStrategy, type StrategyOptions } from './strategies.js';
import { assembleResult } from './result-assembler.js';
import type { IntrospectionResult } from './schema.js';

const logger = createContextLogger('Introspect');

export interface IntrospectOptions extends StrategyOptions {
    mode?: IntrospectionMode;
}

// fatal: invalid UTF-8 is a read failure rather than silently replaced text
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Introspects script bytes already in memory. `scriptPath` names the script
 * in the result and is resolved to an absolute path; it is not read.
 * @throws ScriptReadError when the bytes are not UTF-8.
 */
export async function introspectSource(
    raw: Uint8Array,
    scriptPath: string,
    options: IntrospectOptions = {}
): Promise<IntrospectionResult> {
    const absolutePath = path.resolve(scriptPath);
    let source: string;
    try {
        source = utf8Decoder.decode(raw);
    } catch (error: unknown) {
        throw new ScriptReadError(absolutePath, error);
    }

    const mode = options.mode ?? IntrospectionMode.Safe;
    const strategy = createIntrospectionStrategy(mode, options);
    const script = { name: path.parse(absolutePath).name, path: absolutePath };

    logger.info(`Introspecting ${absolutePath} in ${mode} mode`);
    const metadata = await strategy.introspect(source, script);
    if (metadata.errors.length > 0) {
        logger.warn(`Introspection of ${script.name} recorded ${metadata.errors.length} error(s)`);
    }
    return assembleResult(raw, metadata);
}

/**
 * Reads a script once and introspects it.
 * @throws ScriptNotFoundError when the path does not exist; nothing is produced then.
 * @throws ScriptReadError when the path exists but cannot be read as UTF-8 text.
 */
export async function introspectFile(scriptPath: string, options: IntrospectOptions = {}): Promise<IntrospectionResult> {
    const absolutePath = path.resolve(scriptPath);
    try {
        await fs.access(absolutePath);
    } catch {
        throw new ScriptNotFoundError(absolutePath);
    }

    let raw: Buffer;
    try {
        raw = await fs.readFile(absolutePath);
    } catch (error: unknown) {
        throw new ScriptReadError(absolutePath, error);
    }
    return introspectSource(raw, absolutePath, options);
}
