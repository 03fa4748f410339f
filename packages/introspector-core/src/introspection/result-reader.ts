import { z } from 'zod';
import { AppError, getErrorMessage } from '../utils/errors.js';
import {
    CliFrameworkName,
    DependencyProvenance,
    EntryPointKind,
    ErrorKind,
} from '../types/index.js';
import type { IntrospectionResult } from './schema.js';

const parameterSchema = z.object({
    name: z.string(),
    type_hint: z.string().nullable(),
    default: z.string().nullable(),
    has_default: z.boolean(),
});

const functionSchema = z.object({
    name: z.string(),
    line: z.number().int(),
    docstring: z.string().nullable(),
    parameters: z.array(parameterSchema),
    returns: z.string().nullable(),
    decorators: z.array(z.string()),
    is_async: z.boolean(),
});

const metadataSchema = z.object({
    name: z.string(),
    path: z.string(),
    description: z.string().nullable(),
    docstring: z.string().nullable(),
    inline_metadata_block: z
        .object({
            dependencies: z.array(z.string()),
            min_interpreter: z.string().nullable(),
            tool_config: z.record(z.unknown()),
        })
        .nullable(),
    dependencies: z.array(
        z.object({
            name: z.string(),
            version_spec: z.string().nullable(),
            provenance: z.nativeEnum(DependencyProvenance),
        })
    ),
    entry_points: z.array(
        z.object({
            name: z.string(),
            callable: z.string(),
            module: z.string().nullable(),
            kind: z.nativeEnum(EntryPointKind),
        })
    ),
    functions: z.array(functionSchema),
    classes: z.array(
        z.object({
            name: z.string(),
            line: z.number().int(),
            docstring: z.string().nullable(),
            methods: z.array(functionSchema),
            base_classes: z.array(z.string()),
        })
    ),
    imports: z.array(
        z.object({
            module: z.string(),
            names: z.array(z.string()),
            alias: z.string().nullable(),
            is_from_import: z.boolean(),
            line: z.number().int(),
        })
    ),
    cli_framework: z
        .object({
            name: z.nativeEnum(CliFrameworkName),
            version: z.string().nullable(),
            detected_commands: z.array(z.string()),
            main_callable: z.string().nullable(),
        })
        .nullable(),
    errors: z.array(
        z.object({
            kind: z.nativeEnum(ErrorKind),
            message: z.string(),
            line: z.number().int().nullable(),
        })
    ),
});

export const introspectionResultSchema: z.ZodType<IntrospectionResult> = z.object({
    schema_version: z.string(),
    interpreter_version: z.string(),
    content_hash: z.string().regex(/^[0-9a-f]{64}$/),
    metadata: metadataSchema,
});

/**
 * Reads back a serialized envelope, e.g. from a host-side cache.
 * @throws AppError with code INVALID_RESULT when the text is not JSON or not an envelope.
 */
export function parseIntrospectionResult(json: string): IntrospectionResult {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (error: unknown) {
        throw new AppError(`Introspection result is not valid JSON: ${getErrorMessage(error)}`, {
            code: 'INVALID_RESULT',
            originalError: error,
        });
    }

    const parsed = introspectionResultSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new AppError(`Introspection result does not match the envelope schema: ${issues.join('; ')}`, {
            code: 'INVALID_RESULT',
            context: { issues },
        });
    }
    return parsed.data;
}
