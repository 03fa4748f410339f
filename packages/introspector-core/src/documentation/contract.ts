import { z } from 'zod';

/**
 * Input accepted by an external documentation generator.
 */
export interface DocumentationRequest {
    script_content: string;
    /** Kind of the first entry point, or "Unknown". */
    entry_point: string;
    functions: { name: string; docstring: string | null }[];
    dependencies: string[];
    current_description: string;
    max_length: number;
}

export const documentationResponseSchema = z.object({
    success: z.boolean(),
    description: z.string().nullable(),
    error: z.string().nullable(),
});

export type DocumentationResponse = z.infer<typeof documentationResponseSchema>;

/**
 * Anything that turns a request into a description, typically a model-backed service.
 * Its reply is validated before use, hence `unknown`.
 */
export interface DocumentationGenerator {
    generate(request: DocumentationRequest): Promise<unknown>;
}
