/**
 * Base class for failures that stop the engine before an envelope exists.
 * Recoverable problems inside a script never surface as AppError; they are
 * recorded as ErrorRecords in the result instead.
 */
export class AppError extends Error {
    public readonly code?: string;
    public readonly context: Record<string, unknown>;
    public readonly originalError?: unknown;

    constructor(
        message: string,
        options: { code?: string; context?: Record<string, unknown>; originalError?: unknown } = {}
    ) {
        super(message);
        this.name = new.target.name;
        this.code = options.code;
        this.context = options.context ?? {};
        this.originalError = options.originalError;
    }
}

/**
 * The script path does not exist. Raised by the pre-flight check; no envelope is produced.
 */
export class ScriptNotFoundError extends AppError {
    constructor(scriptPath: string) {
        super(`Script not found: ${scriptPath}`, { code: 'NOT_FOUND', context: { scriptPath } });
    }
}

export class ScriptReadError extends AppError {
    constructor(scriptPath: string, originalError: unknown) {
        super(`Failed to read script: ${scriptPath}: ${getErrorMessage(originalError)}`, {
            code: 'READ_FAILED',
            context: { scriptPath },
            originalError,
        });
    }
}

export class GrammarLoadError extends AppError {
    constructor(message: string, originalError?: unknown) {
        super(message, { code: 'GRAMMAR_UNAVAILABLE', originalError });
    }
}

export class ConfigError extends AppError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, { code: 'CONFIG_INVALID', context });
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
