/**
 * Trust tier selected by the caller. There is no auto-detection.
 */
export enum IntrospectionMode {
    Safe = 'safe',
    Import = 'import',
}

/**
 * Where a dependency entry came from.
 * Declared entries come from the inline metadata block and are authoritative;
 * Inferred entries are guessed from import statements.
 */
export enum DependencyProvenance {
    Declared = 'Declared',
    Inferred = 'Inferred',
}

export enum EntryPointKind {
    MainFunction = 'MainFunction',
    CliCommand = 'CliCommand',
}

/**
 * Tags carried by ErrorRecord. Only SyntaxError, RuntimeError and ImportError
 * are emitted by the engine today; the others are kept so the envelope can
 * describe failures reported by other producers.
 */
export enum ErrorKind {
    SyntaxError = 'SyntaxError',
    RuntimeError = 'RuntimeError',
    ImportError = 'ImportError',
    TypeError = 'TypeError',
    PermissionDenied = 'PermissionDenied',
}

/**
 * Argument-parsing frameworks, listed in detection priority order.
 */
export enum CliFrameworkName {
    Typer = 'typer',
    Click = 'click',
    Argparse = 'argparse',
}

export function isIntrospectionMode(value: string): value is IntrospectionMode {
    return Object.values(IntrospectionMode).some(mode => mode === value);
}
