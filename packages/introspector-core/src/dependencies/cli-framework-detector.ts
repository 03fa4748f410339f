import { CliFrameworkName } from '../types/index.js';
import type { CliFrameworkInfo, ImportInfo } from '../introspection/schema.js';

interface CliFrameworkSignature {
    name: CliFrameworkName;
    /** Import module that marks the framework as present. */
    module: string;
}

/**
 * Known frameworks in priority order. The first one whose module is imported wins,
 * so a script importing both click and typer reports typer.
 */
export const cliFrameworkSignatures: readonly CliFrameworkSignature[] = [
    { name: CliFrameworkName.Typer, module: 'typer' },
    { name: CliFrameworkName.Click, module: 'click' },
    { name: CliFrameworkName.Argparse, module: 'argparse' },
];

/**
 * Infers the argument-parsing framework from the script's imports.
 * Only the name is filled in; version, commands and main callable stay empty.
 */
export function detectCliFramework(imports: ImportInfo[]): CliFrameworkInfo | null {
    const modules = new Set(imports.map(imp => imp.module));
    const match = cliFrameworkSignatures.find(signature => modules.has(signature.module));
    if (!match) return null;
    return { name: match.name, version: null, detected_commands: [], main_callable: null };
}
