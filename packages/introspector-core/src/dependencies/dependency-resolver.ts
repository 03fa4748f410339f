import { DependencyProvenance } from '../types/index.js';
import type { DependencyInfo, ImportInfo, InlineMetadataBlock } from '../introspection/schema.js';

const VERSION_OPERATORS = ['===', '~=', '!=', '==', '>=', '<=', '>', '<'] as const;

const REQUIREMENT_NAME = /^\s*([A-Za-z0-9][A-Za-z0-9._-]*)/;
const REQUIREMENT_EXTRAS = /^\s*\[[^\]]*\]/;

/**
 * Splits a requirement specifier into its leading project name and version.
 * `"requests[socks]>=2.28.0; python_version >= '3.8'"` becomes
 * `{ name: "requests", versionSpec: ">=2.28.0" }`. Extras and environment
 * markers are dropped; a bare name or a URL requirement has a null version.
 */
export function splitRequirement(specifier: string): { name: string; versionSpec: string | null } {
    const nameMatch = REQUIREMENT_NAME.exec(specifier);
    if (!nameMatch) {
        return { name: specifier.trim(), versionSpec: null };
    }

    const requirement = specifier.slice(nameMatch[0].length).split(';')[0] ?? '';
    let rest = requirement.replace(REQUIREMENT_EXTRAS, '').trim();
    // Old-style `name (>=1.0)`
    if (rest.startsWith('(') && rest.endsWith(')')) {
        rest = rest.slice(1, -1).trim();
    }

    const hasOperator = VERSION_OPERATORS.some(operator => rest.startsWith(operator));
    return { name: nameMatch[1] ?? '', versionSpec: hasOperator ? rest : null };
}

/**
 * Top-level, absolute imports are dependency candidates. Standard library
 * modules are not filtered out.
 */
function isInferrable(module: string): boolean {
    return module.length > 0 && !module.includes('.') && !module.startsWith('.');
}

/**
 * Declared dependencies (from the inline block) followed by inferred ones (from imports).
 * No deduplication happens across or within the two groups.
 */
export function resolveDependencies(block: InlineMetadataBlock | null, imports: ImportInfo[]): DependencyInfo[] {
    const declared: DependencyInfo[] = (block?.dependencies ?? []).map(specifier => {
        const { name, versionSpec } = splitRequirement(specifier);
        return { name, version_spec: versionSpec, provenance: DependencyProvenance.Declared };
    });

    const inferred: DependencyInfo[] = imports
        .filter(imp => isInferrable(imp.module))
        .map(imp => ({ name: imp.module, version_spec: null, provenance: DependencyProvenance.Inferred }));

    return [...declared, ...inferred];
}
