// packages/grammar-loader/src/index.ts
import { createRequire } from 'module';
import type Parser from 'tree-sitter';

/**
 * Languages this loader can hand out grammars for.
 */
export type LanguageKey = 'Python';

/**
 * Whatever `Parser#setLanguage` accepts in the installed tree-sitter release.
 */
export type LoadedLanguageGrammar = NonNullable<Parameters<Parser['setLanguage']>[0]>;

// Map LanguageKey to the corresponding tree-sitter package names
const LANGUAGE_PACKAGE_MAP: Record<LanguageKey, string> = {
    Python: 'tree-sitter-python',
};

// Cache for loaded grammars
const loadedGrammars: Map<LanguageKey, LoadedLanguageGrammar> = new Map();

// Grammar packages are native CommonJS addons; load them through require
const requireFunc = createRequire(import.meta.url);

function isLanguageGrammar(value: unknown): value is LoadedLanguageGrammar {
    // Native bindings expose the compiled language handle on `language`
    return typeof value === 'object' && value !== null && 'language' in value;
}

/**
 * Loads and returns the Tree-sitter grammar object for a given language key.
 *
 * @param language The language key.
 * @returns The loaded language grammar object.
 * @throws Error if the grammar package is missing or does not export a grammar.
 */
export function getGrammar(language: LanguageKey): LoadedLanguageGrammar {
    const cached = loadedGrammars.get(language);
    if (cached) {
        return cached;
    }

    const packageName = LANGUAGE_PACKAGE_MAP[language];
    let loadedPackage: unknown;
    try {
        loadedPackage = requireFunc(packageName);
    } catch (error: unknown) {
        const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
        if (code === 'MODULE_NOT_FOUND') {
            throw new Error(`Required tree-sitter language package '${packageName}' is not installed.`, { cause: error });
        }
        throw new Error(`Failed to load parser grammar for ${language}.`, { cause: error });
    }

    if (!isLanguageGrammar(loadedPackage)) {
        throw new Error(`Package '${packageName}' did not export a tree-sitter grammar for ${language}.`);
    }

    loadedGrammars.set(language, loadedPackage);
    return loadedPackage;
}
