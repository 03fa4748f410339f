import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { ErrorKind, IntrospectionMode } from '../types/index.js';
import { SyntaxAnalyzer } from '../analyzer/syntax-analyzer.js';
import { parseInlineMetadataBlock } from '../metadata/inline-metadata-parser.js';
import { resolveDependencies } from '../dependencies/dependency-resolver.js';
import { detectCliFramework } from '../dependencies/cli-framework-detector.js';
import { PlaceholderImportEnhancer, type ImportEnhancer } from './import-enhancer.js';
import { createFallbackMetadata, type ScriptIdentity, type ScriptMetadata } from './schema.js';

const logger = createContextLogger('IntrospectionStrategy');

export interface IntrospectionStrategy {
    readonly mode: IntrospectionMode;
    introspect(source: string, script: ScriptIdentity): Promise<ScriptMetadata>;
}

export interface StrategyOptions {
    analyzer?: SyntaxAnalyzer;
    /** Used by the Import tier only. */
    enhancer?: ImportEnhancer;
}

/**
 * Static analysis only. The target script is parsed, never loaded or executed.
 */
export class SafeIntrospectionStrategy implements IntrospectionStrategy {
    public readonly mode = IntrospectionMode.Safe;
    private readonly analyzer: SyntaxAnalyzer;

    constructor(analyzer: SyntaxAnalyzer = new SyntaxAnalyzer()) {
        this.analyzer = analyzer;
    }

    async introspect(source: string, script: ScriptIdentity): Promise<ScriptMetadata> {
        const analysis = this.analyzer.analyze(source, path.basename(script.path));
        if (!analysis.ok) {
            return createFallbackMetadata(script, [analysis.error]);
        }

        try {
            const { structure } = analysis;
            const block = parseInlineMetadataBlock(source);
            return {
                name: script.name,
                path: script.path,
                description: structure.description,
                docstring: structure.docstring,
                inline_metadata_block: block,
                dependencies: resolveDependencies(block, structure.imports),
                entry_points: structure.entryPoints,
                functions: structure.functions,
                classes: structure.classes,
                imports: structure.imports,
                cli_framework: detectCliFramework(structure.imports),
                errors: [],
            };
        } catch (error: unknown) {
            const message = `Introspection failed: ${getErrorMessage(error)}`;
            logger.error(message);
            return createFallbackMetadata(script, [{ kind: ErrorKind.RuntimeError, message, line: null }]);
        }
    }
}

/**
 * Safe tier followed by one enhancement step that is allowed to execute the target.
 * A failing enhancement is recorded as an ImportError next to the Safe-tier results.
 */
export class ImportIntrospectionStrategy implements IntrospectionStrategy {
    public readonly mode = IntrospectionMode.Import;
    private readonly safe: SafeIntrospectionStrategy;
    private readonly enhancer: ImportEnhancer;

    constructor(safe: SafeIntrospectionStrategy, enhancer: ImportEnhancer = new PlaceholderImportEnhancer()) {
        this.safe = safe;
        this.enhancer = enhancer;
    }

    async introspect(source: string, script: ScriptIdentity): Promise<ScriptMetadata> {
        const metadata = await this.safe.introspect(source, script);

        // Target code may run past this point
        logger.info(`Running import enhancer '${this.enhancer.name}' on ${script.path}`);
        try {
            return await this.enhancer.enhance(metadata, { script, source });
        } catch (error: unknown) {
            const message = `Import-based analysis failed: ${getErrorMessage(error)}`;
            logger.warn(message);
            return { ...metadata, errors: [...metadata.errors, { kind: ErrorKind.ImportError, message, line: null }] };
        }
    }
}

export function createIntrospectionStrategy(mode: IntrospectionMode, options: StrategyOptions = {}): IntrospectionStrategy {
    const safe = new SafeIntrospectionStrategy(options.analyzer);
    switch (mode) {
        case IntrospectionMode.Safe:
            return safe;
        case IntrospectionMode.Import:
            return new ImportIntrospectionStrategy(safe, options.enhancer);
    }
}
