// Public API of the introspection engine

// Types and envelope schema
export * from './types/index.js';
export * from './introspection/schema.js';

// Analyzer
export { SyntaxAnalyzer } from './analyzer/syntax-analyzer.js';
export type { SyntaxAnalysis, SyntaxStructure, SourceParser } from './analyzer/syntax-analyzer.js';
export { ParserFactory } from './analyzer/parsers/parser-factory.js';
export { renderExpression } from './analyzer/expression-renderer.js';

// Metadata block and dependencies
export { parseInlineMetadataBlock, BLOCK_OPEN_MARKER, BLOCK_CLOSE_MARKER } from './metadata/inline-metadata-parser.js';
export { resolveDependencies, splitRequirement } from './dependencies/dependency-resolver.js';
export { detectCliFramework, cliFrameworkSignatures } from './dependencies/cli-framework-detector.js';

// Strategies and result
export {
    SafeIntrospectionStrategy,
    ImportIntrospectionStrategy,
    createIntrospectionStrategy,
} from './introspection/strategies.js';
export type { IntrospectionStrategy, StrategyOptions } from './introspection/strategies.js';
export { PlaceholderImportEnhancer } from './introspection/import-enhancer.js';
export type { ImportEnhancer, ImportTarget } from './introspection/import-enhancer.js';
export { computeContentHash } from './introspection/content-hash.js';
export { assembleResult, serializeResult, getInterpreterVersion } from './introspection/result-assembler.js';
export { parseIntrospectionResult, introspectionResultSchema } from './introspection/result-reader.js';
export { introspectFile, introspectSource } from './introspection/introspect-file.js';
export type { IntrospectOptions } from './introspection/introspect-file.js';

// Documentation generator contract
export * from './documentation/index.js';

// Config
export { config, loadConfig } from './config/index.js';
export type { AppConfig } from './config/index.js';

// Utils
export * from './utils/errors.js';
export { logger, createContextLogger } from './utils/logger.js';
