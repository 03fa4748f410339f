import type TreeSitterParser from 'tree-sitter';
import type { SyntaxNode } from 'tree-sitter';
import { createContextLogger } from '../utils/logger.js';
import { AppError, getErrorMessage } from '../utils/errors.js';
import { EntryPointKind, ErrorKind } from '../types/index.js';
import type {
    ClassInfo,
    EntryPointInfo,
    ErrorRecord,
    FunctionInfo,
    ImportInfo,
    ParameterInfo,
} from '../introspection/schema.js';
import { ParserFactory } from './parsers/parser-factory.js';
import { renderExpression } from './expression-renderer.js';
import { cleanDocstring, evaluateStringNode, findInvalidUnicodeEscape } from './string-literal.js';

const logger = createContextLogger('SyntaxAnalyzer');

/**
 * A function literally named this is always a MainFunction entry point.
 */
const MAIN_FUNCTION_NAME = 'main';

/**
 * Attribute-style decorators ending in this attribute (`@click.command()`,
 * `@app.command`) mark a CliCommand entry point.
 */
const COMMAND_DECORATOR_ATTRIBUTE = 'command';

/**
 * Everything the syntax walk extracts from one script, in source order.
 */
export interface SyntaxStructure {
    docstring: string | null;
    description: string | null;
    functions: FunctionInfo[];
    classes: ClassInfo[];
    imports: ImportInfo[];
    entryPoints: EntryPointInfo[];
}

export type SyntaxAnalysis =
    | { ok: true; structure: SyntaxStructure }
    | { ok: false; error: ErrorRecord };

export type SourceParser = (source: string) => TreeSitterParser.Tree;

/**
 * Named children minus comments, which tree-sitter keeps in the tree.
 */
function codeChildren(node: SyntaxNode): SyntaxNode[] {
    return node.namedChildren.filter(child => child.type !== 'comment');
}

/**
 * Pre-order walk without recursion, so deeply nested expressions cannot exhaust the stack.
 * Stops early when the visitor returns true.
 */
function walk(root: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
    const stack: SyntaxNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        if (visit(node) === true) return;
        const children = node.namedChildren;
        for (let i = children.length - 1; i >= 0; i--) {
            const child = children[i];
            if (child) stack.push(child);
        }
    }
}

/**
 * Literal value of a bare string statement at the top of a block, if any.
 */
function leadingStringLiteral(block: SyntaxNode | null): string | null {
    if (!block) return null;
    const first = codeChildren(block)[0];
    if (!first || first.type !== 'expression_statement') return null;
    const expressions = codeChildren(first);
    const only = expressions[0];
    if (expressions.length !== 1 || !only) return null;
    return evaluateStringNode(only);
}

/**
 * A plain positional parameter placed after one with a default, which the
 * grammar accepts. Keyword-only parameters (after `*` or `*args`) are exempt.
 */
function findNonDefaultAfterDefault(parameters: SyntaxNode): SyntaxNode | null {
    let sawDefault = false;
    for (const param of codeChildren(parameters)) {
        switch (param.type) {
            case 'default_parameter':
            case 'typed_default_parameter':
                sawDefault = true;
                break;
            case 'identifier':
                if (sawDefault) return param;
                break;
            case 'typed_parameter':
                if (codeChildren(param)[0]?.type !== 'identifier') return null;
                if (sawDefault) return param;
                break;
            case 'list_splat_pattern':
            case 'dictionary_splat_pattern':
            case 'keyword_separator':
                return null;
        }
    }
    return null;
}

interface RejectedConstruct {
    reason: string;
    at: SyntaxNode;
}

/**
 * Error recovery nodes, plus Python 2 forms and other constructs that
 * tree-sitter parses cleanly but the interpreter refuses.
 */
function rejectedConstruct(node: SyntaxNode, root: SyntaxNode): RejectedConstruct | null {
    if (node.type === 'ERROR') return { reason: 'invalid syntax', at: node };
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) {
        return { reason: `invalid syntax: expected '${node.type}'`, at: node };
    }

    switch (node.type) {
        case 'print_statement':
            return { reason: "Missing parentheses in call to 'print'. Did you mean print(...)?", at: node };
        case 'exec_statement':
            return { reason: "Missing parentheses in call to 'exec'. Did you mean exec(...)?", at: node };
        case 'parameters':
        case 'lambda_parameters': {
            const misplaced = findNonDefaultAfterDefault(node);
            return misplaced
                ? { reason: 'parameter without a default follows parameter with a default', at: misplaced }
                : null;
        }
        case 'string':
            return findInvalidUnicodeEscape(node.text) === null
                ? null
                : { reason: "(unicode error) 'unicodeescape' codec can't decode bytes: illegal Unicode character", at: node };
        default:
            return null;
    }
}

/**
 * @class SyntaxAnalyzer
 * @description Parses Python source with Tree-sitter and extracts the module docstring,
 * functions, classes, imports and entry points in a single walk. The target is never executed.
 */
export class SyntaxAnalyzer {
    private readonly parseSource: SourceParser;

    /**
     * @param parseSource - Parser to use; defaults to the shared Tree-sitter Python factory.
     */
    constructor(parseSource: SourceParser = ParserFactory.parse) {
        this.parseSource = parseSource;
    }

    /**
     * Analyzes one script.
     * A syntax error yields one SyntaxError record; any other failure yields one
     * RuntimeError record. In both cases no structural data is returned.
     * @param source - Script text.
     * @param fileName - Used only in error messages.
     */
    analyze(source: string, fileName: string): SyntaxAnalysis {
        const normalized = source.replace(/\r\n?/g, '\n');

        let tree: TreeSitterParser.Tree;
        try {
            tree = this.parseSource(normalized);
        } catch (error: unknown) {
            // Environment failures (missing grammar) are not a property of the script
            if (error instanceof AppError) throw error;
            return this.runtimeFailure(error);
        }

        try {
            const syntaxError = this.findSyntaxError(tree.rootNode, fileName);
            if (syntaxError) {
                logger.warn(`Syntax error in ${fileName}: ${syntaxError.message}`);
                return { ok: false, error: syntaxError };
            }
            const structure = this.extract(tree.rootNode);
            logger.debug(
                `Extracted ${structure.functions.length} functions, ${structure.classes.length} classes, ` +
                `${structure.imports.length} imports from ${fileName}`
            );
            return { ok: true, structure };
        } catch (error: unknown) {
            return this.runtimeFailure(error);
        }
    }

    private runtimeFailure(error: unknown): SyntaxAnalysis {
        logger.error(`Introspection failed: ${getErrorMessage(error)}`);
        return {
            ok: false,
            error: { kind: ErrorKind.RuntimeError, message: `Introspection failed: ${getErrorMessage(error)}`, line: null },
        };
    }

    /**
     * First construct the interpreter would reject at compile time, in document order.
     */
    private findSyntaxError(root: SyntaxNode, fileName: string): ErrorRecord | null {
        let record: ErrorRecord | null = null;
        walk(root, node => {
            const problem = rejectedConstruct(node, root);
            if (!problem) return false;

            const line = problem.at.startPosition.row + 1;
            record = { kind: ErrorKind.SyntaxError, message: `${problem.reason} (${fileName}, line ${line})`, line };
            return true;
        });
        // Missing nodes are anonymous and never visited through namedChildren; check the raw children too
        return record ?? this.findMissingToken(root, fileName);
    }

    private findMissingToken(root: SyntaxNode, fileName: string): ErrorRecord | null {
        let record: ErrorRecord | null = null;
        walk(root, node => {
            const missing = node.children.find(
                child => child.childCount === 0 && child.startIndex === child.endIndex && child.type.length > 0
            );
            if (!missing) return false;
            const line = missing.startPosition.row + 1;
            record = {
                kind: ErrorKind.SyntaxError,
                message: `invalid syntax: expected '${missing.type}' (${fileName}, line ${line})`,
                line,
            };
            return true;
        });
        return record;
    }

    private extract(root: SyntaxNode): SyntaxStructure {
        const functions: FunctionInfo[] = [];
        const classes: ClassInfo[] = [];
        const imports: ImportInfo[] = [];
        const entryPoints: EntryPointInfo[] = [];

        walk(root, node => {
            switch (node.type) {
                case 'function_definition': {
                    const info = this.handleFunctionDefinition(node);
                    functions.push(info);
                    const entryPoint = this.detectEntryPoint(node, info);
                    if (entryPoint) entryPoints.push(entryPoint);
                    break;
                }
                case 'class_definition':
                    classes.push(this.handleClassDefinition(node));
                    break;
                case 'import_statement':
                    imports.push(...this.handleImport(node));
                    break;
                case 'import_from_statement':
                case 'future_import_statement':
                    imports.push(this.handleImportFrom(node));
                    break;
            }
        });

        const docstring = leadingStringLiteral(root);
        return {
            docstring,
            description: this.describe(docstring),
            functions,
            classes,
            imports,
            entryPoints,
        };
    }

    /**
     * First line of the module docstring, unless it is itself a quote delimiter.
     */
    private describe(docstring: string | null): string | null {
        if (docstring === null) return null;
        const firstLine = (docstring.split('\n')[0] ?? '').trim();
        if (!firstLine || firstLine.startsWith('"""') || firstLine.startsWith("'''")) return null;
        return firstLine;
    }

    // --- Node Handling Methods ---

    /**
     * Decorator expressions of a definition, outermost first.
     */
    private decoratorExpressions(definition: SyntaxNode): SyntaxNode[] {
        const parent = definition.parent;
        if (!parent || parent.type !== 'decorated_definition') return [];
        const expressions: SyntaxNode[] = [];
        for (const decorator of parent.namedChildren) {
            if (decorator.type !== 'decorator') continue;
            const expression = codeChildren(decorator)[0];
            if (expression) expressions.push(expression);
        }
        return expressions;
    }

    /**
     * Handles function and method definitions, including `async def`.
     */
    private handleFunctionDefinition(node: SyntaxNode): FunctionInfo {
        const name = node.childForFieldName('name')?.text ?? '';
        const parametersNode = node.childForFieldName('parameters');
        const returnTypeNode = node.childForFieldName('return_type');
        const docstring = leadingStringLiteral(node.childForFieldName('body'));

        return {
            name,
            line: node.startPosition.row + 1,
            docstring: docstring === null ? null : cleanDocstring(docstring),
            parameters: parametersNode ? this.handleParameters(parametersNode) : [],
            returns: returnTypeNode ? renderExpression(returnTypeNode) : null,
            decorators: this.decoratorExpressions(node).map(renderExpression),
            is_async: node.children.some(child => child.type === 'async'),
        };
    }

    /**
     * Positional parameters (those before `*`, `*args` or `**kwargs`), with defaults
     * matched from the right: with N parameters and D defaults, the last D parameters
     * own the defaults in order.
     */
    private handleParameters(parametersNode: SyntaxNode): ParameterInfo[] {
        const positional: { name: string; typeHint: string | null }[] = [];
        const defaults: string[] = [];

        for (const param of codeChildren(parametersNode)) {
            let nameNode: SyntaxNode | null = null;
            let typeNode: SyntaxNode | null = null;
            let valueNode: SyntaxNode | null = null;

            switch (param.type) {
                case 'identifier':
                    nameNode = param;
                    break;
                case 'typed_parameter': {
                    const target = codeChildren(param)[0];
                    if (!target || target.type !== 'identifier') {
                        // `*args: int` or `**kwargs: str` ends the positional section
                        return this.alignDefaults(positional, defaults);
                    }
                    nameNode = target;
                    typeNode = param.childForFieldName('type');
                    break;
                }
                case 'default_parameter':
                case 'typed_default_parameter':
                    nameNode = param.childForFieldName('name');
                    typeNode = param.childForFieldName('type');
                    valueNode = param.childForFieldName('value');
                    break;
                case 'list_splat_pattern':
                case 'dictionary_splat_pattern':
                case 'keyword_separator':
                    return this.alignDefaults(positional, defaults);
                default:
                    // positional_separator (`/`) and anything unexpected
                    continue;
            }

            if (!nameNode) continue;
            positional.push({ name: nameNode.text, typeHint: typeNode ? renderExpression(typeNode) : null });
            if (valueNode) defaults.push(renderExpression(valueNode));
        }

        return this.alignDefaults(positional, defaults);
    }

    private alignDefaults(positional: { name: string; typeHint: string | null }[], defaults: string[]): ParameterInfo[] {
        const offset = positional.length - defaults.length;
        return positional.map((param, index) => {
            const defaultValue = index >= offset ? defaults[index - offset] ?? null : null;
            return {
                name: param.name,
                type_hint: param.typeHint,
                default: defaultValue,
                has_default: defaultValue !== null,
            };
        });
    }

    /**
     * Handles class definitions. Methods are the functions defined directly in the class body.
     */
    private handleClassDefinition(node: SyntaxNode): ClassInfo {
        const body = node.childForFieldName('body');
        const docstring = leadingStringLiteral(body);
        const methods: FunctionInfo[] = [];

        for (const item of body ? codeChildren(body) : []) {
            const definition = item.type === 'decorated_definition' ? item.childForFieldName('definition') : item;
            if (definition?.type === 'function_definition') {
                methods.push(this.handleFunctionDefinition(definition));
            }
        }

        // Keyword arguments (metaclass=...) and **kwargs are not bases
        const superclasses = node.childForFieldName('superclasses');
        const baseClasses = superclasses
            ? codeChildren(superclasses)
                .filter(arg => arg.type !== 'keyword_argument' && arg.type !== 'dictionary_splat')
                .map(renderExpression)
            : [];

        return {
            name: node.childForFieldName('name')?.text ?? '',
            line: node.startPosition.row + 1,
            docstring: docstring === null ? null : cleanDocstring(docstring),
            methods,
            base_classes: baseClasses,
        };
    }

    /**
     * `import a, b.c as d` yields one record per imported module.
     */
    private handleImport(node: SyntaxNode): ImportInfo[] {
        const line = node.startPosition.row + 1;
        const records: ImportInfo[] = [];
        for (const child of codeChildren(node)) {
            if (child.type === 'dotted_name') {
                records.push({ module: child.text, names: [], alias: null, is_from_import: false, line });
            } else if (child.type === 'aliased_import') {
                records.push({
                    module: child.childForFieldName('name')?.text ?? '',
                    names: [],
                    alias: child.childForFieldName('alias')?.text ?? null,
                    is_from_import: false,
                    line,
                });
            }
        }
        return records;
    }

    /**
     * `from x import a, b as c` yields one record listing the original names.
     * Relative modules keep their leading dots; a bare `from . import x` has module "".
     */
    private handleImportFrom(node: SyntaxNode): ImportInfo {
        const moduleNode = node.childForFieldName('module_name');
        let module = node.type === 'future_import_statement' ? '__future__' : moduleNode?.text ?? '';
        if (moduleNode?.type === 'relative_import' && /^\.+$/.test(module)) {
            module = '';
        }

        const names: string[] = [];
        for (const child of codeChildren(node)) {
            if (moduleNode && child.startIndex === moduleNode.startIndex) continue;
            if (child.type === 'dotted_name') {
                names.push(child.text);
            } else if (child.type === 'aliased_import') {
                names.push(child.childForFieldName('name')?.text ?? '');
            } else if (child.type === 'wildcard_import') {
                names.push('*');
            }
        }

        return { module, names, alias: null, is_from_import: true, line: node.startPosition.row + 1 };
    }

    private detectEntryPoint(node: SyntaxNode, info: FunctionInfo): EntryPointInfo | null {
        if (info.name === MAIN_FUNCTION_NAME) {
            return { name: info.name, callable: info.name, module: null, kind: EntryPointKind.MainFunction };
        }
        if (this.decoratorExpressions(node).some(isCommandDecorator)) {
            return { name: info.name, callable: info.name, module: null, kind: EntryPointKind.CliCommand };
        }
        return null;
    }
}

/**
 * True for `@x.command` and `@x.command(...)`, comparing the last attribute of the chain.
 */
function isCommandDecorator(expression: SyntaxNode): boolean {
    const target = expression.type === 'call' ? expression.childForFieldName('function') : expression;
    return (
        target?.type === 'attribute' &&
        target.childForFieldName('attribute')?.text === COMMAND_DECORATOR_ATTRIBUTE
    );
}
