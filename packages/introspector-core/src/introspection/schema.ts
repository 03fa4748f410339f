/**
 * @file Shape of the introspection envelope written by the engine.
 * Property names are the snake_case wire names; the serializer emits them as-is,
 * so object literal key order here is the key order on the wire.
 */
import type {
  CliFrameworkName,
  DependencyProvenance,
  EntryPointKind,
  ErrorKind,
} from '../types/index.js';

/**
 * Bumped whenever the envelope shape changes.
 */
export const SCHEMA_VERSION = '1.0.0';

/**
 * Result of the inline metadata block (`# /// script` ... `# ///`).
 */
export interface InlineMetadataBlock {
  dependencies: string[]; // Raw specifiers, e.g. "click>=8.0.0"
  min_interpreter: string | null; // `requires-python`
  tool_config: Record<string, unknown>; // The `[tool]` table, untouched
}

export interface DependencyInfo {
  name: string;
  version_spec: string | null;
  provenance: DependencyProvenance;
}

export interface EntryPointInfo {
  name: string;
  callable: string;
  module: string | null;
  kind: EntryPointKind;
}

export interface ParameterInfo {
  name: string;
  type_hint: string | null;
  default: string | null;
  has_default: boolean;
}

export interface FunctionInfo {
  name: string;
  line: number; // 1-based line of the `def` keyword
  docstring: string | null;
  parameters: ParameterInfo[];
  returns: string | null;
  decorators: string[];
  is_async: boolean;
}

export interface ClassInfo {
  name: string;
  line: number;
  docstring: string | null;
  methods: FunctionInfo[];
  base_classes: string[];
}

export interface ImportInfo {
  module: string; // Dotted path; relative imports keep their leading dots, bare `from . import x` is ""
  names: string[]; // Empty for `import x`
  alias: string | null;
  is_from_import: boolean;
  line: number;
}

/**
 * Detection is name-only: version, commands and main callable are reserved.
 */
export interface CliFrameworkInfo {
  name: CliFrameworkName;
  version: string | null;
  detected_commands: string[];
  main_callable: string | null;
}

export interface ErrorRecord {
  kind: ErrorKind;
  message: string;
  line: number | null;
}

export interface ScriptMetadata {
  name: string;
  path: string;
  description: string | null;
  docstring: string | null;
  inline_metadata_block: InlineMetadataBlock | null;
  dependencies: DependencyInfo[];
  entry_points: EntryPointInfo[];
  functions: FunctionInfo[];
  classes: ClassInfo[];
  imports: ImportInfo[];
  cli_framework: CliFrameworkInfo | null;
  errors: ErrorRecord[];
}

export interface IntrospectionResult {
  schema_version: string;
  interpreter_version: string;
  content_hash: string;
  metadata: ScriptMetadata;
}

/**
 * Identity of the script being analysed. `path` is absolute.
 */
export interface ScriptIdentity {
  name: string;
  path: string;
}

/**
 * The fixed shape used whenever structural extraction fails.
 * Every list is empty and every optional field is null; only `errors` carries content.
 */
export function createFallbackMetadata(script: ScriptIdentity, errors: ErrorRecord[]): ScriptMetadata {
  return {
    name: script.name,
    path: script.path,
    description: null,
    docstring: null,
    inline_metadata_block: null,
    dependencies: [],
    entry_points: [],
    functions: [],
    classes: [],
    imports: [],
    cli_framework: null,
    errors,
  };
}
