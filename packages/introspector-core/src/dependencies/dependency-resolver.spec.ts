// packages/introspector-core/src/dependencies/dependency-resolver.spec.ts
import { describe, it, expect } from 'vitest';
import { resolveDependencies, splitRequirement } from './dependency-resolver.js';
import { DependencyProvenance } from '../types/index.js';
import type { ImportInfo } from '../introspection/schema.js';

const plainImport = (module: string, line = 1): ImportInfo => ({
    module,
    names: [],
    alias: null,
    is_from_import: false,
    line,
});

describe('dependency-resolver', () => {

    describe('splitRequirement', () => {
        it('should split at the version operator', () => {
            expect(splitRequirement('requests>=2.28.0')).toEqual({ name: 'requests', versionSpec: '>=2.28.0' });
            expect(splitRequirement('numpy==1.26.4')).toEqual({ name: 'numpy', versionSpec: '==1.26.4' });
            expect(splitRequirement('rich')).toEqual({ name: 'rich', versionSpec: null });
        });

        it('should split at the earliest operator of a compound specifier', () => {
            expect(splitRequirement('django>=4,<5')).toEqual({ name: 'django', versionSpec: '>=4,<5' });
        });

        it('should recognise compatible-release and exclusion operators', () => {
            expect(splitRequirement('httpx~=0.27')).toEqual({ name: 'httpx', versionSpec: '~=0.27' });
            expect(splitRequirement('attrs!=23.1.0')).toEqual({ name: 'attrs', versionSpec: '!=23.1.0' });
            expect(splitRequirement('legacy === 1.0')).toEqual({ name: 'legacy', versionSpec: '=== 1.0' });
        });

        it('should drop extras from the name', () => {
            expect(splitRequirement('requests[socks]>=2.31')).toEqual({ name: 'requests', versionSpec: '>=2.31' });
            expect(splitRequirement('uvicorn [standard] == 0.30.1')).toEqual({ name: 'uvicorn', versionSpec: '== 0.30.1' });
        });

        it('should cut environment markers off the name and the version', () => {
            expect(splitRequirement("pkg; python_version<'3.8'")).toEqual({ name: 'pkg', versionSpec: null });
            expect(splitRequirement('rich ; sys_platform == "win32"')).toEqual({ name: 'rich', versionSpec: null });
            expect(splitRequirement('tomli>=2.0; python_version < "3.11"')).toEqual({ name: 'tomli', versionSpec: '>=2.0' });
        });

        it('should accept parenthesised versions and report none for URL requirements', () => {
            expect(splitRequirement('six (>=1.16)')).toEqual({ name: 'six', versionSpec: '>=1.16' });
            expect(splitRequirement('tool @ https://example.com/tool.whl')).toEqual({ name: 'tool', versionSpec: null });
        });

        it('should keep dots, underscores and hyphens in the name', () => {
            expect(splitRequirement('zope.interface>=6')).toEqual({ name: 'zope.interface', versionSpec: '>=6' });
            expect(splitRequirement('typing_extensions')).toEqual({ name: 'typing_extensions', versionSpec: null });
            expect(splitRequirement('python-dateutil<3')).toEqual({ name: 'python-dateutil', versionSpec: '<3' });
        });
    });

    describe('resolveDependencies', () => {
        it('should list declared dependencies before inferred ones without deduplicating', () => {
            const block = { dependencies: ['requests>=2.28.0'], min_interpreter: null, tool_config: {} };
            const imports = [plainImport('os', 7), plainImport('requests', 8)];

            expect(resolveDependencies(block, imports)).toEqual([
                { name: 'requests', version_spec: '>=2.28.0', provenance: DependencyProvenance.Declared },
                { name: 'os', version_spec: null, provenance: DependencyProvenance.Inferred },
                { name: 'requests', version_spec: null, provenance: DependencyProvenance.Inferred },
            ]);
        });

        it('should not infer dotted, relative or bare relative imports', () => {
            const imports = [plainImport('os.path'), plainImport('.helpers'), plainImport(''), plainImport('yaml')];

            expect(resolveDependencies(null, imports)).toEqual([
                { name: 'yaml', version_spec: null, provenance: DependencyProvenance.Inferred },
            ]);
        });

        it('should return an empty list with no block and no imports', () => {
            expect(resolveDependencies(null, [])).toEqual([]);
        });
    });
});
