// tests/build/package-layout.spec.ts
import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

function readJson(...segments: string[]): unknown {
    return JSON.parse(fs.readFileSync(path.join(rootDir, ...segments), 'utf-8'));
}

describe('package layout', () => {
    const packages = ['grammar-loader', 'introspector-core'];

    it.each(packages)('should point the runtime entry of %s at its compiled output', (name) => {
        expect(readJson('packages', name, 'package.json')).toMatchObject({
            main: './dist/index.js',
            exports: {
                '.': {
                    development: './src/index.ts',
                    types: './dist/index.d.ts',
                    default: './dist/index.js',
                },
            },
            scripts: { build: 'tsc -p tsconfig.build.json' },
        });
    });

    it.each(packages)('should compile %s from src/ into dist/ without the development condition', (name) => {
        expect(readJson('packages', name, 'tsconfig.build.json')).toMatchObject({
            compilerOptions: { rootDir: 'src', outDir: 'dist', declaration: true, customConditions: [] },
        });
    });

    it('should build the packages before the CLI and expose the compiled CLI', () => {
        expect(readJson('package.json')).toMatchObject({
            bin: { scriptscope: 'dist/index.js' },
            scripts: { build: 'npm run build --workspaces && tsc -p tsconfig.build.json' },
        });
        expect(readJson('tsconfig.build.json')).toMatchObject({
            compilerOptions: { rootDir: 'src', outDir: 'dist', customConditions: [] },
        });
    });

    it('should declare only what the CLI imports at the root', () => {
        const manifest = readJson('package.json');
        const dependencies = typeof manifest === 'object' && manifest !== null && 'dependencies' in manifest
            ? manifest.dependencies
            : null;
        if (typeof dependencies !== 'object' || dependencies === null) {
            throw new Error('Root package.json has no dependencies');
        }

        expect(Object.keys(dependencies).sort()).toEqual(['@scriptscope/introspector-core', 'commander']);
    });

    it('should type-check against package sources through the development condition', () => {
        expect(readJson('tsconfig.json')).toMatchObject({
            compilerOptions: { customConditions: ['development'] },
        });
    });
});
