#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createContextLogger, AppError } from '@scriptscope/introspector-core';
import { registerIntrospectCommand } from './cli/introspect.js';

const logger = createContextLogger('App');

// package.json sits one level above both src/ and dist/
function getPackageVersion(): string {
    try {
        const pkgPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../package.json');
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
        return '0.0.0';
    } catch (error) {
        logger.warn('Could not read package.json for version.', { error });
        return '0.0.0';
    }
}

function createProgram(): Command {
    const program = new Command();

    program
        .name('scriptscope')
        .version(getPackageVersion(), '-v, --version', 'Output the current version')
        .description('Static introspection of single-file Python scripts.');

    registerIntrospectCommand(program);
    return program;
}

async function main(): Promise<void> {
    logger.debug('Starting CLI application...');

    try {
        await createProgram().parseAsync(process.argv);
    } catch (error: unknown) {
        if (error instanceof AppError) {
            logger.error(`Command failed: ${error.message}`, {
                name: error.name,
                context: error.context,
                code: error.code,
            });
        } else if (error instanceof Error) {
            logger.error(`An unexpected error occurred: ${error.message}`, { stack: error.stack });
        } else {
            logger.error('An unexpected non-error exception occurred.', { error });
        }
        process.exitCode = 1;
    }
}

void main();
