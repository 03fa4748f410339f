import { Command, Option } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import {
    AppError,
    IntrospectionMode,
    createContextLogger,
    getErrorMessage,
    introspectFile,
    isIntrospectionMode,
    serializeResult,
    type ImportEnhancer,
} from '@scriptscope/introspector-core';

const logger = createContextLogger('IntrospectCmd');

interface IntrospectCommandOptions {
    mode: string;
    output?: string;
}

export interface IntrospectCommandDeps {
    /** Enhancer used in import mode; the engine default when omitted. */
    enhancer?: ImportEnhancer;
    /** Where the envelope goes when no output path is given. */
    stdout?: { write(text: string): unknown };
}

/**
 * `introspect <script>`: the default command. Writes the JSON envelope to stdout
 * or to `--output`. Exit code 1 when the script is missing or unreadable; a result
 * whose `errors` list is populated still exits 0.
 */
export function registerIntrospectCommand(program: Command, deps: IntrospectCommandDeps = {}): void {
    program
        .command('introspect <script>', { isDefault: true })
        .description('Statically introspect a single-file Python script and print its metadata as JSON.')
        .addOption(
            new Option('-m, --mode <mode>', 'Trust tier: safe never executes the script, import may')
                .choices(Object.values(IntrospectionMode))
                .default(IntrospectionMode.Safe)
        )
        .option('-o, --output <path>', 'Write the result to a file instead of stdout')
        .action(async (script: string, options: IntrospectCommandOptions) => {
            if (!isIntrospectionMode(options.mode)) {
                logger.error(`Unknown mode: ${options.mode}`);
                process.exitCode = 1;
                return;
            }

            try {
                const result = await introspectFile(script, { mode: options.mode, enhancer: deps.enhancer });
                const text = `${serializeResult(result)}\n`;

                if (options.output) {
                    const outputPath = path.resolve(options.output);
                    await fs.writeFile(outputPath, text, 'utf-8');
                    logger.info(`Wrote introspection result to ${outputPath}`);
                } else {
                    (deps.stdout ?? process.stdout).write(text);
                }
            } catch (error: unknown) {
                if (error instanceof AppError) {
                    logger.error(`Introspection aborted: ${error.message}`, { code: error.code, context: error.context });
                } else {
                    logger.error(`An unexpected error occurred: ${getErrorMessage(error)}`, {
                        stack: error instanceof Error ? error.stack : undefined,
                    });
                }
                process.exitCode = 1;
            }
        });
}
