#!/usr/bin/env node

/**
 * projprint CLI
 *
 * Print a project's directory trees and selected file contents as one report,
 * or turn a printed tree back into a list of paths.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import clipboard from 'clipboardy';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { stringify } from 'yaml';
import { loadConfig, CONFIG_TEMPLATE, ConfigUnreadableError } from './config/config.js';
import { generateReport, listPaths, README_PATTERN, type PathKind, type ReportEntry } from './context/index.js';

interface PrintOptions {
    config: string;
    clipboard?: boolean;
    dironly?: boolean;
    skipTree?: boolean;
    verbose?: boolean;
}

interface PathsOptions {
    type: string;
    pattern?: string;
    readme?: boolean;
    output?: string;
    clipboard?: boolean;
}

const PATH_KINDS: readonly PathKind[] = ['files', 'dirs', 'both'];

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

function isPathKind(value: string): value is PathKind {
    return PATH_KINDS.some(kind => kind === value);
}

/**
 * Console colour per entry kind. Colour support is chalk's call.
 */
function colorize(entry: ReportEntry, text: string): string {
    switch (entry.kind) {
        case 'directory':
        case 'tree-line':
            return chalk.blue(text);
        case 'heading':
            return chalk.yellow(text);
        case 'diagnostic':
            return entry.inline ? chalk.red(text) : chalk.yellow(text);
        case 'file':
            return text;
    }
}

async function copyToClipboard(text: string): Promise<void> {
    await clipboard.write(text);
    console.log(chalk.green('\nOutput has been copied to the clipboard.'));
}

program
    .name('projprint')
    .description('Print directory trees and file contents of a project as one report')
    .version(pkg.version);

/**
 * Print command - trees, file contents and diagnostics from a config file
 */
program
    .command('print', { isDefault: true })
    .description('Print directory trees and file contents listed in a config file')
    .option('-c, --config <path>', 'Path to the YAML configuration file', 'proj.yml')
    .option('--clipboard', 'Copy the report to the clipboard')
    .option('--dironly', 'Print only the directory trees, no file contents')
    .option('--skip-tree', 'Print only file contents, no directory trees')
    .option('--verbose', 'Print run statistics to stderr')
    .action(async (options: PrintOptions) => {
        try {
            const config = loadConfig(options.config);

            if (options.verbose) {
                console.error(`Config loaded from: ${resolve(options.config)}`);
                console.error(`  dirs: ${config.dirs.length}, files: ${config.files.length}, regexfiles: ${config.regexfiles.length}`);
            }

            const result = generateReport(config, {
                dirOnly: options.dironly ?? false,
                skipTree: options.skipTree ?? false,
                onEntry: (entry, text) => {
                    process.stdout.write(colorize(entry, text));
                },
            });

            if (options.verbose) {
                const t = result.timing;
                console.error(`\nIncluded ${result.fileCount} file(s), ${result.diagnostics.length} diagnostic(s)`);
                console.error(`  select: ${t.selectMs}ms, assemble: ${t.assembleMs}ms, total: ${t.totalMs}ms`);
                console.error(`  Report size: ${(result.text.length / 1024).toFixed(1)}KB`);
            }

            if (options.clipboard) {
                await copyToClipboard(result.text);
            }
        } catch (error) {
            if (error instanceof ConfigUnreadableError) {
                console.error(`Error: ${error.message}`);
            } else {
                console.error('Error:', error instanceof Error ? error.message : error);
            }
            process.exit(1);
        }
    });

/**
 * Paths command - rebuild a path list from a printed tree
 */
program
    .command('paths')
    .description('List the paths encoded in a printed directory tree, as YAML list items')
    .argument('[input]', 'File holding the printed tree (default: read stdin)')
    .option('-t, --type <type>', 'Paths to list: files, dirs, both', 'both')
    .option('-p, --pattern <regex>', 'Only list files whose name matches this regex')
    .option('--readme', 'Only list README.md files')
    .option('-o, --output <file>', 'Also write the list to this file')
    .option('--clipboard', 'Copy the list to the clipboard')
    .action(async (inputFile: string | undefined, options: PathsOptions, command: Command) => {
        try {
            const input = inputFile ? readFileSync(inputFile, 'utf-8') : readFileSync(0, 'utf-8');
            if (!input.trim()) {
                console.error('Error: No input provided. Pass a file or pipe a printed tree on stdin.');
                process.exit(1);
            }

            let type = options.type;
            let pattern = options.pattern;
            if (options.readme) {
                pattern = README_PATTERN;
                if (command.getOptionValueSource('type') !== 'cli') type = 'files';
            }
            if (!isPathKind(type)) {
                console.error(`Error: Invalid type "${type}". Use one of: ${PATH_KINDS.join(', ')}.`);
                process.exit(1);
            }

            const result = listPaths(input, { type, namePattern: pattern });
            console.log(result);

            if (options.output) {
                const absolutePath = resolve(options.output);
                writeFileSync(absolutePath, `${result}\n`, 'utf-8');
                console.error(chalk.green(`Output saved to ${absolutePath}`));
            }
            if (options.clipboard) {
                await copyToClipboard(result);
            }
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'proj.yml')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            writeFileSync(absolutePath, stringify(CONFIG_TEMPLATE), 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: projprint --config ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

await program.parseAsync();
