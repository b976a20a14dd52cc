#!/usr/bin/env node
/**
 * Command line interface.
 *
 * ```
 * convert <file> [--format=html|tiptap|spec] [--pages=N] [--output=path] [--verbose]
 * render <spec.json> [--format=html|tiptap] [--output=path] [--verbose]
 * ```
 *
 * Output goes to `--output` when given, to stdout otherwise.
 */

import * as fs from 'fs';
import { pathToFileURL } from 'url';
import { DocumentConverter, isRenderFormat } from './DocumentConverter';
import { parseSpecDocument } from './spec/specSchema';
import { ConverterConfig, SpecNode } from './types';
import { ConverterErrorType, getConverterError, getErrorMessage, getWrappedError } from './utils/errorUtils';

export const USAGE = `Usage:
  convert <file> [--format=html|tiptap|spec] [--pages=N] [--output=path] [--verbose]
  render <spec.json> [--format=html|tiptap] [--output=path] [--verbose]`;

export type CliFormat = 'html' | 'tiptap' | 'spec';

export interface CliCommand {
    command: 'convert' | 'render';
    file: string;
    format: CliFormat;
    pages?: number;
    output?: string;
    verbose: boolean;
}

/**
 * Parses the arguments following the script name.
 *
 * @returns The command, or a message describing what is wrong with the arguments
 */
export const parseCliArgs = (args: string[]): CliCommand | { error: string } => {
    const [command, ...rest] = args;
    if (command !== 'convert' && command !== 'render') {
        return { error: command ? `Unknown command ${command}` : 'Missing command' };
    }

    const positional: string[] = [];
    const options = new Map<string, string>();
    for (const arg of rest) {
        if (arg.startsWith('--')) {
            const [key, ...value] = arg.slice(2).split('=');
            options.set(key, value.join('='));
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 1) {
        return { error: `Expected exactly one file, got ${positional.length}` };
    }

    const format = options.get('format') || 'html';
    if (format !== 'spec' && !isRenderFormat(format)) {
        return { error: `Unsupported format ${format}` };
    }
    if (command === 'render' && format === 'spec') {
        return { error: 'render writes html or tiptap' };
    }

    let pages: number | undefined;
    const pagesOption = options.get('pages');
    if (pagesOption !== undefined) {
        pages = Number(pagesOption);
        if (pagesOption.trim() === '' || !Number.isInteger(pages) || pages < 0) {
            return { error: pagesOption ? `Invalid page count ${pagesOption}` : 'Missing page count' };
        }
    }
    if (options.get('verbose')) {
        return { error: '--verbose takes no value' };
    }

    for (const key of options.keys()) {
        if (!['format', 'pages', 'output', 'verbose'].includes(key)) {
            return { error: `Unknown option --${key}` };
        }
    }

    return {
        command,
        file: positional[0],
        format,
        pages,
        output: options.get('output') || undefined,
        verbose: options.has('verbose')
    };
};

const readInputFile = (file: string, config: ConverterConfig): Buffer => {
    if (!fs.existsSync(file)) {
        throw getConverterError(ConverterErrorType.FILE_DOES_NOT_EXIST, config, file);
    }
    if (fs.lstatSync(file).isDirectory()) {
        throw getConverterError(ConverterErrorType.LOCATION_NOT_FOUND, config, file);
    }
    return fs.readFileSync(file);
};

const formatSpec = (spec: SpecNode, format: CliFormat, config: ConverterConfig): string =>
    format === 'spec' ? JSON.stringify(spec, null, 2) : DocumentConverter.renderSpec(spec, format, config);

/**
 * Runs a parsed command and returns the text it produces.
 */
export const runCommand = async (cli: CliCommand): Promise<string> => {
    const config: ConverterConfig = { outputErrorToConsole: cli.verbose };
    const buffer = readInputFile(cli.file, config);

    if (cli.command === 'convert') {
        const { spec } = await DocumentConverter.convertBuffer(buffer, config, cli.pages);
        return formatSpec(spec, cli.format, config);
    }

    let json: unknown;
    try {
        json = JSON.parse(buffer.toString('utf8'));
    } catch (e) {
        throw getConverterError(ConverterErrorType.INVALID_SPEC, config, getErrorMessage(e));
    }
    return formatSpec(parseSpecDocument(json, config), cli.format, config);
};

/**
 * Entry point: returns the process exit code.
 */
export const main = async (args: string[]): Promise<number> => {
    const cli = parseCliArgs(args);
    if ('error' in cli) {
        console.error(`${cli.error}\n\n${USAGE}`);
        return 1;
    }

    try {
        const output = await runCommand(cli);
        if (cli.output) {
            await fs.promises.writeFile(cli.output, output, 'utf8');
        } else {
            process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
        }
        return 0;
    } catch (e) {
        console.error(getWrappedError(e, {}, cli.file).message);
        return 1;
    }
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    process.exitCode = await main(process.argv.slice(2));
}
