import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'node:fs';

import { analyzeDirectory, analyzeSingleFile } from './index.js';
import { effectiveFormat, loadConfigFile, resolveConfig } from './core/config-loader.js';
import { errorMessage, IoError } from './core/errors.js';
import { AnalysisConfigFile, OUTPUT_FORMATS, OutputFormat } from './core/types/index.js';
import { formatOutput, formatSingleFile } from './output/formatter.js';

const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson: { version: string } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));

/** Options as commander hands them to the action. Absent flags stay `undefined`. */
export interface CliOptions {
    format?: OutputFormat;
    detail?: boolean;
    ignore: string[];
    followLinks?: boolean;
    maxDepth?: number;
    config?: string;
}

/** Where the report is written. */
export interface CliOutput {
    stdout: (text: string) => void;
}

const consoleOutput: CliOutput = {
    stdout: text => console.log(text),
};

export function parseMaxDepth(value: string): number {
    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidArgumentError('Must be a non-negative integer.');
    }
    return Number(value);
}

function collectPattern(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/**
 * Analyzes `target` (file or directory) and returns the rendered report.
 * Diagnostics go to stderr so that stdout carries only the report.
 */
export async function runAnalysis(target: string, options: CliOptions): Promise<string> {
    let fileConfig: AnalysisConfigFile = {};
    if (options.config) {
        console.error(`📜 Loading configuration from: ${options.config}`);
        fileConfig = loadConfigFile(options.config);
    }

    const config = resolveConfig({
        format: options.format,
        detail: options.detail,
        ignore: options.ignore,
        followLinks: options.followLinks,
        maxDepth: options.maxDepth,
    }, fileConfig);
    const format = effectiveFormat(config);

    let stat: fs.Stats;
    try {
        stat = fs.statSync(target);
    } catch (error) {
        throw new IoError(`Cannot access ${target}: ${errorMessage(error)}`, { cause: error });
    }

    if (stat.isFile()) {
        return formatSingleFile(await analyzeSingleFile(target), format);
    }
    if (stat.isDirectory()) {
        return formatOutput(await analyzeDirectory(target, config), format);
    }
    throw new IoError(`${target} is neither a file nor a directory`);
}

/**
 * Builds the `code-stats` command line program.
 * @param output Sink for the rendered report; defaults to the console.
 */
export function createProgram(output: CliOutput = consoleOutput): Command {
    const program = new Command();
    program
        .name('code-stats')
        .description('Analyze code statistics for functions and classes')
        .version(packageJson.version)
        .argument('<path>', 'Path to analyze (file or directory)')
        .addOption(new Option('-f, --format <format>', 'Output format (default: summary)').choices(OUTPUT_FORMATS))
        .option('-d, --detail', 'Show detailed statistics for each file')
        .option('--ignore <pattern>', 'Skip paths containing this substring (repeatable)', collectPattern, [])
        .option('--follow-links', 'Follow symbolic links')
        .option('--max-depth <depth>', 'Maximum depth for directory traversal (default: 100)', parseMaxDepth)
        .option('-c, --config <path>', 'Path to a YAML or JSON configuration file')
        .action(async (target: string, options: CliOptions) => {
            output.stdout(await runAnalysis(target, options));
        });
    return program;
}
