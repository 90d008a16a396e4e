#!/usr/bin/env node
/**
 * CLI Entry Point — svg-icons
 *
 * Usage:
 *   svg-icons list [set] [--config <svg-icons.yaml>]
 *   svg-icons render <name> [--class <class>] [--config <svg-icons.yaml>]
 *
 * @module
 */
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import pc from 'picocolors';
import { loadConfig } from './config/ConfigLoader.js';
import { createFactory } from './config/IconsConfig.js';

// ── Arg Parsing ──────────────────────────────────────────

export interface CliArgs {
    readonly command: string;
    /** Positional argument after the command */
    readonly target?: string;
    readonly config?: string;
    readonly className?: string;
    readonly help: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    let help = command === '--help' || command === '-h';

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '--class':
                result['className'] = args[++i];
                break;
            case '-h':
            case '--help':
                help = true;
                break;
            default:
                if (arg !== undefined && result['target'] === undefined) result['target'] = arg;
        }
    }

    return {
        command,
        help,
        ...(result['target'] !== undefined ? { target: result['target'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        ...(result['className'] !== undefined ? { className: result['className'] } : {}),
    };
}

// ── Commands ─────────────────────────────────────────────

/** Output sinks, injectable for tests */
export interface CliIO {
    readonly cwd: string;
    out(line: string): void;
    err(line: string): void;
}

/** Run a parsed command. Returns the process exit code. */
export function runCommand(args: CliArgs, io: CliIO): number {
    if (args.help || args.command === '') {
        io.out(HELP);
        return 0;
    }

    try {
        const config = loadConfig(args.config, io.cwd);
        const factory = createFactory(config, { baseDir: io.cwd });

        switch (args.command) {
            case 'list': {
                const sets = args.target !== undefined ? [args.target] : [...factory.all().keys()];
                for (const set of sets) {
                    io.out(pc.bold(set));
                    for (const file of factory.getFiles(set)) {
                        io.out(`  ${file.prefixedName}`);
                    }
                }
                return 0;
            }

            case 'render': {
                if (args.target === undefined) {
                    io.err(pc.red('Error: render needs an icon name.'));
                    return 1;
                }
                io.out(factory.svg(args.target, args.className ?? '').render());
                return 0;
            }

            default:
                io.err(pc.red(`Unknown command: "${args.command}"`));
                io.out(HELP);
                return 1;
        }
    } catch (err) {
        io.err(pc.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        return 1;
    }
}

const HELP = `
svg-icons — list and render icons from configured SVG icon sets

USAGE:
  svg-icons <command> [options]

COMMANDS:
  list [set]       List icon names of one set (all sets when omitted)
  render <name>    Print the rendered markup of one icon

OPTIONS:
  -c, --config <file>   Config file (default: auto-detect svg-icons.yaml)
  --class <class>       Extra class for render
  -h, --help            Show this help message

CONFIG FILE (svg-icons.yaml):
  sets:
    default:
      path: resources/svg
      prefix: icon
      class: ''
  filters:
    default: [flag, solid.camera]
  class: ''
`;

// ── Main ─────────────────────────────────────────────────

/** Whether `script` (normally `process.argv[1]`) is this module. */
export function isEntrypoint(script: string | undefined): boolean {
    if (script === undefined || !existsSync(script)) return false;
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntrypoint(process.argv[1])) {
    process.exitCode = runCommand(parseArgs(process.argv), {
        cwd: process.cwd(),
        out: line => console.log(line),
        err: line => console.error(line),
    });
}
