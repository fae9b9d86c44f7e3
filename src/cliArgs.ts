import { createInvalidArgumentError } from './types/errors.js';

/** Flags that never take a value */
const SWITCHES = new Set([
    'help',
    'version',
    'json',
    'collapse',
    'no-collapse',
    'cross-sentences',
]);

/** Flags that take every following value up to the next flag */
const LISTS = new Set(['reference']);

const ALIASES: Record<string, string> = {
    h: 'help',
    v: 'version',
    o: 'out',
    r: 'reference',
};

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    options: Map<string, string[]>;
    switches: Set<string>;
}

/**
 * Parse `trawl <command> [files...] [--flag value | --flag=value | --switch]`.
 * Value flags may repeat; every value is kept in order.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const options = new Map<string, string[]>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--') {
            positionals.push(...argv.slice(i + 1));
            break;
        }
        if (!arg.startsWith('-') || arg === '-') {
            positionals.push(arg);
            continue;
        }

        const body = arg.replace(/^--?/, '');
        const eq = body.indexOf('=');
        const rawName = eq >= 0 ? body.slice(0, eq) : body;
        const name = ALIASES[rawName] ?? rawName;

        if (SWITCHES.has(name)) {
            if (eq >= 0) {
                throw createInvalidArgumentError(`--${name}`, body.slice(eq + 1), 'no value');
            }
            switches.add(name);
            continue;
        }

        let value: string;
        if (eq >= 0) {
            value = body.slice(eq + 1);
        } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
            value = argv[++i];
        } else {
            throw createInvalidArgumentError(`--${name}`, '(missing)', 'a value');
        }

        const values = options.get(name) ?? [];
        values.push(value);
        if (LISTS.has(name)) {
            while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
                values.push(argv[++i]);
            }
        }
        options.set(name, values);
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, options, switches };
}

export function stringOption(args: ParsedArgs, name: string): string | undefined {
    const values = args.options.get(name);
    return values ? values[values.length - 1] : undefined;
}

export function listOption(args: ParsedArgs, name: string): string[] {
    return (args.options.get(name) ?? [])
        .flatMap(v => v.split(','))
        .map(v => v.trim())
        .filter(Boolean);
}

export function numberOption(args: ParsedArgs, name: string): number | undefined;
export function numberOption(args: ParsedArgs, name: string, fallback: number): number;
export function numberOption(args: ParsedArgs, name: string, fallback?: number): number | undefined {
    const raw = stringOption(args, name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
        throw createInvalidArgumentError(`--${name}`, raw, 'a non-negative number');
    }
    return value;
}

export function intOption(args: ParsedArgs, name: string): number | undefined;
export function intOption(args: ParsedArgs, name: string, fallback: number): number;
export function intOption(args: ParsedArgs, name: string, fallback?: number): number | undefined {
    const value = numberOption(args, name);
    if (value === undefined) return fallback;
    if (!Number.isInteger(value)) {
        throw createInvalidArgumentError(`--${name}`, value, 'an integer');
    }
    return value;
}
