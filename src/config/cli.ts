/**
 * Command line configuration
 *
 * Flags win over environment variables, which win over defaults. The merged
 * raw values are validated by a zod schema; any problem surfaces as an
 * INVALID_OPTIONS CatalogException.
 */

import { z } from 'zod';
import { DEFAULTS } from '../types/options.js';
import { createInvalidOptionsError } from '../types/errors.js';
import { defaultVariableNames } from '../formula/printer.js';
import { defaultOutputDirectory } from '../report/writer.js';
import { VariableCountSchema, formatIssues } from './schema.js';

export const COMMANDS = ['generate', 'lookup', 'estimate'] as const;
export type Command = typeof COMMANDS[number];

export const ENV_OUTPUT_DIR = 'FORMULA_ATLAS_OUTPUT_DIR';
export const ENV_MAX_FORMULAS = 'FORMULA_ATLAS_MAX_FORMULAS';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface CliConfig {
    command: Command;
    help: boolean;
    version: boolean;
    variableCount: number;
    output: 'text' | 'html';
    maxSize?: number;
    maxFormulas: number;
    evaluation: 'bitwise' | 'per-assignment';
    stopWhenComplete: boolean;
    outDir: string;
    names: string[];
    quiet: boolean;
    formula?: string;
}

/** Flags that take a value, keyed by every accepted spelling */
const VALUE_FLAGS: Readonly<Record<string, keyof RawConfig>> = {
    '-n': 'variableCount',
    '--n': 'variableCount',
    '--variables': 'variableCount',
    '-output': 'output',
    '--output': 'output',
    '-o': 'output',
    '--max-size': 'maxSize',
    '--max-formulas': 'maxFormulas',
    '--evaluation': 'evaluation',
    '--out': 'outDir',
    '--names': 'names',
};

const BOOLEAN_FLAGS: Readonly<Record<string, 'help' | 'version' | 'quiet' | 'stopWhenComplete'>> = {
    '-h': 'help',
    '--help': 'help',
    '-v': 'version',
    '--version': 'version',
    '-q': 'quiet',
    '--quiet': 'quiet',
    '--stop-when-complete': 'stopWhenComplete',
};

interface RawConfig {
    variableCount?: string;
    output?: string;
    maxSize?: string;
    maxFormulas?: string;
    evaluation?: string;
    outDir?: string;
    names?: string;
}

const CliSchema = z.object({
    command: z.enum(COMMANDS),
    help: z.boolean(),
    version: z.boolean(),
    variableCount: z.coerce.number().pipe(VariableCountSchema),
    output: z.enum(['text', 'html']),
    maxSize: z.string().min(1, 'Expected a size, got an empty value').pipe(z.coerce.number().int().min(0)).optional(),
    maxFormulas: z.coerce.number().int().positive(),
    evaluation: z.enum(['bitwise', 'per-assignment']),
    stopWhenComplete: z.boolean(),
    outDir: z.string().min(1),
    names: z.array(z.string().regex(NAME_PATTERN, 'Variable names must be identifiers')).optional(),
    quiet: z.boolean(),
    formula: z.string().min(1).optional(),
}).superRefine((config, ctx) => {
    if (config.names !== undefined) {
        if (config.names.length !== config.variableCount) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['names'],
                message: `Expected ${config.variableCount} variable name(s), got ${config.names.length}`,
            });
        }
        if (new Set(config.names).size !== config.names.length) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['names'], message: 'Variable names must be distinct' });
        }
    }
    if (config.command === 'lookup' && config.formula === undefined && !config.help && !config.version) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['formula'], message: 'lookup needs a formula argument' });
    }
});

/**
 * Parse process arguments (without node and script path) into a validated config
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
    const raw: RawConfig = {};
    const switches = { help: false, version: false, quiet: false, stopWhenComplete: false };
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.startsWith('-') ? arg.indexOf('=') : -1;
        const flag = eq > 0 ? arg.slice(0, eq) : arg;

        const booleanKey = BOOLEAN_FLAGS[flag];
        if (booleanKey !== undefined) {
            switches[booleanKey] = true;
            continue;
        }

        const valueKey = VALUE_FLAGS[flag];
        if (valueKey !== undefined) {
            if (eq > 0) {
                raw[valueKey] = arg.slice(eq + 1);
            } else if (i + 1 < argv.length) {
                raw[valueKey] = argv[++i];
            } else {
                throw createInvalidOptionsError(`Option ${flag} needs a value`);
            }
            continue;
        }

        if (arg.startsWith('-') && arg.length > 1 && !positional.includes('lookup')) {
            throw createInvalidOptionsError(`Unknown option '${arg}'`);
        }
        positional.push(arg);
    }

    const [first, ...rest] = positional;
    let command: string = 'generate';
    let formula: string | undefined;
    if (first !== undefined) {
        command = first;
        if (first === 'lookup') {
            formula = rest.length > 0 ? rest.join(' ') : undefined;
        } else if (rest.length > 0) {
            throw createInvalidOptionsError(`Unexpected argument '${rest[0]}'`);
        }
    }

    const parsed = CliSchema.safeParse({
        command,
        ...switches,
        variableCount: raw.variableCount ?? DEFAULTS.variableCount,
        output: raw.output ?? DEFAULTS.outputMode,
        maxSize: raw.maxSize,
        maxFormulas: raw.maxFormulas ?? env[ENV_MAX_FORMULAS] ?? DEFAULTS.maxFormulas,
        evaluation: raw.evaluation ?? DEFAULTS.evaluation,
        outDir: raw.outDir ?? env[ENV_OUTPUT_DIR] ?? defaultOutputDirectory(),
        names: raw.names?.split(',').map(name => name.trim()),
        formula,
    });

    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw createInvalidOptionsError(`Invalid arguments: ${issues.join('; ')}`, issues);
    }

    const { names, ...config } = parsed.data;
    return { ...config, names: names ?? defaultVariableNames(config.variableCount) };
}
