import { parseCliArgs, ENV_MAX_FORMULAS, ENV_OUTPUT_DIR } from '../src/config/cli.js';
import { defaultOutputDirectory } from '../src/report/writer.js';
import { expectCatalogError } from './fixtures.js';

const NO_ENV = {};

describe('parseCliArgs', () => {
    test('defaults', () => {
        expect(parseCliArgs([], NO_ENV)).toEqual({
            command: 'generate',
            help: false,
            version: false,
            variableCount: 3,
            output: 'text',
            maxSize: undefined,
            maxFormulas: 2_000_000,
            evaluation: 'bitwise',
            stopWhenComplete: false,
            outDir: defaultOutputDirectory(),
            names: ['p1', 'p2', 'p3'],
            quiet: false,
            formula: undefined,
        });
    });

    test('reads -n and -output', () => {
        const config = parseCliArgs(['-n', '2', '-output', 'html'], NO_ENV);
        expect(config.variableCount).toBe(2);
        expect(config.output).toBe('html');
        expect(config.names).toEqual(['p1', 'p2']);
    });

    test('accepts --flag=value', () => {
        const config = parseCliArgs(['--n=4', '--output=text', '--max-size=2', '--evaluation=per-assignment'], NO_ENV);
        expect(config.variableCount).toBe(4);
        expect(config.maxSize).toBe(2);
        expect(config.evaluation).toBe('per-assignment');
    });

    test('boolean switches', () => {
        const config = parseCliArgs(['-q', '--stop-when-complete', '--help'], NO_ENV);
        expect(config.quiet).toBe(true);
        expect(config.stopWhenComplete).toBe(true);
        expect(config.help).toBe(true);
        expect(parseCliArgs(['-v'], NO_ENV).version).toBe(true);
    });

    test('environment supplies defaults that flags override', () => {
        const env = { [ENV_OUTPUT_DIR]: '/tmp/atlas', [ENV_MAX_FORMULAS]: '5000' };
        expect(parseCliArgs([], env)).toMatchObject({ outDir: '/tmp/atlas', maxFormulas: 5000 });
        expect(parseCliArgs(['--out', '/srv/reports', '--max-formulas', '10'], env))
            .toMatchObject({ outDir: '/srv/reports', maxFormulas: 10 });
    });

    test('custom variable names', () => {
        expect(parseCliArgs(['-n', '2', '--names', 'a, b'], NO_ENV).names).toEqual(['a', 'b']);
        const error = expectCatalogError(() => parseCliArgs(['-n', '2', '--names', 'a'], NO_ENV), 'INVALID_OPTIONS');
        expect(error.message).toBe('Invalid arguments: names: Expected 2 variable name(s), got 1');
        expectCatalogError(() => parseCliArgs(['-n', '2', '--names', 'a,a'], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['-n', '2', '--names', '1x,b'], NO_ENV), 'INVALID_OPTIONS');
    });

    test('lookup takes the formula as positional text', () => {
        const config = parseCliArgs(['lookup', '~(p1 & p2)', '-n', '2'], NO_ENV);
        expect(config.command).toBe('lookup');
        expect(config.formula).toBe('~(p1 & p2)');
        expect(config.variableCount).toBe(2);

        expect(parseCliArgs(['lookup', 'p1', '&', 'p2'], NO_ENV).formula).toBe('p1 & p2');
        expect(parseCliArgs(['lookup', '-p1'], NO_ENV).formula).toBe('-p1');
    });

    test('lookup needs a formula', () => {
        const error = expectCatalogError(() => parseCliArgs(['lookup'], NO_ENV), 'INVALID_OPTIONS');
        expect(error.message).toBe('Invalid arguments: formula: lookup needs a formula argument');
    });

    test('estimate command', () => {
        expect(parseCliArgs(['estimate', '-n', '4'], NO_ENV).command).toBe('estimate');
        expect(expectCatalogError(() => parseCliArgs(['estimate', 'extra'], NO_ENV), 'INVALID_OPTIONS').message)
            .toBe("Unexpected argument 'extra'");
    });

    test('rejects bad values', () => {
        expectCatalogError(() => parseCliArgs(['-n', '6'], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['-n', 'three'], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['-output', 'pdf'], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['--max-formulas', '0'], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['frobnicate'], NO_ENV), 'INVALID_OPTIONS');
    });

    test('rejects an empty size ceiling', () => {
        const error = expectCatalogError(() => parseCliArgs(['--max-size='], NO_ENV), 'INVALID_OPTIONS');
        expect(error.message).toBe('Invalid arguments: maxSize: Expected a size, got an empty value');
        expectCatalogError(() => parseCliArgs(['--max-size', ''], NO_ENV), 'INVALID_OPTIONS');
        expectCatalogError(() => parseCliArgs(['--max-size', 'two'], NO_ENV), 'INVALID_OPTIONS');
        expect(parseCliArgs(['--max-size', '0'], NO_ENV).maxSize).toBe(0);
    });

    test('rejects unknown flags and missing values', () => {
        expect(expectCatalogError(() => parseCliArgs(['--bogus'], NO_ENV), 'INVALID_OPTIONS').message)
            .toBe("Unknown option '--bogus'");
        expect(expectCatalogError(() => parseCliArgs(['-n'], NO_ENV), 'INVALID_OPTIONS').message)
            .toBe('Option -n needs a value');
    });
});
