#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { parseCliArgs, ENV_MAX_FORMULAS, ENV_OUTPUT_DIR, type CliConfig } from './config/cli.js';
import { createEnumerator } from './enumerator.js';
import { FormulaFactory } from './formula/factory.js';
import { formulaToString } from './formula/printer.js';
import { parse } from './parser/index.js';
import { TruthTableEvaluator } from './evaluator/evaluator.js';
import { estimateClassSizes } from './generator/tractability.js';
import { spinnerProgress } from './progress.js';
import { renderHtmlReport } from './report/html.js';
import { renderTextReport } from './report/text.js';
import { ReportWriter } from './report/writer.js';
import { DEFAULT_MAX_SIZE } from './types/options.js';
import { CatalogException } from './types/errors.js';
import type { EnumerationResult } from './types/catalog.js';

const VERSION = '0.1.0';
const HELP = `
Formula Atlas v${VERSION}

Enumerates boolean formulas over n variables, groups them by truth table and
reports the formulas with the fewest binary operators (&, |, ^) for each table.

Usage:
  formula-atlas [generate] [options]    Catalog formulas and write a report
  formula-atlas lookup "<formula>"      Show a formula's truth table and its minimal equivalents
  formula-atlas estimate [options]      Predict size-class populations without generating

Options:
  -n <1-5>                 Number of variables (default 3)
  -output <text|html>      text: formulalist.txt, html: truthtablesX.htm pages (default text)
  --max-size <k>           Largest operator count to generate (default depends on n)
  --max-formulas <m>       Formula budget for the run (default 2000000)
  --evaluation <mode>      bitwise or per-assignment (default bitwise)
  --stop-when-complete     Stop once every truth table has been found
  --out <dir>              Output directory (default ~/Documents/Formula Atlas)
  --names <a,b,...>        Variable names (default p1..pn)
  --quiet, -q              No spinner or summary
  --help, -h               Show this help
  --version, -v            Show version

Environment:
  ${ENV_OUTPUT_DIR}     Default output directory
  ${ENV_MAX_FORMULAS}   Default formula budget

At present exhaustive enumeration is intractable for n >= 4 beyond small sizes;
runs that hit the size ceiling or budget report the tables found so far.

Examples:
  formula-atlas -n 2 -output html
  formula-atlas lookup "~(p1 & p2) | p3" -n 3
  formula-atlas estimate -n 4 --max-size 4
`;

async function main() {
    const config = parseCliArgs(process.argv.slice(2));

    if (config.help) {
        console.log(HELP);
        return;
    }
    if (config.version) {
        console.log(VERSION);
        return;
    }

    switch (config.command) {
        case 'generate':
            return runGenerate(config);
        case 'lookup':
            return runLookup(config);
        case 'estimate':
            return runEstimate(config);
    }
}

function runEnumeration(config: CliConfig): EnumerationResult {
    const spinner = config.quiet ? undefined : ora(`Enumerating formulas over ${config.variableCount} variable(s)...`).start();
    try {
        const result = createEnumerator({
            variableCount: config.variableCount,
            maxSize: config.maxSize,
            maxFormulas: config.maxFormulas,
            evaluation: config.evaluation,
            stopWhenComplete: config.stopWhenComplete,
            onProgress: spinner ? spinnerProgress(spinner) : undefined,
        }).run();

        const found = `${result.discovered}/${result.possible} truth tables, ${result.formulaCount} formulas`;
        if (result.status === 'complete') {
            spinner?.succeed(`Complete: ${found}`);
        } else {
            spinner?.warn(`Incomplete (${result.reason ?? 'limit reached'}): ${found}`);
        }
        return result;
    } catch (e) {
        spinner?.fail('Enumeration failed');
        throw e;
    }
}

async function runGenerate(config: CliConfig): Promise<void> {
    const start = Date.now();
    const result = runEnumeration(config);

    const files = config.output === 'html'
        ? renderHtmlReport(result.catalog, { names: config.names })
        : renderTextReport(result.catalog, config.names);
    const written = await new ReportWriter(config.outDir).write(files);

    if (config.quiet) return;

    const lines = [
        `${chalk.bold('Variables:')}      ${result.variableCount}`,
        `${chalk.bold('Size classes:')}   0..${result.largestSize} (ceiling ${result.maxSize})`,
        `${chalk.bold('Formulas:')}       ${result.formulaCount}`,
        `${chalk.bold('Truth tables:')}   ${result.discovered} of ${result.possible}`,
        `${chalk.bold('Status:')}         ${result.status === 'complete'
            ? chalk.green('complete')
            : chalk.yellow(`incomplete (${result.reason ?? 'limit reached'})`)}`,
        `${chalk.bold('Output:')}         ${written.length === 1 ? written[0] : `${written.length} files in ${config.outDir}`}`,
    ];
    console.log(boxen(lines.join('\n'), { padding: 1, borderColor: result.status === 'complete' ? 'green' : 'yellow' }));
    console.log(chalk.dim(`Total execution time: ${Date.now() - start}ms`));
}

async function runLookup(config: CliConfig): Promise<void> {
    const factory = new FormulaFactory(config.variableCount);
    const formula = parse(config.formula ?? '', factory, config.names);
    const table = new TruthTableEvaluator(config.variableCount).evaluate(formula);

    console.log(`${chalk.bold('Formula:')} ${formulaToString(formula, config.names)}  (${formula.operatorCount} binary operators)`);
    console.log(`${chalk.bold('Truth table:')} ${table.toString()}\n`);
    console.log(chalk.dim(`${config.names.join(' ')} | out`));
    for (let a = 0; a < table.width; a++) {
        const inputs = config.names.map((name, v) => ((a >>> v) & 1 ? 'T' : 'F').padEnd(name.length));
        console.log(`${inputs.join(' ')} | ${table.get(a) === 1 ? chalk.green('T') : chalk.red('F')}`);
    }
    console.log();

    const result = runEnumeration(config);
    const entry = result.catalog.lookup(table);
    if (entry === undefined) {
        console.log(chalk.yellow(
            `No generated formula up to size ${result.largestSize} has this truth table; try a larger --max-size`
        ));
        return;
    }

    console.log(chalk.bold(`Minimal formulas (${entry.minimalCount} binary operators):`));
    for (const minimal of entry.minimal) {
        console.log(`  ${chalk.cyan(formulaToString(minimal, config.names))}`);
    }
    console.log(chalk.dim(`${entry.all.length} generated formulas share this truth table`));
}

async function runEstimate(config: CliConfig): Promise<void> {
    const maxSize = config.maxSize ?? DEFAULT_MAX_SIZE[config.variableCount];
    console.log(chalk.bold(`Size classes for n = ${config.variableCount} (budget ${config.maxFormulas}):`));
    for (const { size, count, cumulative } of estimateClassSizes(config.variableCount, maxSize)) {
        const line = `  size ${size}: ${count} formulas (cumulative ${cumulative})`;
        console.log(cumulative > config.maxFormulas ? chalk.red(`${line}  over budget`) : line);
    }
}

main().catch(e => {
    if (e instanceof CatalogException) {
        console.error(chalk.red(`Error: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.yellow(e.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
});
