/**
 * Enumerator - runs Generator → Evaluator → Catalog for one variable count.
 *
 * Size classes are generated one at a time. Each class is fully evaluated and
 * ingested before the next one is built, and a run stops at the size ceiling
 * or before a class that would exceed the formula budget. Either way the
 * finalized catalog is returned with whatever was discovered.
 */

import type { EnumerationOptions } from './types/options.js';
import type { EnumerationResult, SizeClassSummary, StopReason } from './types/catalog.js';
import { resolveEnumerationOptions, type ResolvedEnumerationOptions } from './config/schema.js';
import { FormulaFactory } from './formula/factory.js';
import { FormulaGenerator } from './generator/generator.js';
import { TruthTableEvaluator } from './evaluator/evaluator.js';
import { Catalog } from './catalog/catalog.js';

export type { EnumerationResult };

export class Enumerator {
    readonly options: ResolvedEnumerationOptions;
    readonly generator: FormulaGenerator;
    readonly evaluator: TruthTableEvaluator;
    readonly catalog: Catalog;
    private result?: EnumerationResult;

    constructor(options?: EnumerationOptions) {
        this.options = resolveEnumerationOptions(options);
        const { variableCount, evaluation } = this.options;
        const factory = new FormulaFactory(variableCount);
        this.generator = new FormulaGenerator(factory);
        this.evaluator = new TruthTableEvaluator(variableCount, evaluation);
        this.catalog = new Catalog(factory);
    }

    /**
     * Enumerate, evaluate and catalog every size class up to the ceiling
     */
    run(): EnumerationResult {
        // A second pass would hand the same formulas to the catalog again
        if (this.result !== undefined) return this.result;

        const { variableCount, maxSize, maxFormulas, stopWhenComplete } = this.options;
        const startTime = Date.now();
        const sizeClasses: SizeClassSummary[] = [];
        let reason: StopReason | undefined;

        for (let size = 0; size <= maxSize; size++) {
            if (stopWhenComplete && this.catalog.isComplete()) break;

            const expected = this.generator.classSize(size);
            if (this.catalog.formulaCount + expected > maxFormulas) {
                this.report(undefined,
                    `Size ${size} would add ${expected} formulas (budget ${maxFormulas}); stopping`);
                reason = 'formula-budget';
                break;
            }

            this.report(size / (maxSize + 1), `Generating size ${size} (${expected} formulas)`);
            sizeClasses.push(this.ingestClass(size));
        }

        if (reason === undefined && !this.catalog.isComplete()) {
            reason = 'size-ceiling';
        }

        this.catalog.finalize();
        const result = this.summarize(sizeClasses, Date.now() - startTime, reason);
        this.result = result;
        this.report(1, `Discovered ${result.discovered} of ${result.possible} truth tables over ${variableCount} variable(s)`);
        return result;
    }

    private ingestClass(size: number): SizeClassSummary {
        const before = this.catalog.discoveredCount;
        const formulas = this.generator.sizeClass(size);
        for (const formula of formulas) {
            this.catalog.ingest(formula, this.evaluator.tableOf(formula));
        }
        return {
            size,
            formulas: formulas.length,
            discovered: this.catalog.discoveredCount - before,
        };
    }

    private summarize(
        sizeClasses: SizeClassSummary[],
        elapsedMs: number,
        reason: StopReason | undefined
    ): EnumerationResult {
        const complete = this.catalog.isComplete();
        return {
            catalog: this.catalog,
            status: complete ? 'complete' : 'incomplete',
            reason: complete ? undefined : reason,
            variableCount: this.options.variableCount,
            maxSize: this.options.maxSize,
            largestSize: sizeClasses.length - 1,
            sizeClasses,
            formulaCount: this.catalog.formulaCount,
            discovered: this.catalog.discoveredCount,
            possible: this.catalog.possibleCount,
            elapsedMs,
        };
    }

    private report(progress: number | undefined, message: string): void {
        this.options.onProgress?.(progress, message);
    }
}

/**
 * Create an enumerator for one run
 */
export function createEnumerator(options?: EnumerationOptions): Enumerator {
    return new Enumerator(options);
}

/**
 * Convenience: create and run in one call
 */
export function enumerate(options?: EnumerationOptions): EnumerationResult {
    return createEnumerator(options).run();
}
