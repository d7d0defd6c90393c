/**
 * Catalog - formulas grouped by truth table
 *
 * One entry per distinct truth table, created on first sighting and kept in
 * first-discovery order. Ingestion is single-pass: because the generator
 * emits formulas in non-decreasing operator count, the first formula an
 * entry sees is already minimal (or tied-minimal).
 *
 * A catalog is bound to the FormulaFactory it was created from. That factory
 * hash-conses its nodes, so a formula id identifies a tree shape and the
 * duplicate check can key on ids.
 */

import type { Formula } from '../types/formula.js';
import type { CatalogEntryView, CatalogReader } from '../types/catalog.js';
import {
    createCatalogFinalizedError,
    createDuplicateIngestError,
    createForeignFormulaError,
    createWidthMismatchError,
} from '../types/errors.js';
import type { FormulaFactory } from '../formula/factory.js';
import { TruthTable, countPossibleTables } from '../evaluator/truthTable.js';
import { IdSet } from '../utils/idSet.js';
import { judge, type MinimalityVerdict } from './policy.js';

class CatalogEntry implements CatalogEntryView {
    readonly truthTable: TruthTable;
    minimalCount = Number.POSITIVE_INFINITY;
    readonly minimal: Formula[] = [];
    readonly all: Formula[] = [];

    constructor(truthTable: TruthTable) {
        this.truthTable = truthTable;
    }

    record(formula: Formula): MinimalityVerdict {
        this.all.push(formula);
        const verdict = judge(formula.operatorCount, this.minimal.length > 0 ? this.minimalCount : undefined);
        switch (verdict) {
            case 'first':
            case 'tie':
                this.minimalCount = formula.operatorCount;
                this.minimal.push(formula);
                break;
            case 'dethrone':
                this.minimalCount = formula.operatorCount;
                this.minimal.length = 0;
                this.minimal.push(formula);
                break;
            case 'lose':
                break;
        }
        return verdict;
    }
}

export interface IngestResult {
    /** Entry the formula was filed under */
    entry: CatalogEntryView;
    /** True when this formula discovered a new truth table */
    discovered: boolean;
    verdict: MinimalityVerdict;
}

export class Catalog implements CatalogReader {
    readonly variableCount: number;
    readonly factory: FormulaFactory;
    private readonly entries = new Map<number, CatalogEntry>();
    private readonly formulas: Formula[] = [];
    private readonly ingested = new IdSet();
    private finalized = false;

    constructor(factory: FormulaFactory) {
        this.factory = factory;
        this.variableCount = factory.variableCount;
    }

    get isFinalized(): boolean {
        return this.finalized;
    }

    /** Distinct truth tables seen so far */
    get discoveredCount(): number {
        return this.entries.size;
    }

    /** 2^(2^n) */
    get possibleCount(): number {
        return countPossibleTables(this.variableCount);
    }

    get formulaCount(): number {
        return this.formulas.length;
    }

    isComplete(): boolean {
        return this.discoveredCount === this.possibleCount;
    }

    /**
     * File a formula under its truth table.
     * Each formula may be ingested once; a repeat, or a node from another
     * factory, is a contract violation.
     */
    ingest(formula: Formula, truthTable: TruthTable): IngestResult {
        if (this.finalized) {
            throw createCatalogFinalizedError('ingest');
        }
        if (truthTable.variableCount !== this.variableCount) {
            throw createWidthMismatchError(this.variableCount, truthTable.variableCount);
        }
        if (!this.factory.owns(formula)) {
            throw createForeignFormulaError(formula.id);
        }
        if (!this.ingested.add(formula.id)) {
            throw createDuplicateIngestError(formula.id);
        }

        let entry = this.entries.get(truthTable.bits);
        const discovered = entry === undefined;
        if (entry === undefined) {
            entry = new CatalogEntry(truthTable);
            this.entries.set(truthTable.bits, entry);
        }

        this.formulas.push(formula);
        const verdict = entry.record(formula);
        return { entry, discovered, verdict };
    }

    /** Make the catalog read-only */
    finalize(): this {
        this.finalized = true;
        return this;
    }

    lookup(truthTable: TruthTable): CatalogEntryView | undefined {
        if (truthTable.variableCount !== this.variableCount) return undefined;
        return this.entries.get(truthTable.bits);
    }

    /** Every ingested formula, in ingestion order */
    listAllFormulas(): readonly Formula[] {
        return this.formulas;
    }

    /** One view per discovered truth table, in first-discovery order */
    listTruthTables(): readonly CatalogEntryView[] {
        return [...this.entries.values()];
    }
}

export function createCatalog(factory: FormulaFactory): Catalog {
    return new Catalog(factory);
}
