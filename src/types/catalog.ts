/**
 * Read-side catalog types shared by the core and the reports
 */

import type { Formula } from './formula.js';
import type { TruthTable } from '../evaluator/truthTable.js';

/**
 * Everything known about one discovered truth table
 */
export interface CatalogEntryView {
    readonly truthTable: TruthTable;
    /** Fewest binary operators seen for this table */
    readonly minimalCount: number;
    /** Formulas at minimalCount, first discovered first */
    readonly minimal: readonly Formula[];
    /** Every formula filed under this table, in ingestion order */
    readonly all: readonly Formula[];
}

/**
 * Narrow interface the reports consume once generation has finished
 */
export interface CatalogReader {
    readonly variableCount: number;
    readonly discoveredCount: number;
    readonly possibleCount: number;
    readonly formulaCount: number;
    isComplete(): boolean;
    lookup(truthTable: TruthTable): CatalogEntryView | undefined;
    listAllFormulas(): readonly Formula[];
    listTruthTables(): readonly CatalogEntryView[];
}

export type RunStatus = 'complete' | 'incomplete';

/**
 * Why an incomplete run stopped
 */
export type StopReason =
    | 'size-ceiling'     // every class up to maxSize was generated
    | 'formula-budget';  // the next class would exceed maxFormulas

export interface SizeClassSummary {
    size: number;
    formulas: number;
    /** Truth tables first discovered in this class */
    discovered: number;
}

export interface EnumerationResult {
    catalog: CatalogReader;
    status: RunStatus;
    reason?: StopReason;
    variableCount: number;
    maxSize: number;
    /** Highest size class fully generated, -1 when none */
    largestSize: number;
    sizeClasses: SizeClassSummary[];
    formulaCount: number;
    discovered: number;
    possible: number;
    elapsedMs: number;
}
