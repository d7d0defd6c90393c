import type { EvaluationMode } from '../evaluator/evaluator.js';

export interface EnumerationOptions {
    /** Number of boolean inputs, 1..5 */
    variableCount?: number;
    /** Largest operator count to generate; defaults per variable count */
    maxSize?: number;
    /** Stop before a size class would push the total past this many formulas */
    maxFormulas?: number;
    evaluation?: EvaluationMode;
    /** Skip remaining classes once every possible truth table is discovered */
    stopWhenComplete?: boolean;
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

/**
 * Size ceilings that finish in seconds with the default formula budget.
 * Beyond n = 3 even size 3 runs into the millions of formulas.
 */
export const DEFAULT_MAX_SIZE: Readonly<Record<number, number>> = {
    1: 2,
    2: 2,
    3: 3,
    4: 2,
    5: 2,
};

export const DEFAULTS = {
    variableCount: 3,
    maxFormulas: 2_000_000,
    evaluation: 'bitwise',
    stopWhenComplete: false,
    tablesPerPage: 256,
    outputMode: 'text',
} as const;
