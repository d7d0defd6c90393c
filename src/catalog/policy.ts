/**
 * Minimality Policy
 *
 * "Minimal" means fewest binary operators. Formulas tied on that count are all
 * kept, in discovery order; any further ordering is left to the reports.
 */

export type MinimalityVerdict =
    | 'first'      // entry has no minimal formula yet
    | 'tie'        // same count as the current minimum
    | 'dethrone'   // strictly fewer operators than the current minimum
    | 'lose';      // more operators than the current minimum

export function judge(candidateCount: number, currentMinimum: number | undefined): MinimalityVerdict {
    if (currentMinimum === undefined) return 'first';
    if (candidateCount === currentMinimum) return 'tie';
    return candidateCount < currentMinimum ? 'dethrone' : 'lose';
}

/** Whether a verdict puts the candidate into the minimal list */
export function isMinimal(verdict: MinimalityVerdict): boolean {
    return verdict !== 'lose';
}
