import type { CatalogReader } from '../types/catalog.js';
import { defaultVariableNames, formulaToString } from '../formula/printer.js';
import type { ReportFile } from './html.js';

export const FORMULA_LIST_FILE_NAME = 'formulalist.txt';

/**
 * Plain listing: every generated formula, one per line, in generation order
 */
export function renderFormulaList(catalog: CatalogReader, names?: readonly string[]): string {
    const labels = names ?? defaultVariableNames(catalog.variableCount);
    return catalog.listAllFormulas()
        .map(formula => `${formulaToString(formula, labels)}\n`)
        .join('');
}

export function renderTextReport(catalog: CatalogReader, names?: readonly string[]): ReportFile[] {
    return [{ fileName: FORMULA_LIST_FILE_NAME, content: renderFormulaList(catalog, names) }];
}
