import type { CatalogEntryView, CatalogReader } from '../types/catalog.js';
import { DEFAULTS } from '../types/options.js';
import { defaultVariableNames, formulaToString } from '../formula/printer.js';
import { HtmlPage, type TableCell } from './htmlPage.js';

export interface HtmlReportOptions {
    names?: readonly string[];
    tablesPerPage?: number;
}

export interface ReportFile {
    fileName: string;
    content: string;
}

export const HTML_FILE_PREFIX = 'truthtables';
export const HTML_FILE_EXTENSION = 'htm';

export function htmlFileName(pageIndex: number): string {
    return `${HTML_FILE_PREFIX}${pageIndex}.${HTML_FILE_EXTENSION}`;
}

function plural(count: number, word: string): string {
    return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Rows of the truth table: one column per variable plus the output, assignment 0 first
 */
export function truthTableRows(entry: CatalogEntryView, names: readonly string[]): TableCell[][] {
    const { truthTable } = entry;
    const rows: TableCell[][] = [[
        ...names.map(name => ({ text: name, header: true })),
        { text: 'Output', header: true },
    ]];
    for (let a = 0; a < truthTable.width; a++) {
        const row: TableCell[] = names.map((_, v) => ({ text: (a >>> v) & 1 ? 'T' : 'F' }));
        row.push({ text: truthTable.get(a) === 1 ? 'T' : 'F' });
        rows.push(row);
    }
    return rows;
}

function addEntry(page: HtmlPage, entry: CatalogEntryView, ordinal: number, names: readonly string[]): void {
    page.addHeader(`Truth table ${ordinal}: ${entry.truthTable.toString()}`, 3);
    page.addTable(truthTableRows(entry, names), { border: 1 });

    const label = entry.minimal.length === 1 ? 'Minimum formula' : 'Minimum formulas';
    page.addParagraph(`${label} (${plural(entry.minimalCount, 'binary operator')}):`);
    page.addList(entry.minimal.map(f => formulaToString(f, names)), true);

    page.addParagraph(`All formulas with this truth table (${entry.all.length}):`);
    page.addList(entry.all.map(f => formulaToString(f, names)));
}

/**
 * Render the catalog as paginated HTML, tables in first-discovery order
 */
export function renderHtmlReport(catalog: CatalogReader, options: HtmlReportOptions = {}): ReportFile[] {
    const names = options.names ?? defaultVariableNames(catalog.variableCount);
    const perPage = Math.max(1, options.tablesPerPage ?? DEFAULTS.tablesPerPage);
    const entries = catalog.listTruthTables();
    const pageCount = Math.max(1, Math.ceil(entries.length / perPage));

    const files: ReportFile[] = [];
    for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
        const start = pageIndex * perPage;
        const pageEntries = entries.slice(start, start + perPage);
        const title = `Truth tables over ${plural(catalog.variableCount, 'variable')} (page ${pageIndex + 1} of ${pageCount})`;
        const page = new HtmlPage(title);

        page.addHeader(title, 1);
        page.addParagraph(
            `Discovered ${catalog.discoveredCount} of ${catalog.possibleCount} truth tables from ${plural(catalog.formulaCount, 'formula')}.`
        );

        const links: { href: string; text: string }[] = [];
        if (pageIndex > 0) links.push({ href: htmlFileName(pageIndex - 1), text: 'Previous' });
        if (pageIndex + 1 < pageCount) links.push({ href: htmlFileName(pageIndex + 1), text: 'Next' });
        page.addLinks(links);

        pageEntries.forEach((entry, i) => addEntry(page, entry, start + i + 1, names));
        if (pageEntries.length === 0) {
            page.addParagraph('No truth tables were discovered.');
        }

        files.push({ fileName: htmlFileName(pageIndex), content: page.toString() });
    }
    return files;
}
