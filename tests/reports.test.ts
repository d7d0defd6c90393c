import { renderHtmlReport, htmlFileName, truthTableRows } from '../src/report/html.js';
import { HtmlPage, escapeHtml } from '../src/report/htmlPage.js';
import { renderFormulaList, renderTextReport, FORMULA_LIST_FILE_NAME } from '../src/report/text.js';
import { Catalog } from '../src/catalog/catalog.js';
import { FormulaFactory } from '../src/formula/factory.js';
import { enumerate } from '../src/enumerator.js';

describe('text report', () => {
    const sizeZero = enumerate({ variableCount: 1, maxSize: 0 }).catalog;

    test('lists every formula on its own line', () => {
        expect(renderFormulaList(sizeZero)).toBe('p1\n~p1\n');
        expect(renderFormulaList(sizeZero, ['x'])).toBe('x\n~x\n');
    });

    test('writes a single formula list file', () => {
        const files = renderTextReport(sizeZero);
        expect(files).toHaveLength(1);
        expect(files[0].fileName).toBe(FORMULA_LIST_FILE_NAME);
        expect(files[0].fileName).toBe('formulalist.txt');
    });

    test('follows generation order', () => {
        const lines = renderFormulaList(enumerate({ variableCount: 1, maxSize: 1 }).catalog).split('\n');
        expect(lines).toHaveLength(27);
        expect(lines.slice(0, 4)).toEqual(['p1', '~p1', 'p1 & p1', '~(p1 & p1)']);
        expect(lines[26]).toBe('');
    });
});

describe('HtmlPage', () => {
    test('escapes markup characters', () => {
        expect(escapeHtml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &#39;c&#39;&gt;');
    });

    test('renders a complete document', () => {
        const page = new HtmlPage('T & F')
            .addHeader('Heading', 3)
            .addParagraph('x < y')
            .addList(['one'], true)
            .addTable([[{ text: 'h', header: true }], [{ text: 'd' }]], { border: 1 });
        expect(page.toString()).toBe(
            '<!DOCTYPE html>\n<html>\n<head>\n<meta charset="utf-8">\n<title>T &amp; F</title>\n</head>\n<body>\n' +
            '<h3>Heading</h3>\n' +
            '<p>x &lt; y</p>\n' +
            '<ol>\n<li>one</li>\n</ol>\n' +
            '<table border="1">\n<tr><th>h</th></tr>\n<tr><td>d</td></tr>\n</table>\n' +
            '</body>\n</html>\n'
        );
    });

    test('omits navigation without links', () => {
        expect(new HtmlPage('t').addLinks([]).toString()).not.toContain('<nav>');
    });
});

describe('HTML report', () => {
    const catalog = enumerate({ variableCount: 1, maxSize: 1 }).catalog;

    test('file names are numbered from zero', () => {
        expect(htmlFileName(0)).toBe('truthtables0.htm');
        expect(htmlFileName(12)).toBe('truthtables12.htm');
    });

    test('fits 256 tables on one page by default', () => {
        const files = renderHtmlReport(catalog);
        expect(files.map(f => f.fileName)).toEqual(['truthtables0.htm']);
        const html = files[0].content;
        expect(html).toContain('<title>Truth tables over 1 variable (page 1 of 1)</title>');
        expect(html).toContain('<p>Discovered 4 of 4 truth tables from 26 formulas.</p>');
        expect(html).not.toContain('<nav>');
    });

    test('renders each table with its minimal and full formula lists', () => {
        const html = renderHtmlReport(catalog)[0].content;
        expect(html).toContain('<h3>Truth table 1: 01</h3>');
        expect(html).toContain(
            '<table border="1">\n' +
            '<tr><th>p1</th><th>Output</th></tr>\n' +
            '<tr><td>F</td><td>F</td></tr>\n' +
            '<tr><td>T</td><td>T</td></tr>\n' +
            '</table>\n' +
            '<p>Minimum formula (0 binary operators):</p>\n' +
            '<ol>\n<li>p1</li>\n</ol>\n' +
            '<p>All formulas with this truth table (5):</p>\n' +
            '<ul>\n<li>p1</li>\n<li>p1 &amp; p1</li>\n<li>~(~p1 &amp; ~p1)</li>\n<li>p1 | p1</li>\n<li>~(~p1 | ~p1)</li>\n</ul>\n'
        );
        expect(html).toContain('<h3>Truth table 3: 00</h3>');
        expect(html).toContain('<p>Minimum formulas (1 binary operator):</p>');
    });

    test('paginates with previous and next links', () => {
        const files = renderHtmlReport(catalog, { tablesPerPage: 1 });
        expect(files.map(f => f.fileName)).toEqual([
            'truthtables0.htm', 'truthtables1.htm', 'truthtables2.htm', 'truthtables3.htm',
        ]);
        expect(files[0].content).toContain('<nav><a href="truthtables1.htm">Next</a></nav>');
        expect(files[1].content).toContain(
            '<nav><a href="truthtables0.htm">Previous</a> | <a href="truthtables2.htm">Next</a></nav>'
        );
        expect(files[3].content).toContain('<nav><a href="truthtables2.htm">Previous</a></nav>');
        expect(files[3].content).toContain('<h3>Truth table 4: 11</h3>');
        expect(files[3].content).toContain('(page 4 of 4)');
    });

    test('uses custom variable names', () => {
        const html = renderHtmlReport(catalog, { names: ['x'] })[0].content;
        expect(html).toContain('<tr><th>x</th><th>Output</th></tr>');
        expect(html).toContain('<li>x &amp; ~x</li>');
    });

    test('an empty catalog still produces one page', () => {
        const files = renderHtmlReport(new Catalog(new FormulaFactory(2)).finalize());
        expect(files).toHaveLength(1);
        expect(files[0].content).toContain('<p>No truth tables were discovered.</p>');
        expect(files[0].content).toContain('<p>Discovered 0 of 16 truth tables from 0 formulas.</p>');
    });

    test('truthTableRows lists assignments in ascending order', () => {
        const entry = enumerate({ variableCount: 2, maxSize: 0 }).catalog.listTruthTables()[2];
        expect(truthTableRows(entry, ['a', 'b']).map(row => row.map(cell => cell.text).join(''))).toEqual([
            'abOutput',
            'FFF',
            'TFF',
            'FTT',
            'TTT',
        ]);
    });
});
