/**
 * Minimal HTML page builder.
 *
 * Text passed to the builder is escaped; attributes are given as a record
 * and escaped as well. Lists and tables are added whole, so nothing is left
 * half-open.
 */

export type Attributes = Readonly<Record<string, string | number>>;

export interface TableCell {
    text: string;
    header?: boolean;
}

const ESCAPES: Readonly<Record<string, string>> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, ch => ESCAPES[ch] ?? ch);
}

function renderAttributes(attributes: Attributes = {}): string {
    return Object.entries(attributes)
        .map(([name, value]) => ` ${name}="${escapeHtml(String(value))}"`)
        .join('');
}

export class HtmlPage {
    private readonly title: string;
    private readonly body: string[] = [];

    constructor(title: string) {
        this.title = title;
    }

    addHeader(text: string, level: 1 | 2 | 3 | 4 | 5 | 6, attributes?: Attributes): this {
        this.body.push(`<h${level}${renderAttributes(attributes)}>${escapeHtml(text)}</h${level}>\n`);
        return this;
    }

    addParagraph(text: string, attributes?: Attributes): this {
        this.body.push(`<p${renderAttributes(attributes)}>${escapeHtml(text)}</p>\n`);
        return this;
    }

    addList(items: readonly string[], ordered: boolean = false, attributes?: Attributes): this {
        const tag = ordered ? 'ol' : 'ul';
        const rows = items.map(item => `<li>${escapeHtml(item)}</li>\n`).join('');
        this.body.push(`<${tag}${renderAttributes(attributes)}>\n${rows}</${tag}>\n`);
        return this;
    }

    addTable(rows: readonly (readonly TableCell[])[], attributes?: Attributes): this {
        const lines = rows.map(row => {
            const cells = row.map(cell => {
                const tag = cell.header ? 'th' : 'td';
                return `<${tag}>${escapeHtml(cell.text)}</${tag}>`;
            }).join('');
            return `<tr>${cells}</tr>\n`;
        }).join('');
        this.body.push(`<table${renderAttributes(attributes)}>\n${lines}</table>\n`);
        return this;
    }

    /** Links are the one place raw markup is composed; href and text are escaped */
    addLinks(links: readonly { href: string; text: string }[]): this {
        if (links.length === 0) return this;
        const anchors = links
            .map(link => `<a href="${escapeHtml(link.href)}">${escapeHtml(link.text)}</a>`)
            .join(' | ');
        this.body.push(`<nav>${anchors}</nav>\n`);
        return this;
    }

    toString(): string {
        return [
            '<!DOCTYPE html>\n',
            '<html>\n',
            '<head>\n',
            '<meta charset="utf-8">\n',
            `<title>${escapeHtml(this.title)}</title>\n`,
            '</head>\n',
            '<body>\n',
            ...this.body,
            '</body>\n',
            '</html>\n',
        ].join('');
    }
}
