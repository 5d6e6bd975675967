import fs from 'fs';
import { parse } from 'csv-parse';

const NUMBER_HEADERS = ['phone', 'phone_number', 'number', 'mobile', 'msisdn'];

function detectDelimiter(firstLine: string): string {
    const commas = (firstLine.match(/,/g) || []).length;
    const semicolons = (firstLine.match(/;/g) || []).length;
    const tabs = (firstLine.match(/\t/g) || []).length;

    if (semicolons > commas && semicolons >= tabs) return ';';
    if (tabs > commas && tabs > semicolons) return '\t';
    return ',';
}

/**
 * Reads phone numbers for a batch: one per line, or a CSV whose header names a
 * phone column (the first column otherwise). Blank lines and `#` comments are skipped.
 */
export async function parseNumbers(contents: string): Promise<string[]> {
    const firstLine = contents.split(/\r?\n/).find(l => l.trim() !== '' && !l.trim().startsWith('#')) ?? '';

    const parser = parse(contents, {
        delimiter: detectDelimiter(firstLine),
        comment: '#',
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
        bom: true,
    });

    const numbers: string[] = [];
    let column = 0;
    let first = true;

    for await (const record of parser) {
        const cells: unknown = record;
        const row = Array.isArray(cells) ? cells.map((cell: unknown) => String(cell).trim()) : [];
        if (first) {
            first = false;
            const header = row.findIndex(cell => NUMBER_HEADERS.includes(cell.toLowerCase()));
            if (header >= 0) {
                column = header;
                continue;
            }
        }
        const value = row[column];
        if (value) numbers.push(value);
    }
    return numbers;
}

export async function readNumbersFile(filePath: string): Promise<string[]> {
    const contents = await fs.promises.readFile(filePath, 'utf8');
    return parseNumbers(contents);
}
