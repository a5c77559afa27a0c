/**
 * Request workbook parser.
 *
 * Format:
 * - XLSX, first sheet, one header row
 * - Columns by position: account, old text, new text, new assignment
 * - Empty cells become null; text cells are trimmed
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in the result.
 */

import * as XLSX from 'xlsx';
import type { RequestRow } from '../types/index.js';
import { RequestRowSchema } from '../types/index.js';

const REQUEST_COLUMN_COUNT = 4;

export interface RequestParseResult {
    rows: RequestRow[];
    warnings: string[];
    skippedRows: number;
}

/**
 * Parse the request workbook attached to an inbound message.
 *
 * @param data - File contents as ArrayBuffer
 * @returns Parsed rows, warnings, and the number of rows without an account
 */
export function parseRequestWorkbook(data: ArrayBuffer): RequestParseResult {
    const workbook = XLSX.read(data, { type: 'array' });
    const rows: RequestRow[] = [];
    const warnings: string[] = [];
    let skippedRows = 0;

    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
        return { rows, warnings, skippedRows };
    }

    const table = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
        header: 1,
        defval: null,
        blankrows: false,
    });

    const [header, ...body] = table;
    if (header === undefined) {
        return { rows, warnings, skippedRows };
    }
    if (header.length < REQUEST_COLUMN_COUNT) {
        throw new Error(
            `Request workbook: expected ${REQUEST_COLUMN_COUNT} columns ` +
            `(account, old text, new text, new assignment). Found: ${header.map(h => String(h)).join(', ')}`
        );
    }

    body.forEach((cells, idx) => {
        // Spreadsheet row number, header included
        const rowNumber = idx + 2;
        const [accountCell, oldText, newText, newAssignment] = cells;

        if (accountCell === null || accountCell === undefined || String(accountCell).trim() === '') {
            skippedRows++;
            return;
        }

        const account = parseAccount(accountCell);
        if (account === null) {
            warnings.push(`Row ${rowNumber}: invalid account "${String(accountCell)}", skipping`);
            skippedRows++;
            return;
        }

        const row = {
            account,
            old_text: toText(oldText),
            new_text: toText(newText),
            new_assignment: toText(newAssignment),
        };

        const parsed = RequestRowSchema.safeParse(row);
        if (!parsed.success) {
            warnings.push(`Row ${rowNumber}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
            skippedRows++;
            return;
        }

        rows.push(parsed.data);
    });

    return { rows, warnings, skippedRows };
}

/**
 * Account cells are numeric in well-formed workbooks, but accept digit
 * strings as well.
 */
function parseAccount(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) && value >= 0 ? value : null;
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
        const account = parseInt(value.trim(), 10);
        return Number.isSafeInteger(account) ? account : null;
    }
    return null;
}

function toText(value: unknown): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    const text = String(value).trim();
    return text === '' ? null : text;
}
