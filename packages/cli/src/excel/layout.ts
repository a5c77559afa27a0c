import type { Column, Worksheet } from 'exceljs';
import { ACCOUNT_ID_LENGTH, FIELD_LIMITS, REPORT_COLUMNS, type ReportRow } from '@itemfix/shared';

type ReportColumn = (typeof REPORT_COLUMNS)[number];

interface ColumnLayout {
    key: keyof ReportRow;
    /** Content width the column grows to at most, in characters. */
    maxWidth: number;
}

const LAYOUT: Record<ReportColumn, ColumnLayout> = {
    'Account': { key: 'account', maxWidth: ACCOUNT_ID_LENGTH.GENERAL_LEDGER },
    'Old Text': { key: 'old_text', maxWidth: FIELD_LIMITS.TEXT_MAX_LENGTH },
    'New Text': { key: 'new_text', maxWidth: FIELD_LIMITS.TEXT_MAX_LENGTH },
    'New Assignment': { key: 'new_assignment', maxWidth: FIELD_LIMITS.ASSIGNMENT_MAX_LENGTH },
    'Message': { key: 'message', maxWidth: 100 },
};

const PADDING = 2;

/**
 * Report columns in header order, each as wide as its longest value
 * (header included) up to the field limit, plus padding.
 */
export function reportColumns(rows: readonly ReportRow[]): Array<Partial<Column>> {
    return REPORT_COLUMNS.map(header => {
        const { key, maxWidth } = LAYOUT[header];
        const longest = rows.reduce(
            (len, row) => Math.max(len, String(row[key] ?? '').length),
            header.length
        );
        return { header, key, width: Math.min(longest, maxWidth) + PADDING };
    });
}

/**
 * Bold white header on dark blue, frozen, with a filter over all columns.
 */
export function styleHeaderRow(sheet: Worksheet): void {
    const header = sheet.getRow(1);
    header.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F3864' } };

    sheet.views = [{ state: 'frozen', ySplit: 1 }];
    sheet.autoFilter = { from: { row: 1, column: 1 }, to: { row: 1, column: REPORT_COLUMNS.length } };
}
