import exceljs, { type Workbook } from 'exceljs';
import type { ReportRow } from '@itemfix/shared';
import type { ChangeOutcomeMap, RequestRow } from '@itemfix/core';
import { reportColumns, styleHeaderRow } from './layout.js';

/**
 * Pairs every request row with the outcome message of its old text.
 * Rows that never became a request (no old text, skipped) get no message.
 */
export function buildReportRows(rows: readonly RequestRow[], outcome: ChangeOutcomeMap): ReportRow[] {
    return rows.map(row => ({
        ...row,
        message: row.old_text === null ? null : outcome.get(row.old_text)?.message ?? null,
    }));
}

/**
 * Generates the outbound report: one sheet, one row per request row.
 */
export function generateReportExcel(rows: readonly ReportRow[], sheetName: string): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'itemfix';
    workbook.created = new Date();

    const sheet = workbook.addWorksheet(sheetName);
    sheet.columns = reportColumns(rows);
    sheet.addRows([...rows]);
    styleHeaderRow(sheet);

    return workbook;
}

export async function writeReport(path: string, rows: readonly ReportRow[], sheetName: string): Promise<void> {
    const workbook = generateReportExcel(rows, sheetName);
    await workbook.xlsx.writeFile(path);
}
