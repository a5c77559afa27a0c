import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { parseRequestWorkbook } from '../../src/input/workbook.js';

describe('parseRequestWorkbook', () => {
    const HEADER = ['Account', 'Old Text', 'New Text', 'New Assignment'];

    function createWorkbook(rows: unknown[][], header: unknown[] = HEADER): ArrayBuffer {
        const ws = XLSX.utils.aoa_to_sheet([header, ...rows]);
        const wb = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(wb, ws, 'Data');

        return XLSX.write(wb, { type: 'array', bookType: 'xlsx' });
    }

    it('maps columns by position and trims text', () => {
        const data = createWorkbook([
            [10000001, ' OLDA ', 'NEWA', null],
            [10000001, 'OLDB', null, 'ASG1'],
        ]);

        const result = parseRequestWorkbook(data);

        expect(result.rows).toEqual([
            { account: 10000001, old_text: 'OLDA', new_text: 'NEWA', new_assignment: null },
            { account: 10000001, old_text: 'OLDB', new_text: null, new_assignment: 'ASG1' },
        ]);
        expect(result.warnings).toHaveLength(0);
        expect(result.skippedRows).toBe(0);
    });

    it('reads numeric text cells as text', () => {
        const data = createWorkbook([[1000001, 12345, 'Invoice 12345', 987]]);

        const result = parseRequestWorkbook(data);

        expect(result.rows[0]).toEqual({
            account: 1000001,
            old_text: '12345',
            new_text: 'Invoice 12345',
            new_assignment: '987',
        });
    });

    it('accepts account numbers stored as text', () => {
        const data = createWorkbook([['10000001', 'OLDA', 'NEWA', null]]);

        expect(parseRequestWorkbook(data).rows[0].account).toBe(10000001);
    });

    it('skips rows without an account', () => {
        const data = createWorkbook([
            [null, 'OLDA', 'NEWA', null],
            [10000001, 'OLDB', 'NEWB', null],
        ]);

        const result = parseRequestWorkbook(data);

        expect(result.rows).toHaveLength(1);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings).toHaveLength(0);
    });

    it('warns about invalid account cells', () => {
        const data = createWorkbook([['ABC', 'OLDA', 'NEWA', null]]);

        const result = parseRequestWorkbook(data);

        expect(result.rows).toHaveLength(0);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings).toEqual(['Row 2: invalid account "ABC", skipping']);
    });

    it('returns an empty result for a header-only workbook', () => {
        const result = parseRequestWorkbook(createWorkbook([]));

        expect(result).toEqual({ rows: [], warnings: [], skippedRows: 0 });
    });

    it('throws when columns are missing', () => {
        const data = createWorkbook([[10000001, 'OLDA']], ['Account', 'Old Text']);

        expect(() => parseRequestWorkbook(data)).toThrow(/expected 4 columns/);
    });
});
