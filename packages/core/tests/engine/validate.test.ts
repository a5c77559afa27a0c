import { describe, it, expect } from 'vitest';
import {
    assertAccounts,
    assertCompanyCode,
    assertStatus,
    assertWorklist,
    toSessionDateRange,
} from '../../src/engine/validate.js';
import { InvalidCompanyCodeError, InvalidDateRangeError, InvalidStatusError } from '../../src/errors.js';

describe('assertCompanyCode', () => {
    it.each(['075', '07A5', '', '00750', ' 075'])('rejects "%s"', (code) => {
        expect(() => assertCompanyCode(code)).toThrow(InvalidCompanyCodeError);
    });

    it('accepts four digits with leading zeros', () => {
        expect(() => assertCompanyCode('0075')).not.toThrow();
    });

    it('names the rejected value', () => {
        expect(() => assertCompanyCode('07A5')).toThrow("Company code has incorrect value: '07A5'!");
    });
});

describe('assertAccounts', () => {
    it('returns the ids as strings', () => {
        expect(assertAccounts([10000001, 10000002])).toEqual(['10000001', '10000002']);
    });

    it('rejects an empty list', () => {
        expect(() => assertAccounts([])).toThrow('No accounts supplied!');
    });

    it('rejects non-integers', () => {
        expect(() => assertAccounts([10000001, Number.NaN])).toThrow('Invalid account number: NaN!');
    });
});

describe('assertWorklist', () => {
    it('rejects a blank name', () => {
        expect(() => assertWorklist('  ')).toThrow('Worklist name cannot be empty!');
    });
});

describe('assertStatus', () => {
    it.each(['open', 'cleared', 'all'])('accepts %s', (status) => {
        expect(() => assertStatus(status)).not.toThrow();
    });

    it('rejects anything else', () => {
        expect(() => assertStatus('Open')).toThrow(InvalidStatusError);
    });
});

describe('toSessionDateRange', () => {
    it('converts ISO dates to the session notation', () => {
        expect(toSessionDateRange({ from: '2024-01-05', to: '2024-12-31' })).toEqual({
            from: '05.01.2024',
            to: '31.12.2024',
        });
    });

    it('leaves missing bounds empty', () => {
        expect(toSessionDateRange({})).toEqual({ from: '', to: '' });
        expect(toSessionDateRange({ to: '2024-02-29' })).toEqual({ from: '', to: '29.02.2024' });
    });

    it('accepts equal bounds', () => {
        expect(toSessionDateRange({ from: '2024-03-01', to: '2024-03-01' })).toEqual({
            from: '01.03.2024',
            to: '01.03.2024',
        });
    });

    it('rejects a lower bound after the upper bound', () => {
        expect(() => toSessionDateRange({ from: '2024-03-02', to: '2024-03-01' })).toThrow(InvalidDateRangeError);
    });

    it('rejects malformed and impossible dates', () => {
        expect(() => toSessionDateRange({ from: '01.03.2024' })).toThrow(InvalidDateRangeError);
        expect(() => toSessionDateRange({ to: '2023-02-29' })).toThrow("Invalid posting date: '2023-02-29'.");
    });
});
