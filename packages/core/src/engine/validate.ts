/**
 * Guards applied to caller input before anything is written to the session.
 */

import {
    InvalidAccountError,
    InvalidCompanyCodeError,
    InvalidDateRangeError,
    InvalidStatusError,
    ValueTooLongError,
} from '../errors.js';
import { COMPANY_CODE_PATTERN, ItemStatusSchema } from '../types/index.js';
import type { ChangeRequestMap, ItemStatus, PostingDateRange } from '../types/index.js';
import type { EditableField, TransactionProfile } from '../profile/profiles.js';

export function assertCompanyCode(code: string): void {
    if (!COMPANY_CODE_PATTERN.test(code)) {
        throw new InvalidCompanyCodeError(`Company code has incorrect value: '${code}'!`);
    }
}

/**
 * Validates account ids and returns them as the session expects them.
 */
export function assertAccounts(accounts: readonly number[]): string[] {
    if (accounts.length === 0) {
        throw new InvalidAccountError('No accounts supplied!');
    }

    for (const acc of accounts) {
        if (!Number.isSafeInteger(acc) || acc < 0) {
            throw new InvalidAccountError(`Invalid account number: ${acc}!`);
        }
    }

    return accounts.map(acc => String(acc));
}

export function assertWorklist(name: string): void {
    if (name.trim() === '') {
        throw new InvalidAccountError('Worklist name cannot be empty!');
    }
}

export function assertStatus(status: string): asserts status is ItemStatus {
    if (!ItemStatusSchema.safeParse(status).success) {
        throw new InvalidStatusError(`Unrecognized item status: '${status}'`);
    }
}

export function assertFieldLength(field: EditableField, label: 'text' | 'assignment', value: string): void {
    if (value.length > field.maxLength) {
        throw new ValueTooLongError(label, value, field.maxLength);
    }
}

/**
 * Checks every requested value against the field limits of the profile.
 */
export function assertChangeRequests(requests: ChangeRequestMap, profile: TransactionProfile): void {
    for (const request of requests.values()) {
        if (request.new_text !== null) {
            assertFieldLength(profile.edit.text, 'text', request.new_text);
        }
        if (request.new_assignment !== null) {
            assertFieldLength(profile.edit.assignment, 'assignment', request.new_assignment);
        }
    }
}

/**
 * Validates a posting date range and converts its bounds to the
 * session's DD.MM.YYYY notation. Missing bounds become empty strings.
 */
export function toSessionDateRange(range: PostingDateRange): { from: string; to: string } {
    const from = range.from === undefined ? '' : toSessionDate(range.from);
    const to = range.to === undefined ? '' : toSessionDate(range.to);

    // ISO dates compare chronologically as strings
    if (range.from !== undefined && range.to !== undefined && range.from > range.to) {
        throw new InvalidDateRangeError(
            `Lower posting date ${range.from} is greater than upper posting date ${range.to}!`
        );
    }

    return { from, to };
}

function toSessionDate(iso: string): string {
    const match = iso.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) {
        throw new InvalidDateRangeError(`Invalid posting date: '${iso}'. Use YYYY-MM-DD.`);
    }

    const [, year, month, day] = match;
    const date = new Date(Date.UTC(parseInt(year), parseInt(month) - 1, parseInt(day)));
    if (
        date.getUTCFullYear() !== parseInt(year) ||
        date.getUTCMonth() !== parseInt(month) - 1 ||
        date.getUTCDate() !== parseInt(day)
    ) {
        throw new InvalidDateRangeError(`Invalid posting date: '${iso}'.`);
    }

    return `${day}.${month}.${year}`;
}
