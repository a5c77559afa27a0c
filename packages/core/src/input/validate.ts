/**
 * Validation of parsed request rows and conversion into change requests.
 *
 * Rejections are returned as user-facing messages; the caller decides
 * how to report them.
 */

import type { ChangeRequest, RequestRow } from '../types/index.js';
import { USER_MESSAGES } from '../types/index.js';
import { selectProfile, type TransactionProfile } from '../profile/profiles.js';

export interface RequestValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    /** Profile matching the account ids; set when the batch is valid. */
    profile?: TransactionProfile;
    /** Change requests keyed by old text, in row order. */
    requests: Map<string, ChangeRequest>;
    /** Distinct account ids in first-seen order. */
    accounts: number[];
}

export function validateRequestRows(rows: readonly RequestRow[]): RequestValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const requests = new Map<string, ChangeRequest>();
    const accounts = [...new Set(rows.map(row => row.account))];

    const result = (): RequestValidationResult => ({
        valid: errors.length === 0,
        errors,
        warnings,
        requests,
        accounts,
    });

    if (rows.length === 0) {
        errors.push(USER_MESSAGES.NO_RECORDS);
        return result();
    }

    if (rows.every(row => row.new_text === null && row.new_assignment === null)) {
        errors.push(USER_MESSAGES.NO_NEW_VALUES);
    }
    if (rows.every(row => row.old_text === null)) {
        errors.push(USER_MESSAGES.NO_OLD_TEXT);
    }
    if (errors.length > 0) {
        return result();
    }

    for (const row of rows) {
        if (row.old_text === null) {
            warnings.push(`Account ${row.account}: row without 'Old Text' skipped`);
            continue;
        }
        if (row.new_text === null && row.new_assignment === null) {
            warnings.push(`'${row.old_text}': no new text or assignment given, skipped`);
            continue;
        }
        if (requests.has(row.old_text)) {
            errors.push(`The value '${row.old_text}' appears more than once in 'Old Text' column!`);
            continue;
        }
        requests.set(row.old_text, { new_text: row.new_text, new_assignment: row.new_assignment });
    }

    const selection = selectProfile(accounts);
    if (!selection.ok) {
        errors.push(selection.error);
        return result();
    }

    return { ...result(), profile: errors.length === 0 ? selection.profile : undefined };
}
