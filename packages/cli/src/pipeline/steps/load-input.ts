import { readFile } from 'node:fs/promises';
import {
    COMPANY_CODE_PATTERN,
    ItemStatusSchema,
    USER_MESSAGES,
    extractCompanyCode,
    getProfile,
    parseRequestWorkbook,
    validateRequestRows,
    type ProfileKind,
    type RequestParseResult,
} from '@itemfix/core';
import type { AppConfig } from '@itemfix/shared';
import type { PipelineState, PipelineStep } from '../types.js';
import { EXIT_CODES } from '../../types.js';
import { errorMessage, toArrayBuffer } from '../../utils/buffer.js';

const STEP = 'load-input';

/**
 * Step 1: Load Input
 * Resolves the company code, reads the request workbook and turns its
 * rows into change requests. Rejections the requester can fix are also
 * set as the error notice.
 */
export const loadInput: PipelineStep = async (state) => {
    const fail = (message: string, notify: boolean, error?: unknown): PipelineState => {
        state.errors.push({ step: STEP, message, fatal: true, exitCode: EXIT_CODES.INPUT, error });
        if (notify) {
            state.notice = { kind: 'error', message };
        }
        return state;
    };

    const status = ItemStatusSchema.safeParse(state.options.status);
    if (!status.success) {
        return fail(`Unrecognized item status: '${state.options.status}'`, false);
    }

    let companyCode = state.options.companyCode ?? null;
    if (companyCode === null && state.options.body) {
        try {
            companyCode = extractCompanyCode(await readFile(state.options.body, 'utf-8'));
        } catch (err) {
            return fail(`Failed to read message body ${state.options.body}: ${errorMessage(err)}`, false, err);
        }
    }
    if (companyCode === null || !COMPANY_CODE_PATTERN.test(companyCode)) {
        return fail(USER_MESSAGES.NO_COMPANY_CODE, true);
    }

    let data: ArrayBuffer;
    try {
        data = toArrayBuffer(await readFile(state.workbookPath));
    } catch (err) {
        return fail(`Failed to read request workbook ${state.workbookPath}: ${errorMessage(err)}`, false, err);
    }

    let parsed: RequestParseResult;
    try {
        parsed = parseRequestWorkbook(data);
    } catch (err) {
        return fail(errorMessage(err), true, err);
    }

    for (const warning of parsed.warnings) {
        state.warnings.push(`[workbook] ${warning}`);
    }

    const validation = validateRequestRows(parsed.rows);
    state.warnings.push(...validation.warnings);

    if (!validation.valid || !validation.profile) {
        return fail(validation.errors.join('\n'), true);
    }

    const kind = validation.profile.kind;
    state.input = {
        workbookPath: state.workbookPath,
        rows: parsed.rows,
        requests: validation.requests,
        accounts: validation.accounts,
        companyCode,
        status: status.data,
        profile: getProfile(kind, layoutFor(state.config, kind)),
    };

    return state;
};

function layoutFor(config: AppConfig, kind: ProfileKind): string {
    const { layouts } = config.data;
    return kind === 'general-ledger' ? layouts.general_ledger : layouts.subledger;
}
