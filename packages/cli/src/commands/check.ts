import { readFile } from 'node:fs/promises';
import { parseRequestWorkbook, validateRequestRows, type RequestParseResult } from '@itemfix/core';
import { log, success, warn, error, info, arrow } from '../utils/console.js';
import { errorMessage, toArrayBuffer } from '../utils/buffer.js';
import { EXIT_CODES, type ExitCode } from '../types.js';

/**
 * Validates a request workbook and lists the changes it would make.
 * No session is opened.
 */
export async function checkCommand(workbook: string): Promise<ExitCode> {
    let result: RequestParseResult;
    try {
        result = parseRequestWorkbook(toArrayBuffer(await readFile(workbook)));
    } catch (err) {
        error(`Failed to read ${workbook}: ${errorMessage(err)}`);
        return EXIT_CODES.INPUT;
    }

    for (const w of result.warnings) {
        warn(w);
    }

    const validation = validateRequestRows(result.rows);
    for (const w of validation.warnings) {
        warn(w);
    }
    if (!validation.valid || !validation.profile) {
        for (const e of validation.errors) {
            error(e);
        }
        return EXIT_CODES.INPUT;
    }

    success(`${validation.requests.size} change request(s) for ${validation.accounts.length} account(s)`);
    info(`Ledger: ${validation.profile.kind} (${validation.profile.transactionCode})`);
    info(`Accounts: ${validation.accounts.join(', ')}`);

    for (const [oldText, request] of validation.requests) {
        log(`\n"${oldText}"`);
        if (request.new_text !== null) {
            arrow(`Text:       "${request.new_text}"`);
        }
        if (request.new_assignment !== null) {
            arrow(`Assignment: "${request.new_assignment}"`);
        }
    }

    return EXIT_CODES.SUCCESS;
}
