import { USER_MESSAGES, isItemEngineError, modifyItems } from '@itemfix/core';
import type { PipelineStep } from '../types.js';
import { EXIT_CODES } from '../../types.js';
import { errorMessage } from '../../utils/buffer.js';

const STEP = 'modify';

/**
 * Step 3: Modify Items
 * Runs the Item Update Engine over the requested accounts.
 *
 * Expected conditions (nothing found) are reported to the requester;
 * session and input failures stop the run.
 */
export const modifyAccountItems: PipelineStep = async (state) => {
    const { input, connection } = state;
    if (!input || !connection) {
        state.errors.push({
            step: STEP,
            message: 'No validated input or session to process.',
            fatal: true,
            exitCode: EXIT_CODES.PROCESSING,
        });
        return state;
    }

    try {
        state.outcome = await modifyItems(
            connection.session,
            { kind: 'accounts', accounts: input.accounts },
            input.companyCode,
            input.requests,
            input.profile,
            { status: input.status }
        );
    } catch (err) {
        if (isItemEngineError(err) && err.tier === 'expected') {
            state.notice = { kind: 'error', message: USER_MESSAGES.NO_ITEMS_FOUND, attachment: input.workbookPath };
            state.errors.push({ step: STEP, message: err.message, fatal: true, exitCode: EXIT_CODES.PROCESSING, error: err });
        } else if (isItemEngineError(err) && err.tier === 'input') {
            state.notice = { kind: 'error', message: err.message, attachment: input.workbookPath };
            state.errors.push({ step: STEP, message: err.message, fatal: true, exitCode: EXIT_CODES.INPUT, error: err });
        } else {
            state.errors.push({
                step: STEP,
                message: `Processing failed: ${errorMessage(err)}`,
                fatal: true,
                exitCode: EXIT_CODES.PROCESSING,
                error: err,
            });
        }
    }

    return state;
};
