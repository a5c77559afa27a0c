import { mkdir } from 'node:fs/promises';
import type { PipelineStep } from '../types.js';
import { EXIT_CODES } from '../../types.js';
import { buildReportRows, writeReport } from '../../excel/report.js';
import { getReportPath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/buffer.js';

/**
 * Step 4: Report
 * Writes the request rows with their outcome messages to the report workbook.
 */
export const createReport: PipelineStep = async (state) => {
    const { input, outcome } = state;
    if (!input || !outcome) {
        return state;
    }

    const path = getReportPath(state.workspace, state.config);

    try {
        await mkdir(state.workspace.temp, { recursive: true });
        await writeReport(path, buildReportRows(input.rows, outcome), state.config.data.sheet_name);
        state.reportPath = path;
        state.notice = { kind: 'completed', attachment: path };
    } catch (err) {
        state.errors.push({
            step: 'report',
            message: `Failed to write report ${path}: ${errorMessage(err)}`,
            fatal: true,
            exitCode: EXIT_CODES.REPORTING,
            error: err,
        });
    }

    return state;
};
