import { resolve } from 'node:path';
import { openWorkspace } from '../workspace/config.js';
import { createInitialState, resolveExitCode, runPipeline } from '../pipeline/runner.js';
import { log, success, warn, error, arrow } from '../utils/console.js';
import { errorMessage } from '../utils/buffer.js';
import { EXIT_CODES, type ExitCode, type ModifyOptions } from '../types.js';

export async function modifyCommand(workbook: string, options: ModifyOptions): Promise<ExitCode> {
    log(`\nitemfix - Updating item texts from ${workbook}`);

    if (!options.companyCode && !options.body) {
        error('Either --company-code or --body must be given.');
        return EXIT_CODES.INPUT;
    }

    // 1. Workspace and configuration
    arrow('Loading workspace...');
    let opened: ReturnType<typeof openWorkspace>;
    try {
        opened = openWorkspace(options.workspace);
    } catch (err) {
        error(errorMessage(err));
        return EXIT_CODES.INITIALIZATION;
    }
    success(`Workspace: ${opened.workspace.root}`);

    // 2. Run Pipeline
    const state = await runPipeline(
        createInitialState(resolve(workbook), opened.workspace, opened.config, options)
    );

    // 3. Report Final Status
    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }
    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }

    const exitCode = resolveExitCode(state);
    if (exitCode !== EXIT_CODES.SUCCESS) {
        log(`\n✖ Processing failed (exit code ${exitCode}).`);
        return exitCode;
    }

    success(`Processed ${state.outcome?.size ?? 0} change request(s).`);
    if (state.notificationPath) {
        arrow(`Notification: ${state.notificationPath}`);
    }
    return exitCode;
}
