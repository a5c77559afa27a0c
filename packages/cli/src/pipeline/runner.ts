import type { AppConfig } from '@itemfix/shared';
import type { PipelineState, PipelineStepDefinition } from './types.js';
import { loadInput } from './steps/load-input.js';
import { connectSession } from './steps/connect.js';
import { modifyAccountItems } from './steps/modify.js';
import { createReport } from './steps/report.js';
import { notifyRequester } from './steps/notify.js';
import { cleanup } from './steps/cleanup.js';
import { stepFailed, stepStarted } from '../utils/console.js';
import { EXIT_CODES, type ExitCode, type ModifyOptions, type Workspace } from '../types.js';

export const MODIFY_STEPS: PipelineStepDefinition[] = [
    { name: 'Load Input', fn: loadInput },
    { name: 'Connect', fn: connectSession },
    { name: 'Modify Items', fn: modifyAccountItems },
    { name: 'Report', fn: createReport },
    { name: 'Notify', fn: notifyRequester, always: true },
    { name: 'Cleanup', fn: cleanup, always: true },
];

export function createInitialState(
    workbookPath: string,
    workspace: Workspace,
    config: AppConfig,
    options: ModifyOptions
): PipelineState {
    return {
        workspace,
        config,
        options,
        workbookPath,
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially. After a fatal error only the steps
 * marked `always` run.
 */
export async function runPipeline(
    initial: PipelineState,
    steps: readonly PipelineStepDefinition[] = MODIFY_STEPS
): Promise<PipelineState> {
    let state = initial;
    let stopped = false;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (stopped && !step.always) {
            continue;
        }

        stepStarted(i, steps.length, step.name);
        state = await step.fn(state);

        if (!stopped && state.errors.some(e => e.fatal)) {
            stepFailed(step.name);
            stopped = true;
        }
    }

    return state;
}

/**
 * Exit code of the first fatal error, or success.
 */
export function resolveExitCode(state: PipelineState): ExitCode {
    return state.errors.find(e => e.fatal)?.exitCode ?? EXIT_CODES.SUCCESS;
}
