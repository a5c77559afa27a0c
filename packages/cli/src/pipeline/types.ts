import type { AppConfig } from '@itemfix/shared';
import type {
    ChangeOutcomeMap,
    ChangeRequest,
    GuiSession,
    ItemStatus,
    RemoteSession,
    RequestRow,
    TransactionProfile,
} from '@itemfix/core';
import type { ScriptingBridge } from '../bridge/loader.js';
import type { ExitCode, ModifyOptions, Workspace } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    exitCode: ExitCode;
    error?: unknown;
}

/**
 * Validated request, ready for processing.
 */
export interface RequestInput {
    workbookPath: string;
    rows: RequestRow[];
    requests: Map<string, ChangeRequest>;
    accounts: number[];
    companyCode: string;
    status: ItemStatus;
    profile: TransactionProfile;
}

export interface SessionConnection {
    bridge: ScriptingBridge;
    gui: GuiSession;
    session: RemoteSession;
}

/**
 * What the requester is told at the end of the run.
 */
export type Notice =
    | { kind: 'completed'; attachment: string }
    | { kind: 'error'; message: string; attachment?: string };

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    config: AppConfig;
    options: ModifyOptions;
    workbookPath: string;

    // Accumulated during pipeline execution
    input?: RequestInput;
    connection?: SessionConnection;
    outcome?: ChangeOutcomeMap;
    reportPath?: string;
    notice?: Notice;
    /** Outbox envelope of the notification sent. */
    notificationPath?: string;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;

export interface PipelineStepDefinition {
    name: string;
    fn: PipelineStep;
    /** Runs even after a fatal error. */
    always?: boolean;
}
