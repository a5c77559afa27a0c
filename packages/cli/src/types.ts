/**
 * itemfix CLI - Core Types
 */

export interface ModifyOptions {
    companyCode?: string;
    body?: string;
    sender: string;
    status: string;
    workspace?: string;
}

export interface ExportOptions {
    accounts?: string;
    worklist?: string;
    /** Ledger of the worklist; account lists pick it from the id length. */
    ledger: string;
    companyCode: string;
    out: string;
    status: string;
    from?: string;
    to?: string;
    layout?: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    appConfigPath: string;
}

export interface Workspace {
    root: string;
    temp: string;
    templates: string;
    config: WorkspaceConfig;
}

/**
 * Process exit codes of the `modify` command.
 */
export const EXIT_CODES = {
    SUCCESS: 0,
    INITIALIZATION: 1,
    INPUT: 2,
    PROCESSING: 3,
    REPORTING: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
