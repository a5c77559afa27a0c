import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
    GuiSessionAdapter,
    ItemStatusSchema,
    exportLineItems,
    getProfile,
    isItemEngineError,
    selectProfile,
    type AccountSelection,
    type GuiSession,
    type ProfileKind,
    type TransactionProfile,
} from '@itemfix/core';
import type { AppConfig } from '@itemfix/shared';
import { openWorkspace } from '../workspace/config.js';
import { getBridgePath } from '../workspace/paths.js';
import { loadBridge, type ScriptingBridge } from '../bridge/loader.js';
import { localExportFiles } from '../export/fs-files.js';
import { success, warn, error, arrow } from '../utils/console.js';
import { errorMessage } from '../utils/buffer.js';
import { EXIT_CODES, type ExitCode, type ExportOptions } from '../types.js';

const LEDGERS: readonly ProfileKind[] = ['general-ledger', 'subledger'];

/**
 * Parses a comma-separated list of account ids.
 * Returns null if any entry is not a number.
 */
export function parseAccountList(value: string): number[] | null {
    const parts = value.split(',').map(part => part.trim()).filter(part => part !== '');
    if (parts.length === 0 || parts.some(part => !/^\d+$/.test(part))) {
        return null;
    }
    return parts.map(part => parseInt(part, 10));
}

type Resolved = { selection: AccountSelection; profile: TransactionProfile } | { error: string };

/**
 * Works out the account selection and transaction profile from the options.
 */
export function resolveExportTarget(options: ExportOptions, config: AppConfig): Resolved {
    if (Boolean(options.accounts) === Boolean(options.worklist)) {
        return { error: 'Exactly one of --accounts or --worklist must be given.' };
    }

    let selection: AccountSelection;
    let kind: ProfileKind;

    if (options.accounts) {
        const accounts = parseAccountList(options.accounts);
        if (!accounts) {
            return { error: `Invalid account list: "${options.accounts}"` };
        }
        const selected = selectProfile(accounts);
        if (!selected.ok) {
            return { error: selected.error };
        }
        selection = { kind: 'accounts', accounts };
        kind = selected.profile.kind;
    } else {
        const ledger = LEDGERS.find(l => l === options.ledger);
        if (!ledger) {
            return { error: `Unrecognized ledger: '${options.ledger}'. Use ${LEDGERS.join(' or ')}.` };
        }
        selection = { kind: 'worklist', name: options.worklist ?? '' };
        kind = ledger;
    }

    const configured = kind === 'general-ledger' ? config.data.layouts.general_ledger : config.data.layouts.subledger;
    return { selection, profile: getProfile(kind, options.layout ?? configured) };
}

export async function exportCommand(options: ExportOptions): Promise<ExitCode> {
    let opened: ReturnType<typeof openWorkspace>;
    try {
        opened = openWorkspace(options.workspace);
    } catch (err) {
        error(errorMessage(err));
        return EXIT_CODES.INITIALIZATION;
    }
    const { workspace, config } = opened;

    const target = resolveExportTarget(options, config);
    if ('error' in target) {
        error(target.error);
        return EXIT_CODES.INPUT;
    }

    const status = ItemStatusSchema.safeParse(options.status);
    if (!status.success) {
        error(`Unrecognized item status: '${options.status}'`);
        return EXIT_CODES.INPUT;
    }

    let bridge: ScriptingBridge;
    let gui: GuiSession;
    try {
        bridge = await loadBridge(getBridgePath(workspace, config));
        gui = await bridge.connect(config.sap.system);
    } catch (err) {
        error(`Failed to connect to system ${config.sap.system}: ${errorMessage(err)}`);
        return EXIT_CODES.INITIALIZATION;
    }

    const file = join(workspace.temp, `export_${Date.now()}.txt`);
    arrow(`Exporting ${target.profile.kind} items to ${options.out}...`);

    try {
        await mkdir(workspace.temp, { recursive: true });
        const result = await exportLineItems(
            new GuiSessionAdapter(gui, bridge.clipboard),
            target.profile,
            {
                file,
                selection: target.selection,
                companyCode: options.companyCode,
                status: status.data,
                dates: { from: options.from, to: options.to },
            },
            localExportFiles
        );
        for (const w of result.warnings) {
            warn(w);
        }

        await writeFile(resolve(options.out), result.data, 'utf-8');
        success(`Exported ${result.data.split(/\r?\n/).filter(line => line.trim() !== '').length} line(s) to ${options.out}`);
        return EXIT_CODES.SUCCESS;
    } catch (err) {
        error(errorMessage(err));
        return isItemEngineError(err) && err.tier === 'input' ? EXIT_CODES.INPUT : EXIT_CODES.PROCESSING;
    } finally {
        try {
            await bridge.disconnect(gui);
        } catch (err) {
            warn(`Failed to disconnect from the session: ${errorMessage(err)}`);
        }
        await rm(workspace.temp, { recursive: true, force: true });
    }
}
