/**
 * Line Item Exporter: loads the items of the selected accounts and returns
 * the item list as the flat text file the session writes.
 *
 * ARCHITECTURAL NOTE: No file system access here. The caller injects an
 * `ExportFileAccess`; a failed clean-up is returned as a warning.
 */

import { win32 } from 'node:path';
import { DataExportError, FolderNotFoundError } from '../errors.js';
import type { AccountSelection, ItemStatus, PostingDateRange } from '../types/index.js';
import type { RemoteSession } from '../session/types.js';
import type { TransactionProfile } from '../profile/profiles.js';
import { TransactionNavigator } from '../engine/navigator.js';
import {
    assertAccounts,
    assertCompanyCode,
    assertStatus,
    assertWorklist,
    toSessionDateRange,
} from '../engine/validate.js';

/** Session code page of UTF-8 text exports. */
export const EXPORT_ENCODING_UTF8 = '4120';

/**
 * File operations the exporter needs on the machine the session writes to.
 */
export interface ExportFileAccess {
    directoryExists(path: string): Promise<boolean>;
    readText(path: string): Promise<string>;
    remove(path: string): Promise<void>;
}

export interface LineItemExportRequest {
    /** Temporary file the session exports to. */
    file: string;
    selection: AccountSelection;
    companyCode: string;
    status?: ItemStatus;
    dates?: PostingDateRange;
}

export interface ExportResult {
    data: string;
    warnings: string[];
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class LineItemExporter extends TransactionNavigator {
    constructor(
        profile: TransactionProfile,
        private readonly files: ExportFileAccess
    ) {
        super(profile);
    }

    /**
     * Writes the loaded item list to `path`, reads it back and removes
     * the file.
     *
     * @throws FolderNotFoundError if the folder of `path` does not exist
     * @throws DataExportError if the export does not produce a readable file
     */
    async exportToFile(path: string): Promise<ExportResult> {
        const session = this.require('export items', ['loaded']);

        await session.sendCommand('CtrlF8');        // choose layout
        await session.sendCommand('CtrlShiftF6');   // show technical field names
        await session.sendCommand('Enter');

        await this.assertFolder(path);

        try {
            await session.exportGridToFile(path, EXPORT_ENCODING_UTF8);
        } catch (err) {
            throw new DataExportError(`Export of the item list failed: ${errorMessage(err)}`, { cause: err });
        }

        await session.sendCommand('F3');
        this.grid = null;
        this.state = 'committed';

        let data: string;
        try {
            data = await this.files.readText(path);
        } catch (err) {
            throw new DataExportError(`Exported file '${path}' could not be read!`, { cause: err });
        }

        const warnings: string[] = [];
        try {
            await this.files.remove(path);
        } catch (err) {
            warnings.push(`Could not remove temporary export file '${path}': ${errorMessage(err)}`);
        }

        return { data, warnings };
    }

    async assertFolder(path: string): Promise<void> {
        const folder = win32.dirname(path);
        if (!(await this.files.directoryExists(folder))) {
            throw new FolderNotFoundError(`Export folder not found: '${folder}'!`);
        }
    }
}

/**
 * Exports the line items of the selected accounts as text.
 *
 * Input and the destination folder are checked before the session is
 * touched; the transaction context is always closed again.
 */
export async function exportLineItems(
    session: RemoteSession,
    profile: TransactionProfile,
    request: LineItemExportRequest,
    files: ExportFileAccess
): Promise<ExportResult> {
    const { selection, companyCode, status = 'open', dates = {} } = request;

    assertCompanyCode(companyCode);
    if (selection.kind === 'accounts') {
        assertAccounts(selection.accounts);
    } else {
        assertWorklist(selection.name);
    }
    assertStatus(status);
    toSessionDateRange(dates);

    const exporter = new LineItemExporter(profile, files);
    await exporter.assertFolder(request.file);

    await exporter.start(session);
    try {
        await exporter.setAccounts(selection, companyCode);
        await exporter.setLayout(profile.layout);
        await exporter.setSelectionStatus(status);
        await exporter.setPostingDates(dates);
        await exporter.loadItems();
        return await exporter.exportToFile(request.file);
    } finally {
        await exporter.close();
    }
}
