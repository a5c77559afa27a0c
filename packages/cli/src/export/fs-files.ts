import { readFile, rm, stat } from 'node:fs/promises';
import type { ExportFileAccess } from '@itemfix/core';

/**
 * Export file access on the local file system, for a GUI client running
 * on the same machine.
 */
export const localExportFiles: ExportFileAccess = {
    async directoryExists(path) {
        try {
            return (await stat(path)).isDirectory();
        } catch {
            return false;
        }
    },
    readText(path) {
        return readFile(path, 'utf-8');
    },
    remove(path) {
        return rm(path);
    },
};
