/**
 * RemoteSession implementation over the GUI scripting object model.
 */

import { win32 } from 'node:path';
import { FieldNotPresentError } from '../errors.js';
import {
    isButton,
    isGrid,
    isRadioButton,
    isStatusbar,
    isTextField,
    type Clipboard,
    type GuiComponent,
    type GuiGrid,
    type GuiSession,
    type GuiWindow,
} from './gui-scripting.js';
import { VIRTUAL_KEYS, type ControlRef, type RemoteSession, type ResultGrid, type VirtualKey } from './types.js';

const RESULT_GRID_ID = 'usr/cntlGRID1/shellcont/shell/shellcont[1]/shell';
const STATUS_BAR_ID = 'sbar';
const INFORMATION_DIALOG_TITLE = 'Information';

/** Controls of the local file export dialogs. */
const EXPORT_DIALOG = {
    FORMAT_OPTION: { name: 'SPOPLI-SELFLAG', type: 'GuiRadioButton', window: 1 },
    FOLDER: { name: 'DY_PATH', type: 'GuiCTextField', window: 1 },
    FILE_NAME: { name: 'DY_FILENAME', type: 'GuiCTextField', window: 1 },
    ENCODING: { name: 'DY_FILE_ENCODING', type: 'GuiCTextField', window: 1 },
} as const satisfies Record<string, ControlRef>;

class GuiResultGrid implements ResultGrid {
    constructor(private readonly grid: GuiGrid) {}

    async rowCount(): Promise<number> {
        return this.grid.rowCount;
    }

    async selectRow(index: number): Promise<void> {
        this.grid.selectedRows = String(index);
        this.grid.currentCellRow = index;
    }

    async readCell(index: number, column: string): Promise<string> {
        return this.grid.getCellValue(index, column);
    }
}

export class GuiSessionAdapter implements RemoteSession {
    constructor(
        private readonly session: GuiSession,
        private readonly clipboard: Clipboard
    ) {}

    async startTransaction(code: string): Promise<void> {
        this.session.startTransaction(code);
    }

    async endTransaction(): Promise<void> {
        this.session.endTransaction();
    }

    async hasField(field: ControlRef): Promise<boolean> {
        const window = this.session.findWindow(field.window ?? 0);
        return window?.findByName(field.name, field.type) !== undefined;
    }

    async setField(field: ControlRef, value: string): Promise<void> {
        const control = this.find(field);
        if (!isTextField(control)) {
            throw new FieldNotPresentError(field.name);
        }
        control.text = value;
    }

    async readField(field: ControlRef): Promise<string> {
        const control = this.find(field);
        if (!isTextField(control)) {
            throw new FieldNotPresentError(field.name);
        }
        return control.text;
    }

    async selectOption(option: ControlRef): Promise<void> {
        const control = this.find(option);
        if (!isRadioButton(control)) {
            throw new FieldNotPresentError(option.name);
        }
        control.select();
    }

    async pressButton(button: ControlRef): Promise<void> {
        const control = this.find(button);
        if (!isButton(control)) {
            throw new FieldNotPresentError(button.name);
        }
        control.press();
    }

    async sendCommand(key: VirtualKey): Promise<void> {
        this.session.activeWindow.sendVKey(VIRTUAL_KEYS[key]);
    }

    async isModalOpen(): Promise<boolean> {
        return this.session.activeWindow.type === 'GuiModalWindow';
    }

    /**
     * Confirms or declines the active dialog. Informational dialogs have
     * a single button and are answered by key; confirmation dialogs by
     * pressing the "Yes" or "No" button.
     */
    async resolveModal(confirm: boolean): Promise<void> {
        const dialog = this.session.activeWindow;
        if (dialog.type !== 'GuiModalWindow') {
            return;
        }

        if (dialog.text === INFORMATION_DIALOG_TITLE) {
            dialog.sendVKey(confirm ? VIRTUAL_KEYS.Enter : VIRTUAL_KEYS.F12);
            return;
        }

        const caption = confirm ? 'Yes' : 'No';
        const button = dialog
            .findAllByType('GuiButton')
            .filter(isButton)
            .find(b => b.text.trim() === caption);

        if (!button) {
            throw new FieldNotPresentError(`${caption} button of dialog '${dialog.text}'`);
        }
        button.press();
    }

    async readStatusLine(): Promise<string> {
        const bar = this.mainWindow().findById(STATUS_BAR_ID);
        if (!bar || !isStatusbar(bar)) {
            throw new FieldNotPresentError(STATUS_BAR_ID);
        }
        return bar.text;
    }

    async getResultGrid(): Promise<ResultGrid> {
        const grid = this.mainWindow().findById(RESULT_GRID_ID);
        if (!grid || !isGrid(grid)) {
            throw new FieldNotPresentError(RESULT_GRID_ID);
        }
        return new GuiResultGrid(grid);
    }

    async getFilterFieldList(): Promise<ResultGrid> {
        // The dialog shows two grids: selected criteria first, available fields second.
        const grids = this.window(1).findAllByName('shell', 'GuiApoGrid').filter(isGrid);
        const available = grids[1];
        if (!available) {
            throw new FieldNotPresentError('shell (available filter fields)');
        }
        return new GuiResultGrid(available);
    }

    async bulkInsertValues(picker: ControlRef, values: readonly string[]): Promise<void> {
        await this.pressButton(picker);
        await this.sendCommand('ShiftF4');     // clear any previous values

        try {
            await this.clipboard.write(values.join('\r\n'));
            await this.sendCommand('ShiftF12'); // paste from clipboard
        } finally {
            await this.clipboard.clear();
        }

        await this.sendCommand('F8');          // confirm the entered values
    }

    async exportGridToFile(path: string, encoding: string): Promise<void> {
        const folder = win32.dirname(path);
        const fileName = win32.basename(path);

        await this.sendCommand('F9');          // open local file export dialog

        // plain text export format
        const formats = this.window(1)
            .findAllByName(EXPORT_DIALOG.FORMAT_OPTION.name, EXPORT_DIALOG.FORMAT_OPTION.type)
            .filter(isRadioButton);
        const plainText = formats[0];
        if (!plainText) {
            throw new FieldNotPresentError(EXPORT_DIALOG.FORMAT_OPTION.name);
        }
        plainText.select();
        await this.sendCommand('Enter');

        await this.setField(EXPORT_DIALOG.FOLDER, `${folder}\\`);
        await this.setField(EXPORT_DIALOG.FILE_NAME, fileName);
        await this.setField(EXPORT_DIALOG.ENCODING, encoding);
        await this.sendCommand('CtrlS');       // replace an existing file
    }

    private mainWindow(): GuiWindow {
        return this.window(0);
    }

    private window(index: number): GuiWindow {
        const window = this.session.findWindow(index);
        if (!window) {
            throw new FieldNotPresentError(`wnd[${index}]`);
        }
        return window;
    }

    private find(ref: ControlRef): GuiComponent {
        const control = this.window(ref.window ?? 0).findByName(ref.name, ref.type);
        if (!control) {
            throw new FieldNotPresentError(ref.name);
        }
        return control;
    }
}
