import type { GuiControlType } from './gui-scripting.js';

/**
 * Virtual key codes understood by the session.
 */
export const VIRTUAL_KEYS = {
    Enter: 0,
    F2: 2,
    F3: 3,
    F4: 4,
    F6: 6,
    F8: 8,
    F9: 9,
    CtrlS: 11,
    F12: 12,
    ShiftF1: 13,
    ShiftF2: 14,
    ShiftF4: 16,
    ShiftF12: 24,
    CtrlF1: 25,
    CtrlF8: 32,
    CtrlShiftF2: 38,
    CtrlShiftF6: 42,
} as const;

export type VirtualKey = keyof typeof VIRTUAL_KEYS;

/**
 * Locates a control by technical name within a window.
 */
export interface ControlRef {
    name: string;
    type: GuiControlType;
    /** Window index; 0 (the main window) when omitted. */
    window?: number;
}

/**
 * Handle to a grid displayed by the session.
 */
export interface ResultGrid {
    rowCount(): Promise<number>;
    selectRow(index: number): Promise<void>;
    readCell(index: number, column: string): Promise<string>;
}

/**
 * Capability surface of one live interactive session.
 *
 * Screen transitions happen only through `sendCommand`, `pressButton`
 * and `startTransaction`. Each call resolves once the session reflects it.
 */
export interface RemoteSession {
    startTransaction(code: string): Promise<void>;
    endTransaction(): Promise<void>;

    hasField(field: ControlRef): Promise<boolean>;
    setField(field: ControlRef, value: string): Promise<void>;
    readField(field: ControlRef): Promise<string>;
    selectOption(option: ControlRef): Promise<void>;
    pressButton(button: ControlRef): Promise<void>;
    sendCommand(key: VirtualKey): Promise<void>;

    isModalOpen(): Promise<boolean>;
    resolveModal(confirm: boolean): Promise<void>;

    readStatusLine(): Promise<string>;
    getResultGrid(): Promise<ResultGrid>;
    getFilterFieldList(): Promise<ResultGrid>;

    /**
     * Opens the multi-value picker behind `picker`, replaces its values
     * with `values` and confirms. The transfer medium is cleared afterwards.
     */
    bulkInsertValues(picker: ControlRef, values: readonly string[]): Promise<void>;

    /**
     * Writes the displayed grid to a local file.
     * @param encoding - Code page code of the session, e.g. "4120" for UTF-8
     */
    exportGridToFile(path: string, encoding: string): Promise<void>;
}
