/**
 * Typed view of the GUI scripting object model exposed by the
 * interactive session.
 *
 * The scripting bridge hands out live objects implementing these
 * interfaces; every property read or method call is a round trip to
 * the session and may throw when the session is gone.
 */

export type GuiTextFieldType = 'GuiTextField' | 'GuiCTextField';
export type GuiGridType = 'GuiGridView' | 'GuiApoGrid';

export type GuiControlType =
    | GuiTextFieldType
    | GuiGridType
    | 'GuiButton'
    | 'GuiRadioButton'
    | 'GuiStatusbar';

export interface GuiTextField {
    readonly type: GuiTextFieldType;
    readonly name: string;
    text: string;
}

export interface GuiButton {
    readonly type: 'GuiButton';
    readonly name: string;
    readonly text: string;
    press(): void;
}

export interface GuiRadioButton {
    readonly type: 'GuiRadioButton';
    readonly name: string;
    select(): void;
}

export interface GuiGrid {
    readonly type: GuiGridType;
    readonly name: string;
    readonly rowCount: number;
    /** Comma-separated list of selected row indexes. */
    selectedRows: string;
    currentCellRow: number;
    getCellValue(row: number, column: string): string;
}

export interface GuiStatusbar {
    readonly type: 'GuiStatusbar';
    readonly name: string;
    readonly text: string;
}

export type GuiComponent = GuiTextField | GuiButton | GuiRadioButton | GuiGrid | GuiStatusbar;

export interface GuiWindow {
    readonly type: 'GuiMainWindow' | 'GuiModalWindow';
    /** Window title. */
    readonly text: string;
    sendVKey(key: number): void;
    findById(id: string): GuiComponent | undefined;
    findByName(name: string, type: GuiControlType): GuiComponent | undefined;
    findAllByName(name: string, type: GuiControlType): readonly GuiComponent[];
    findAllByType(type: GuiControlType): readonly GuiComponent[];
}

export interface GuiSession {
    readonly activeWindow: GuiWindow;
    /** Window by index: 0 is the main window, 1+ are stacked dialogs. */
    findWindow(index: number): GuiWindow | undefined;
    startTransaction(code: string): void;
    endTransaction(): void;
}

/**
 * Shared text transfer medium used to paste multiple values at once.
 */
export interface Clipboard {
    write(text: string): Promise<void>;
    clear(): Promise<void>;
}

// ----------------------------------------------------------------------------
// Narrowing
// ----------------------------------------------------------------------------

export function isTextField(component: GuiComponent): component is GuiTextField {
    return component.type === 'GuiTextField' || component.type === 'GuiCTextField';
}

export function isButton(component: GuiComponent): component is GuiButton {
    return component.type === 'GuiButton';
}

export function isRadioButton(component: GuiComponent): component is GuiRadioButton {
    return component.type === 'GuiRadioButton';
}

export function isGrid(component: GuiComponent): component is GuiGrid {
    return component.type === 'GuiGridView' || component.type === 'GuiApoGrid';
}

export function isStatusbar(component: GuiComponent): component is GuiStatusbar {
    return component.type === 'GuiStatusbar';
}
