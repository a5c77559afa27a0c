export { GuiSessionAdapter } from './adapter.js';
export { VIRTUAL_KEYS } from './types.js';
export type { RemoteSession, ResultGrid, ControlRef, VirtualKey } from './types.js';
export {
    isTextField,
    isButton,
    isRadioButton,
    isGrid,
    isStatusbar,
} from './gui-scripting.js';
export type {
    GuiSession,
    GuiWindow,
    GuiComponent,
    GuiTextField,
    GuiButton,
    GuiRadioButton,
    GuiGrid,
    GuiStatusbar,
    GuiControlType,
    Clipboard,
} from './gui-scripting.js';
