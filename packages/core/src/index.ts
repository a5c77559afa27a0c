// Types (re-exported from shared)
export type {
    RequestRow,
    ChangeRequest,
    ChangeOutcome,
    ChangeRequestMap,
    ChangeOutcomeMap,
    AccountSelection,
    ItemStatus,
    PostingDateRange,
    ReportRow,
} from './types/index.js';

export {
    RequestRowSchema,
    ItemStatusSchema,
    FIELD_LIMITS,
    STATUS_MARKERS,
    OUTCOME_MESSAGES,
    ACCOUNT_ID_LENGTH,
    COMPANY_CODE_PATTERN,
    USER_MESSAGES,
} from './types/index.js';

// Errors
export {
    ItemEngineError,
    isItemEngineError,
    InvalidCompanyCodeError,
    InvalidAccountError,
    InvalidStatusError,
    InvalidDateRangeError,
    ValueTooLongError,
    NoItemsFoundError,
    NoMatchingItemsError,
    UnboundSessionError,
    EngineStateError,
    LoadFailedError,
    ConnectionLostError,
    FieldNotPresentError,
    FolderNotFoundError,
    DataExportError,
} from './errors.js';
export type { ErrorTier, ItemEngineErrorCode } from './errors.js';

// Session
export { GuiSessionAdapter, VIRTUAL_KEYS } from './session/index.js';
export type {
    RemoteSession,
    ResultGrid,
    ControlRef,
    VirtualKey,
    GuiSession,
    GuiWindow,
    GuiComponent,
    Clipboard,
} from './session/index.js';

// Profiles
export { GENERAL_LEDGER_PROFILE, SUBLEDGER_PROFILE, getProfile, selectProfile } from './profile/index.js';
export type { TransactionProfile, ProfileKind, ProfileSelection, EditableField } from './profile/index.js';

// Engine
export {
    TransactionNavigator,
    ItemUpdateEngine,
    modifyItems,
    createDefaultOutcome,
    classifyStatusLine,
} from './engine/index.js';
export type { EngineState, ItemRow, RunOptions, LoadStatus } from './engine/index.js';

// Export
export { LineItemExporter, exportLineItems, EXPORT_ENCODING_UTF8 } from './export/index.js';
export type { ExportFileAccess, ExportResult, LineItemExportRequest } from './export/index.js';

// Input
export { parseRequestWorkbook, validateRequestRows, extractCompanyCode } from './input/index.js';
export type { RequestParseResult, RequestValidationResult } from './input/index.js';
