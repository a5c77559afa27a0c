// Schemas
export {
    CompanyCodeSchema,
    RequestRowSchema,
    ChangeRequestSchema,
    ChangeOutcomeSchema,
    AccountSelectionSchema,
    ItemStatusSchema,
    PostingDateRangeSchema,
    ReportRowSchema,
    AppConfigSchema,
} from './schemas.js';

// Types
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
    AppConfig,
} from './schemas.js';

// Constants
export {
    FIELD_LIMITS,
    STATUS_MARKERS,
    OUTCOME_MESSAGES,
    ACCOUNT_ID_LENGTH,
    COMPANY_CODE_PATTERN,
    COMPANY_CODE_MESSAGE_PATTERN,
    REPORT_COLUMNS,
    USER_MESSAGES,
} from './constants.js';
