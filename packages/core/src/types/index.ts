/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@itemfix/shared';

export {
    RequestRowSchema,
    ItemStatusSchema,
    FIELD_LIMITS,
    STATUS_MARKERS,
    OUTCOME_MESSAGES,
    ACCOUNT_ID_LENGTH,
    COMPANY_CODE_PATTERN,
    COMPANY_CODE_MESSAGE_PATTERN,
    USER_MESSAGES,
} from '@itemfix/shared';
