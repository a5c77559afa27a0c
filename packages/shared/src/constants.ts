/**
 * Constants shared by the engine, the request intake and the reports.
 */

/**
 * Maximum lengths accepted by the editable item fields.
 */
export const FIELD_LIMITS = {
    TEXT_MAX_LENGTH: 50,
    ASSIGNMENT_MAX_LENGTH: 18,
} as const;

/**
 * Substrings of the status line that classify the outcome of an item load.
 * Matched case-sensitively.
 */
export const STATUS_MARKERS = {
    NO_ITEMS_SELECTED: 'No items selected',
    ITEMS_DISPLAYED: 'items displayed',
} as const;

/**
 * Phrases that make up the per-entry audit trail returned to the caller.
 */
export const OUTCOME_MESSAGES = {
    NOT_FOUND: 'Document not found on the account!',
    TEXT_UNCHANGED: 'Text already contains the desired value.',
    ASSIGNMENT_UNCHANGED: 'Assignment already contains the desired value.',
    TEXT_UPDATED: 'Text updated.',
    ASSIGNMENT_UPDATED: 'Assignment updated.',
    ASSIGNMENT_UNAVAILABLE: 'Assignment cannot be changed for this item.',
} as const;

/**
 * Digit count of account identifiers per account domain.
 */
export const ACCOUNT_ID_LENGTH = {
    GENERAL_LEDGER: 8,
    SUBLEDGER: 7,
} as const;

/**
 * Company codes are exactly four digits, leading zeros included.
 */
export const COMPANY_CODE_PATTERN = /^\d{4}$/;

/**
 * Extracts the company code from the body of a request message.
 */
export const COMPANY_CODE_MESSAGE_PATTERN = /Company code:\s*(?<code>\d{4})/im;

/**
 * Column headers of the outbound report, in order.
 */
export const REPORT_COLUMNS = ['Account', 'Old Text', 'New Text', 'New Assignment', 'Message'] as const;

/**
 * User-facing messages for request rejections and expected conditions.
 */
export const USER_MESSAGES = {
    NO_RECORDS: 'The supplied data contains no records!',
    NO_NEW_VALUES: "The supplied data contains no entries in 'New Text' and 'New Assignment' columns!",
    NO_OLD_TEXT: "The supplied data contains no entries in 'Old Text' column!",
    MIXED_ACCOUNTS: 'Cannot combine customer and GL accounts in data!',
    NO_COMPANY_CODE: 'The message contains no valid company code!',
    NO_ITEMS_FOUND: 'No items with the text values you supplied were found on the account (s)!',
} as const;
