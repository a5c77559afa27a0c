/**
 * Zod schemas for the item updater's data structures.
 *
 * Field names follow the column names of the request workbook
 * (snake_case), so a parsed row can be validated as-is.
 */

import { z } from 'zod';
import { COMPANY_CODE_PATTERN } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Four-digit company code, e.g. "0075".
 */
export const CompanyCodeSchema = z.string().regex(COMPANY_CODE_PATTERN, 'Must be exactly four digits');

/**
 * Account identifier as an unsigned integer.
 */
const accountId = z.number().int().nonnegative();

/**
 * Optional cell value: text, or null when the cell is empty.
 */
const nullableText = z.string().nullable();

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * One row of the inbound request workbook.
 */
export const RequestRowSchema = z.object({
    account: accountId,
    old_text: nullableText,
    new_text: nullableText,
    new_assignment: nullableText,
});

export type RequestRow = z.infer<typeof RequestRowSchema>;

/**
 * Desired values for all items carrying one old text.
 * Either value may be null when only the other field is to change.
 */
export const ChangeRequestSchema = z.object({
    new_text: nullableText,
    new_assignment: nullableText,
});

export type ChangeRequest = z.infer<typeof ChangeRequestSchema>;

/**
 * A change request together with what happened to it.
 */
export const ChangeOutcomeSchema = ChangeRequestSchema.extend({
    message: z.string(),
});

export type ChangeOutcome = z.infer<typeof ChangeOutcomeSchema>;

/**
 * Change requests keyed by the old text of the items to change.
 */
export type ChangeRequestMap = ReadonlyMap<string, ChangeRequest>;

/**
 * Outcomes keyed by the same old texts as the requests.
 */
export type ChangeOutcomeMap = Map<string, ChangeOutcome>;

// ============================================================================
// Selection Schemas
// ============================================================================

/**
 * Accounts to load items from: an explicit list or a predefined worklist.
 */
export const AccountSelectionSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('accounts'),
        accounts: z.array(accountId).min(1),
    }),
    z.object({
        kind: z.literal('worklist'),
        name: z.string().min(1),
    }),
]);

export type AccountSelection = z.infer<typeof AccountSelectionSchema>;

/**
 * Item status used to select line items.
 */
export const ItemStatusSchema = z.enum(['open', 'cleared', 'all']);

export type ItemStatus = z.infer<typeof ItemStatusSchema>;

/**
 * Posting date range for line item exports. Either bound may be omitted.
 */
export const PostingDateRangeSchema = z.object({
    from: isoDateString.optional(),
    to: isoDateString.optional(),
});

export type PostingDateRange = z.infer<typeof PostingDateRangeSchema>;

// ============================================================================
// Report Schemas
// ============================================================================

/**
 * One row of the outbound report: the request row and its outcome message.
 */
export const ReportRowSchema = RequestRowSchema.extend({
    message: z.string().nullable(),
});

export type ReportRow = z.infer<typeof ReportRowSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Application configuration (config/app-config.yaml).
 */
export const AppConfigSchema = z.object({
    sap: z.object({
        system: z.string().min(1),
        bridge: z.string().min(1),
    }),
    data: z.object({
        layouts: z.object({
            general_ledger: z.string().default(''),
            subledger: z.string().default(''),
        }),
        report_name: z.string().regex(/\.xlsx$/i, 'Report must be an .xlsx file'),
        sheet_name: z.string().min(1),
    }),
    messages: z.object({
        notifications: z.object({
            send: z.boolean(),
            sender: z.string().email(),
            subject: z.string().min(1),
            outbox: z.string().min(1).default('outbox'),
        }),
    }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
