/**
 * Error taxonomy of the item engines.
 *
 * Every error carries a stable `code` and a `tier`:
 * - `input`: bad caller input, raised before anything is written to the session
 * - `expected`: a legitimate outcome of the selection (nothing to change)
 * - `infrastructure`: the session or the file system failed; fatal for the run
 *
 * None of these are retried internally.
 */

export type ErrorTier = 'input' | 'expected' | 'infrastructure';

export type ItemEngineErrorCode =
    | 'UNBOUND_SESSION'
    | 'ENGINE_STATE'
    | 'INVALID_COMPANY_CODE'
    | 'INVALID_ACCOUNT'
    | 'INVALID_STATUS'
    | 'INVALID_DATE_RANGE'
    | 'VALUE_TOO_LONG'
    | 'NO_ITEMS_FOUND'
    | 'NO_MATCHING_ITEMS'
    | 'LOAD_FAILED'
    | 'CONNECTION_LOST'
    | 'FIELD_NOT_PRESENT'
    | 'FOLDER_NOT_FOUND'
    | 'DATA_EXPORT';

export abstract class ItemEngineError extends Error {
    abstract readonly code: ItemEngineErrorCode;
    abstract readonly tier: ErrorTier;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export function isItemEngineError(value: unknown): value is ItemEngineError {
    return value instanceof ItemEngineError;
}

// ----------------------------------------------------------------------------
// Input
// ----------------------------------------------------------------------------

export class InvalidCompanyCodeError extends ItemEngineError {
    readonly code = 'INVALID_COMPANY_CODE';
    readonly tier = 'input';
}

export class InvalidAccountError extends ItemEngineError {
    readonly code = 'INVALID_ACCOUNT';
    readonly tier = 'input';
}

export class InvalidStatusError extends ItemEngineError {
    readonly code = 'INVALID_STATUS';
    readonly tier = 'input';
}

export class InvalidDateRangeError extends ItemEngineError {
    readonly code = 'INVALID_DATE_RANGE';
    readonly tier = 'input';
}

export class ValueTooLongError extends ItemEngineError {
    readonly code = 'VALUE_TOO_LONG';
    readonly tier = 'input';

    constructor(
        readonly field: 'text' | 'assignment',
        readonly value: string,
        readonly maxLength: number
    ) {
        super(
            `The length of the entered value '${value}' exceeds ` +
            `the allowed maximum of ${maxLength} chars for the ${field} field!`
        );
    }
}

// ----------------------------------------------------------------------------
// Expected
// ----------------------------------------------------------------------------

/**
 * The selection criteria matched no items at all.
 */
export class NoItemsFoundError extends ItemEngineError {
    readonly code = 'NO_ITEMS_FOUND';
    readonly tier = 'expected';
}

/**
 * Items were loaded, but none of them carries one of the requested texts.
 */
export class NoMatchingItemsError extends ItemEngineError {
    readonly code = 'NO_MATCHING_ITEMS';
    readonly tier = 'expected';
}

// ----------------------------------------------------------------------------
// Infrastructure
// ----------------------------------------------------------------------------

export class UnboundSessionError extends ItemEngineError {
    readonly code = 'UNBOUND_SESSION';
    readonly tier = 'infrastructure';
}

/**
 * An engine operation was called out of order.
 */
export class EngineStateError extends ItemEngineError {
    readonly code = 'ENGINE_STATE';
    readonly tier = 'infrastructure';
}

export class LoadFailedError extends ItemEngineError {
    readonly code = 'LOAD_FAILED';
    readonly tier = 'infrastructure';

    /** Raw status line text, or the reason the load command failed. */
    readonly detail: string;

    constructor(detail: string, options?: ErrorOptions) {
        super(`Loading of items failed: ${detail}`, options);
        this.detail = detail;
    }
}

export class ConnectionLostError extends ItemEngineError {
    readonly code = 'CONNECTION_LOST';
    readonly tier = 'infrastructure';
}

export class FieldNotPresentError extends ItemEngineError {
    readonly code = 'FIELD_NOT_PRESENT';
    readonly tier = 'infrastructure';

    constructor(readonly field: string, options?: ErrorOptions) {
        super(`Control '${field}' not found on the current screen!`, options);
    }
}

export class FolderNotFoundError extends ItemEngineError {
    readonly code = 'FOLDER_NOT_FOUND';
    readonly tier = 'infrastructure';
}

export class DataExportError extends ItemEngineError {
    readonly code = 'DATA_EXPORT';
    readonly tier = 'infrastructure';
}
