/**
 * Transaction profiles: the per-domain screen vocabulary of the
 * line item transactions.
 *
 * The engines are written once against `TransactionProfile`; the two
 * account domains differ only in the data below.
 */

import { ACCOUNT_ID_LENGTH, FIELD_LIMITS, USER_MESSAGES } from '../types/index.js';
import type { ControlRef } from '../session/types.js';

export type ProfileKind = 'general-ledger' | 'subledger';

/**
 * An editable item field on the row edit screen.
 */
export interface EditableField extends ControlRef {
    maxLength: number;
    /** Absent on some edit screens; probe before writing. */
    optional: boolean;
}

export interface TransactionProfile {
    readonly kind: ProfileKind;
    readonly transactionCode: string;
    readonly accountIdLength: number;
    /** Layout applied to the result grid; empty for the default layout. */
    readonly layout: string;
    readonly selection: {
        readonly accountPicker: ControlRef;
        /** Company code field while selecting by account list. */
        readonly companyCode: ControlRef;
        /** Company code field while selecting by worklist. */
        readonly worklistCompanyCode: ControlRef;
        readonly worklist: ControlRef;
        readonly layout: ControlRef;
        readonly postingDateFrom: ControlRef;
        readonly postingDateTo: ControlRef;
        readonly status: {
            readonly open: ControlRef;
            readonly cleared: ControlRef;
            readonly all: ControlRef;
        };
    };
    readonly edit: {
        readonly text: EditableField;
        readonly assignment: EditableField;
    };
    readonly grid: {
        readonly textColumn: string;
        readonly assignmentColumn: string;
    };
}

const STATUS_OPTIONS = {
    open: { name: 'X_OPSEL', type: 'GuiRadioButton' },
    cleared: { name: 'X_CLSEL', type: 'GuiRadioButton' },
    all: { name: 'X_AISEL', type: 'GuiRadioButton' },
} as const;

const COMMON_SELECTION = {
    worklistCompanyCode: { name: 'SO_WLBUK-LOW', type: 'GuiCTextField' },
    layout: { name: 'PA_VARI', type: 'GuiCTextField' },
    postingDateFrom: { name: 'SO_BUDAT-LOW', type: 'GuiCTextField' },
    postingDateTo: { name: 'SO_BUDAT-HIGH', type: 'GuiCTextField' },
    status: STATUS_OPTIONS,
} as const;

const GRID_COLUMNS = {
    textColumn: 'SGTXT',
    assignmentColumn: 'ZUONR',
} as const;

export const GENERAL_LEDGER_PROFILE: TransactionProfile = {
    kind: 'general-ledger',
    transactionCode: 'FBL3N',
    accountIdLength: ACCOUNT_ID_LENGTH.GENERAL_LEDGER,
    layout: '',
    selection: {
        ...COMMON_SELECTION,
        accountPicker: { name: '%_SD_SAKNR_%_APP_%-VALU_PUSH', type: 'GuiButton' },
        companyCode: { name: 'SD_BUKRS-LOW', type: 'GuiCTextField' },
        worklist: { name: 'PA_WLSAK', type: 'GuiCTextField' },
    },
    edit: {
        text: { name: 'BSEG-SGTXT', type: 'GuiCTextField', maxLength: FIELD_LIMITS.TEXT_MAX_LENGTH, optional: false },
        assignment: { name: 'BSEG-ZUONR', type: 'GuiTextField', maxLength: FIELD_LIMITS.ASSIGNMENT_MAX_LENGTH, optional: true },
    },
    grid: GRID_COLUMNS,
};

export const SUBLEDGER_PROFILE: TransactionProfile = {
    kind: 'subledger',
    transactionCode: 'FBL5N',
    accountIdLength: ACCOUNT_ID_LENGTH.SUBLEDGER,
    layout: '',
    selection: {
        ...COMMON_SELECTION,
        accountPicker: { name: '%_DD_KUNNR_%_APP_%-VALU_PUSH', type: 'GuiButton' },
        companyCode: { name: 'DD_BUKRS-LOW', type: 'GuiCTextField' },
        worklist: { name: 'PA_WLKUN', type: 'GuiCTextField' },
    },
    edit: {
        text: { name: 'BSEG-SGTXT', type: 'GuiTextField', maxLength: FIELD_LIMITS.TEXT_MAX_LENGTH, optional: false },
        assignment: { name: 'BSEG-ZUONR', type: 'GuiCTextField', maxLength: FIELD_LIMITS.ASSIGNMENT_MAX_LENGTH, optional: true },
    },
    grid: GRID_COLUMNS,
};

const PROFILES: Record<ProfileKind, TransactionProfile> = {
    'general-ledger': GENERAL_LEDGER_PROFILE,
    subledger: SUBLEDGER_PROFILE,
};

export function getProfile(kind: ProfileKind, layout = ''): TransactionProfile {
    return { ...PROFILES[kind], layout };
}

export type ProfileSelection =
    | { ok: true; profile: TransactionProfile }
    | { ok: false; error: string };

/**
 * Picks the profile whose account id length matches every account of the batch.
 *
 * @param accounts - Account ids of one batch
 */
export function selectProfile(accounts: readonly number[]): ProfileSelection {
    const lengths = new Set(accounts.map(acc => String(acc).length));

    if (lengths.size === 0) {
        return { ok: false, error: 'No accounts supplied!' };
    }
    if (lengths.size > 1) {
        return { ok: false, error: USER_MESSAGES.MIXED_ACCOUNTS };
    }

    const [length] = lengths;
    const profile = Object.values(PROFILES).find(p => p.accountIdLength === length);
    if (!profile) {
        return { ok: false, error: `Unsupported account number length: ${length} digits!` };
    }

    return { ok: true, profile };
}
