export {
    GENERAL_LEDGER_PROFILE,
    SUBLEDGER_PROFILE,
    getProfile,
    selectProfile,
} from './profiles.js';
export type { TransactionProfile, ProfileKind, EditableField, ProfileSelection } from './profiles.js';
