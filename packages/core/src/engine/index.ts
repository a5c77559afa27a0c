export { TransactionNavigator, type EngineState } from './navigator.js';
export { ItemUpdateEngine, createDefaultOutcome, type ItemRow, type RunOptions } from './item-update-engine.js';
export { modifyItems } from './modify-items.js';
export { classifyStatusLine, type LoadStatus } from './status.js';
export {
    assertAccounts,
    assertChangeRequests,
    assertCompanyCode,
    assertFieldLength,
    assertStatus,
    assertWorklist,
    toSessionDateRange,
} from './validate.js';
