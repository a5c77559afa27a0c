import type {
    AccountSelection,
    ChangeOutcomeMap,
    ChangeRequestMap,
} from '../types/index.js';
import type { RemoteSession } from '../session/types.js';
import type { TransactionProfile } from '../profile/profiles.js';
import { ItemUpdateEngine, type RunOptions } from './item-update-engine.js';
import {
    assertAccounts,
    assertChangeRequests,
    assertCompanyCode,
    assertStatus,
    assertWorklist,
} from './validate.js';

/**
 * Applies a batch of change requests to the items of the selected accounts.
 *
 * All input is validated before the session is touched. The transaction
 * context is closed again whether the run succeeds or fails.
 *
 * @returns Outcome per request key, in request order
 */
export async function modifyItems(
    session: RemoteSession,
    selection: AccountSelection,
    companyCode: string,
    requests: ChangeRequestMap,
    profile: TransactionProfile,
    options: RunOptions = {}
): Promise<ChangeOutcomeMap> {
    assertCompanyCode(companyCode);
    if (selection.kind === 'accounts') {
        assertAccounts(selection.accounts);
    } else {
        assertWorklist(selection.name);
    }
    if (options.status !== undefined) {
        assertStatus(options.status);
    }
    assertChangeRequests(requests, profile);

    if (requests.size === 0) {
        return new Map();
    }

    const engine = new ItemUpdateEngine(profile);
    await engine.start(session);

    try {
        return await engine.run(selection, companyCode, requests, options);
    } finally {
        await engine.close();
    }
}
