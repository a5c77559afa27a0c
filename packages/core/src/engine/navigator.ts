/**
 * Navigation shared by the Item Update Engine and the Line Item Exporter:
 * binding a transaction context, selecting accounts or a worklist,
 * choosing the item status and loading the item grid.
 */

import {
    ConnectionLostError,
    EngineStateError,
    FieldNotPresentError,
    LoadFailedError,
    NoItemsFoundError,
    UnboundSessionError,
} from '../errors.js';
import type { AccountSelection, PostingDateRange } from '../types/index.js';
import type { RemoteSession, ResultGrid } from '../session/types.js';
import type { TransactionProfile } from '../profile/profiles.js';
import { classifyStatusLine } from './status.js';
import {
    assertAccounts,
    assertCompanyCode,
    assertStatus,
    assertWorklist,
    toSessionDateRange,
} from './validate.js';

export type EngineState =
    | 'uninitialized'
    | 'bound'
    | 'accounts-set'
    | 'selected'
    | 'loaded'
    | 'filtered'
    | 'iterating'
    | 'committed'
    | 'closed'
    | 'load-failed'
    | 'no-items-found'
    | 'connection-lost';

/** States in which the selection screen is displayed. */
const SELECTION_SCREEN: readonly EngineState[] = [
    'bound',
    'accounts-set',
    'selected',
    'committed',
    'no-items-found',
];

const ACCOUNTS_CHOSEN: readonly EngineState[] = ['accounts-set', 'selected'];

export class TransactionNavigator {
    private session: RemoteSession | null = null;
    protected state: EngineState = 'uninitialized';
    protected grid: ResultGrid | null = null;

    constructor(protected readonly profile: TransactionProfile) {}

    get currentState(): EngineState {
        return this.state;
    }

    get isBound(): boolean {
        return this.session !== null;
    }

    /**
     * Starts the profile's transaction on `session`.
     *
     * A context that is already bound is closed first, so calling
     * `start` repeatedly restarts the transaction.
     */
    async start(session: RemoteSession | null | undefined): Promise<void> {
        if (!session) {
            throw new UnboundSessionError("Argument 'session' is unbound!");
        }

        await this.close();

        this.session = session;
        await session.startTransaction(this.profile.transactionCode);
        this.state = 'bound';
    }

    /**
     * Ends the transaction and releases the session. Ignored when nothing
     * is bound; a dialog left open by ending the transaction is confirmed.
     */
    async close(): Promise<void> {
        const session = this.session;
        if (!session) {
            return;
        }

        try {
            await session.endTransaction();
            if (await session.isModalOpen()) {
                await session.resolveModal(true);
            }
        } finally {
            this.session = null;
            this.grid = null;
            this.state = 'closed';
        }
    }

    async setAccounts(selection: AccountSelection, companyCode: string): Promise<void> {
        const session = this.require('set accounts', SELECTION_SCREEN);

        assertCompanyCode(companyCode);
        const accounts = selection.kind === 'accounts' ? assertAccounts(selection.accounts) : null;
        if (selection.kind === 'worklist') {
            assertWorklist(selection.name);
        }

        await this.toggleWorklist(session, selection.kind === 'worklist');

        if (selection.kind === 'worklist') {
            await session.setField(this.profile.selection.worklist, selection.name);
        }

        await this.writeCompanyCode(session, companyCode);

        if (accounts) {
            await session.bulkInsertValues(this.profile.selection.accountPicker, accounts);
        }

        this.state = 'accounts-set';
    }

    /**
     * Writes the layout applied to the result grid; an empty name keeps
     * the transaction's default layout.
     */
    async setLayout(name: string): Promise<void> {
        const session = this.require('set the layout', SELECTION_SCREEN);
        await session.setField(this.profile.selection.layout, name);
    }

    async setSelectionStatus(status: string): Promise<void> {
        const session = this.require('set the item status', ACCOUNTS_CHOSEN);
        assertStatus(status);
        await session.selectOption(this.profile.selection.status[status]);
        this.state = 'selected';
    }

    async setPostingDates(range: PostingDateRange): Promise<void> {
        const session = this.require('set posting dates', ACCOUNTS_CHOSEN);
        const { from, to } = toSessionDateRange(range);
        await session.setField(this.profile.selection.postingDateFrom, from);
        await session.setField(this.profile.selection.postingDateTo, to);
    }

    /**
     * Executes the selection and returns the loaded item grid.
     */
    async loadItems(): Promise<ResultGrid> {
        const session = this.require('load items', ACCOUNTS_CHOSEN);

        try {
            await session.sendCommand('F8');
        } catch (err) {
            this.state = 'load-failed';
            throw new LoadFailedError('Could not load account data!', { cause: err });
        }

        // A crashed session only shows up on the first read after the load.
        let statusText: string;
        try {
            statusText = await session.readStatusLine();
        } catch (err) {
            this.state = 'connection-lost';
            throw new ConnectionLostError('Connection to the session lost!', { cause: err });
        }

        const status = classifyStatusLine(statusText);

        if (status.kind === 'no-items') {
            this.state = 'no-items-found';
            throw new NoItemsFoundError('No items found using your selection criteria!');
        }
        if (status.kind === 'failed') {
            this.state = 'load-failed';
            throw new LoadFailedError(status.detail);
        }

        const grid = await session.getResultGrid();
        this.grid = grid;
        this.state = 'loaded';
        return grid;
    }

    /**
     * Returns the bound session, provided the engine is in one of `allowed`.
     */
    protected require(operation: string, allowed: readonly EngineState[]): RemoteSession {
        if (!this.session) {
            throw new UnboundSessionError(
                `Cannot ${operation}: no session is bound. Use start() first!`
            );
        }
        if (!allowed.includes(this.state)) {
            throw new EngineStateError(`Cannot ${operation} in state '${this.state}'!`);
        }
        return this.session;
    }

    private async toggleWorklist(session: RemoteSession, activate: boolean): Promise<void> {
        const active = await session.hasField(this.profile.selection.worklist);
        if (activate !== active) {
            await session.sendCommand('CtrlF1');
        }
    }

    private async writeCompanyCode(session: RemoteSession, companyCode: string): Promise<void> {
        const { companyCode: listField, worklistCompanyCode: worklistField } = this.profile.selection;

        if (await session.hasField(listField)) {
            await session.setField(listField, companyCode);
        } else if (await session.hasField(worklistField)) {
            await session.setField(worklistField, companyCode);
        } else {
            throw new FieldNotPresentError(listField.name);
        }
    }
}
