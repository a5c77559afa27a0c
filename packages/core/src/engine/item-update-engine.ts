/**
 * Item Update Engine: filters the loaded items by their current text and
 * rewrites text and assignment of every item a change request names.
 */

import { EngineStateError, FieldNotPresentError, NoMatchingItemsError } from '../errors.js';
import { OUTCOME_MESSAGES } from '../types/index.js';
import type {
    AccountSelection,
    ChangeOutcomeMap,
    ChangeRequest,
    ChangeRequestMap,
    ItemStatus,
} from '../types/index.js';
import type { ControlRef, RemoteSession, ResultGrid } from '../session/types.js';
import type { EditableField } from '../profile/profiles.js';
import { TransactionNavigator } from './navigator.js';
import { assertFieldLength } from './validate.js';

/** Controls of the grid filter dialogs. */
const FILTER_DIALOG = {
    ADD_CRITERION: { name: 'APP_WL_SING', type: 'GuiButton', window: 1 },
    DEFINE_VALUES: { name: '600_BUTTON', type: 'GuiButton', window: 1 },
    VALUE_PICKER: { name: '%_%%DYN001_%_APP_%-VALU_PUSH', type: 'GuiButton', window: 2 },
} as const satisfies Record<string, ControlRef>;

const FIELD_NAME_COLUMN = 'FIELDNAME';

export interface ItemRow {
    text: string;
    assignment: string;
}

export interface RunOptions {
    status?: ItemStatus;
}

/**
 * Outcome map with every request marked as not found.
 */
export function createDefaultOutcome(requests: ChangeRequestMap): ChangeOutcomeMap {
    const outcome: ChangeOutcomeMap = new Map();
    for (const [oldText, request] of requests) {
        outcome.set(oldText, { ...request, message: OUTCOME_MESSAGES.NOT_FOUND });
    }
    return outcome;
}

export class ItemUpdateEngine extends TransactionNavigator {
    /**
     * Restricts the loaded grid to items whose text is one of `values`.
     *
     * @throws NoMatchingItemsError when no item is left after filtering;
     *         the selection screen is displayed again in that case.
     */
    async applyTextFilter(values: readonly string[]): Promise<ResultGrid> {
        const session = this.require('apply the text filter', ['loaded']);
        const grid = this.grid;
        if (!grid) {
            throw new EngineStateError('Cannot apply the text filter: no items loaded!');
        }

        await session.sendCommand('CtrlShiftF2');   // open filter definition
        await session.sendCommand('CtrlShiftF6');   // show technical field names

        await this.addFilterCriterion(session, this.profile.grid.textColumn);
        await session.pressButton(FILTER_DIALOG.DEFINE_VALUES);
        await session.bulkInsertValues(FILTER_DIALOG.VALUE_PICKER, values);
        await session.sendCommand('Enter');

        if ((await grid.rowCount()) === 0) {
            await session.sendCommand('F3');
            this.grid = null;
            this.state = 'selected';
            throw new NoMatchingItemsError('Filtering on the searched text values returned no results!');
        }

        this.state = 'filtered';
        return grid;
    }

    /**
     * Compares every row of `grid` with its change request and writes the
     * fields that differ. Returns one outcome per request key.
     */
    async iterateAndUpdate(grid: ResultGrid, requests: ChangeRequestMap): Promise<ChangeOutcomeMap> {
        const session = this.require('update items', ['filtered']);
        this.state = 'iterating';

        const outcome = createDefaultOutcome(requests);
        const count = await grid.rowCount();

        for (let idx = 0; idx < count; idx++) {
            const row = await this.readRow(grid, idx);
            const request = requests.get(row.text);
            if (!request) {
                continue;
            }

            const message = await this.updateItem(session, row, request);
            // a request without new values has no phrase and keeps the default message
            if (message !== '') {
                outcome.set(row.text, { ...request, message });
            }
        }

        return outcome;
    }

    /**
     * Leaves the item list for the selection screen.
     */
    async finish(): Promise<void> {
        const session = this.require('finish', ['iterating']);
        await session.sendCommand('F3');
        this.grid = null;
        this.state = 'committed';
    }

    /**
     * Runs a bound engine through selection, load, filter, update and finish.
     */
    async run(
        selection: AccountSelection,
        companyCode: string,
        requests: ChangeRequestMap,
        options: RunOptions = {}
    ): Promise<ChangeOutcomeMap> {
        await this.setAccounts(selection, companyCode);
        await this.setLayout(this.profile.layout);
        await this.setSelectionStatus(options.status ?? 'open');
        await this.loadItems();

        const grid = await this.applyTextFilter([...requests.keys()]);
        const outcome = await this.iterateAndUpdate(grid, requests);
        await this.finish();

        return outcome;
    }

    private async addFilterCriterion(session: RemoteSession, column: string): Promise<void> {
        const fields = await session.getFilterFieldList();
        const count = await fields.rowCount();

        for (let idx = 0; idx < count; idx++) {
            if ((await fields.readCell(idx, FIELD_NAME_COLUMN)) === column) {
                await fields.selectRow(idx);
                await session.pressButton(FILTER_DIALOG.ADD_CRITERION);
                return;
            }
        }

        throw new FieldNotPresentError(`${column} (filter criterion)`);
    }

    private async readRow(grid: ResultGrid, idx: number): Promise<ItemRow> {
        await grid.selectRow(idx);
        return {
            text: await grid.readCell(idx, this.profile.grid.textColumn),
            assignment: await grid.readCell(idx, this.profile.grid.assignmentColumn),
        };
    }

    private async updateItem(session: RemoteSession, row: ItemRow, request: ChangeRequest): Promise<string> {
        const { new_text: newText, new_assignment: newAssignment } = request;
        const { text: textField, assignment: assignmentField } = this.profile.edit;

        const textDiffers = newText !== null && newText !== row.text;
        const assignDiffers = newAssignment !== null && newAssignment !== row.assignment;

        let textPhrase: string | null = newText !== null && !textDiffers ? OUTCOME_MESSAGES.TEXT_UNCHANGED : null;
        let assignPhrase: string | null =
            newAssignment !== null && !assignDiffers ? OUTCOME_MESSAGES.ASSIGNMENT_UNCHANGED : null;

        if (textDiffers || assignDiffers) {
            await session.sendCommand('ShiftF2');   // display document
            await session.sendCommand('ShiftF1');   // switch to change mode

            if (newText !== null && textDiffers) {
                await this.writeField(session, textField, 'text', newText);
                textPhrase = OUTCOME_MESSAGES.TEXT_UPDATED;
            }

            if (newAssignment !== null && assignDiffers) {
                const written = await this.writeField(session, assignmentField, 'assignment', newAssignment);
                assignPhrase = written ? OUTCOME_MESSAGES.ASSIGNMENT_UPDATED : OUTCOME_MESSAGES.ASSIGNMENT_UNAVAILABLE;
            }

            await session.sendCommand('CtrlS');
        }

        return [textPhrase, assignPhrase]
            .filter((phrase): phrase is string => phrase !== null)
            .join(' ')
            .trim();
    }

    /**
     * Writes `value` to an edit field. Returns false when an optional field
     * is absent from the edit screen.
     */
    private async writeField(
        session: RemoteSession,
        field: EditableField,
        label: 'text' | 'assignment',
        value: string
    ): Promise<boolean> {
        assertFieldLength(field, label, value);

        if (field.optional && !(await session.hasField(field))) {
            return false;
        }

        await session.setField(field, value);
        return true;
    }
}
