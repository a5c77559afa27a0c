import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
    ConnectionLostError,
    GuiSessionAdapter,
    NoItemsFoundError,
    USER_MESSAGES,
    ValueTooLongError,
    getProfile,
    modifyItems,
    type ChangeOutcomeMap,
} from '@itemfix/core';
import { loadBridge } from '../src/bridge/loader.js';
import { loadInput } from '../src/pipeline/steps/load-input.js';
import { connectSession } from '../src/pipeline/steps/connect.js';
import { modifyAccountItems } from '../src/pipeline/steps/modify.js';
import { createReport } from '../src/pipeline/steps/report.js';
import { notifyRequester } from '../src/pipeline/steps/notify.js';
import { cleanup } from '../src/pipeline/steps/cleanup.js';
import { createInitialState, runPipeline, resolveExitCode, MODIFY_STEPS } from '../src/pipeline/runner.js';
import type { PipelineState, PipelineStepDefinition } from '../src/pipeline/types.js';
import type { ModifyOptions } from '../src/types.js';
import { loadAppConfig } from '../src/workspace/config.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import { FakeBridge, createTempWorkspace, idleGui, writeRequestWorkbook } from './support/workspace.js';

vi.mock('@itemfix/core', async (importOriginal) => {
    const actual = await importOriginal<typeof import('@itemfix/core')>();
    return { ...actual, modifyItems: vi.fn() };
});

vi.mock('../src/bridge/loader.js', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../src/bridge/loader.js')>();
    return { ...actual, loadBridge: vi.fn() };
});

const OPTIONS: ModifyOptions = {
    companyCode: '0075',
    sender: 'requester@example.com',
    status: 'open',
};

describe('Pipeline', () => {
    let root: string;
    let workbookPath: string;

    function createState(options: Partial<ModifyOptions> = {}): PipelineState {
        const workspace = resolveWorkspace(root);
        return createInitialState(workbookPath, workspace, loadAppConfig(workspace), { ...OPTIONS, ...options });
    }

    function withInput(state: PipelineState, bridge = new FakeBridge()): PipelineState {
        state.input = {
            workbookPath,
            rows: [
                { account: 10000001, old_text: 'OLDA', new_text: 'NEWA', new_assignment: null },
                { account: 10000001, old_text: 'OLDB', new_text: null, new_assignment: 'ASG1' },
            ],
            requests: new Map([
                ['OLDA', { new_text: 'NEWA', new_assignment: null }],
                ['OLDB', { new_text: null, new_assignment: 'ASG1' }],
            ]),
            accounts: [10000001],
            companyCode: '0075',
            status: 'open',
            profile: getProfile('general-ledger', '/ITEMFIX'),
        };
        state.connection = { bridge, gui: idleGui, session: new GuiSessionAdapter(idleGui, bridge.clipboard) };
        return state;
    }

    const outcome: ChangeOutcomeMap = new Map([
        ['OLDA', { new_text: 'NEWA', new_assignment: null, message: 'Text updated.' }],
        ['OLDB', { new_text: null, new_assignment: 'ASG1', message: 'Assignment updated.' }],
    ]);

    beforeEach(async () => {
        root = createTempWorkspace();
        workbookPath = join(root, 'request.xlsx');
        await writeRequestWorkbook(workbookPath, [
            [10000001, 'OLDA', 'NEWA', null],
            [10000001, 'OLDB', null, 'ASG1'],
        ]);
        vi.clearAllMocks();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    // ========================================================================
    // Step 1: Load Input
    // ========================================================================

    describe('Load Input', () => {
        it('should turn the workbook into validated change requests', async () => {
            const state = await loadInput(createState());

            expect(state.errors).toEqual([]);
            expect(state.input?.companyCode).toBe('0075');
            expect(state.input?.accounts).toEqual([10000001]);
            expect(state.input?.status).toBe('open');
            expect(state.input?.profile.kind).toBe('general-ledger');
            expect(state.input?.profile.layout).toBe('/ITEMFIX');
            expect(state.input?.requests).toEqual(new Map([
                ['OLDA', { new_text: 'NEWA', new_assignment: null }],
                ['OLDB', { new_text: null, new_assignment: 'ASG1' }],
            ]));
        });

        it('should pick the subledger layout for customer accounts', async () => {
            await writeRequestWorkbook(workbookPath, [[1000001, 'OLDA', 'NEWA', null]]);

            const state = await loadInput(createState());

            expect(state.input?.profile.kind).toBe('subledger');
            expect(state.input?.profile.layout).toBe('/ITEMFIX-AR');
        });

        it('should read the company code from the message body', async () => {
            const body = join(root, 'body.txt');
            writeFileSync(body, 'Hello,\nplease update the attached items.\nCompany code: 0420\nThanks');

            const state = await loadInput(createState({ companyCode: undefined, body }));

            expect(state.errors).toEqual([]);
            expect(state.input?.companyCode).toBe('0420');
        });

        it('should reject a body without company code and notify the requester', async () => {
            const body = join(root, 'body.txt');
            writeFileSync(body, 'Hello, please update the attached items.');

            const state = await loadInput(createState({ companyCode: undefined, body }));

            expect(state.input).toBeUndefined();
            expect(state.errors).toHaveLength(1);
            expect(state.errors[0]).toMatchObject({
                step: 'load-input',
                message: USER_MESSAGES.NO_COMPANY_CODE,
                fatal: true,
                exitCode: 2,
            });
            expect(state.notice).toEqual({ kind: 'error', message: USER_MESSAGES.NO_COMPANY_CODE });
        });

        it('should reject a malformed company code option', async () => {
            const state = await loadInput(createState({ companyCode: '75' }));

            expect(state.errors[0].message).toBe(USER_MESSAGES.NO_COMPANY_CODE);
        });

        it('should reject an unknown status without notifying', async () => {
            const state = await loadInput(createState({ status: 'pending' }));

            expect(state.errors[0]).toMatchObject({
                message: "Unrecognized item status: 'pending'",
                exitCode: 2,
            });
            expect(state.notice).toBeUndefined();
        });

        it('should notify the requester about mixed account types', async () => {
            await writeRequestWorkbook(workbookPath, [
                [10000001, 'OLDA', 'NEWA', null],
                [1000001, 'OLDB', 'NEWB', null],
            ]);

            const state = await loadInput(createState());

            expect(state.notice).toEqual({ kind: 'error', message: USER_MESSAGES.MIXED_ACCOUNTS });
            expect(state.errors[0].exitCode).toBe(2);
        });

        it('should join all validation errors into one message', async () => {
            await writeRequestWorkbook(workbookPath, [
                [10000001, null, null, null],
                [10000001, null, null, null],
            ]);

            const state = await loadInput(createState());

            expect(state.notice).toEqual({
                kind: 'error',
                message: `${USER_MESSAGES.NO_NEW_VALUES}\n${USER_MESSAGES.NO_OLD_TEXT}`,
            });
        });

        it('should collect skipped rows as warnings', async () => {
            await writeRequestWorkbook(workbookPath, [
                [10000001, 'OLDA', 'NEWA', null],
                ['ACC-1', 'OLDB', 'NEWB', null],
                [10000001, 'OLDC', null, null],
            ]);

            const state = await loadInput(createState());

            expect(state.errors).toEqual([]);
            expect(state.warnings).toEqual([
                '[workbook] Row 3: invalid account "ACC-1", skipping',
                "'OLDC': no new text or assignment given, skipped",
            ]);
            expect([...(state.input?.requests.keys() ?? [])]).toEqual(['OLDA']);
        });

        it('should fail when the workbook cannot be read', async () => {
            rmSync(workbookPath);

            const state = await loadInput(createState());

            expect(state.errors[0].message).toMatch(/^Failed to read request workbook /);
            expect(state.notice).toBeUndefined();
        });
    });

    // ========================================================================
    // Step 2: Connect
    // ========================================================================

    describe('Connect', () => {
        it('should connect to the configured system through the bridge', async () => {
            const bridge = new FakeBridge();
            vi.mocked(loadBridge).mockResolvedValue(bridge);

            const state = await connectSession(createState());

            expect(loadBridge).toHaveBeenCalledWith(join(root, 'bridge', 'test-bridge.js'));
            expect(bridge.connected).toEqual(['P25']);
            expect(state.connection?.gui).toBe(idleGui);
            expect(state.connection?.session).toBeInstanceOf(GuiSessionAdapter);
        });

        it('should fail initialization when the bridge cannot be loaded', async () => {
            vi.mocked(loadBridge).mockRejectedValue(new Error('module not found'));

            const state = await connectSession(createState());

            expect(state.connection).toBeUndefined();
            expect(state.errors[0]).toMatchObject({
                step: 'connect',
                message: 'Failed to connect to system P25: module not found',
                exitCode: 1,
            });
        });
    });

    // ========================================================================
    // Step 3: Modify Items
    // ========================================================================

    describe('Modify Items', () => {
        it('should run the engine over the requested accounts', async () => {
            vi.mocked(modifyItems).mockResolvedValue(outcome);
            const state = withInput(createState());

            await modifyAccountItems(state);

            expect(modifyItems).toHaveBeenCalledWith(
                state.connection?.session,
                { kind: 'accounts', accounts: [10000001] },
                '0075',
                state.input?.requests,
                state.input?.profile,
                { status: 'open' }
            );
            expect(state.outcome).toBe(outcome);
            expect(state.errors).toEqual([]);
        });

        it('should tell the requester when no items were found', async () => {
            vi.mocked(modifyItems).mockRejectedValue(
                new NoItemsFoundError('No items found using your selection criteria!')
            );

            const state = await modifyAccountItems(withInput(createState()));

            expect(state.notice).toEqual({
                kind: 'error',
                message: USER_MESSAGES.NO_ITEMS_FOUND,
                attachment: workbookPath,
            });
            expect(state.errors[0]).toMatchObject({
                message: 'No items found using your selection criteria!',
                fatal: true,
                exitCode: 3,
            });
        });

        it('should pass input errors on to the requester', async () => {
            const err = new ValueTooLongError('assignment', 'A'.repeat(19), 18);
            vi.mocked(modifyItems).mockRejectedValue(err);

            const state = await modifyAccountItems(withInput(createState()));

            expect(state.notice).toEqual({ kind: 'error', message: err.message, attachment: workbookPath });
            expect(state.errors[0].exitCode).toBe(2);
        });

        it('should stop without notice on session failures', async () => {
            vi.mocked(modifyItems).mockRejectedValue(new ConnectionLostError('Connection to the session lost!'));

            const state = await modifyAccountItems(withInput(createState()));

            expect(state.notice).toBeUndefined();
            expect(state.errors[0]).toMatchObject({
                message: 'Processing failed: Connection to the session lost!',
                exitCode: 3,
            });
        });
    });

    // ========================================================================
    // Steps 4-6: Report, Notify, Cleanup
    // ========================================================================

    describe('Report', () => {
        it('should write the report to the temp directory', async () => {
            const state = withInput(createState());
            state.outcome = outcome;

            await createReport(state);

            const path = join(root, 'temp', 'report.xlsx');
            expect(state.reportPath).toBe(path);
            expect(existsSync(path)).toBe(true);
            expect(state.notice).toEqual({ kind: 'completed', attachment: path });
        });

        it('should do nothing without an outcome', async () => {
            const state = await createReport(withInput(createState()));

            expect(state.reportPath).toBeUndefined();
            expect(state.notice).toBeUndefined();
        });
    });

    describe('Notify', () => {
        it('should deliver the notification to the outbox', async () => {
            const state = createState();
            state.notice = { kind: 'error', message: USER_MESSAGES.NO_RECORDS };

            await notifyRequester(state);

            expect(state.notificationPath).toBeDefined();
            const envelope: unknown = JSON.parse(readFileSync(state.notificationPath ?? '', 'utf-8'));
            expect(envelope).toMatchObject({
                from: 'noreply@example.com',
                to: 'requester@example.com',
                subject: 'Item text update',
                attachments: [],
            });
            expect(state.notificationPath?.startsWith(join(root, 'outbox'))).toBe(true);
        });

        it('should only warn when notifications are disabled', async () => {
            rmSync(root, { recursive: true, force: true });
            root = createTempWorkspace({ send: false });
            await writeRequestWorkbook(join(root, 'request.xlsx'), []);
            workbookPath = join(root, 'request.xlsx');
            const state = createState();
            state.notice = { kind: 'error', message: USER_MESSAGES.NO_RECORDS };

            await notifyRequester(state);

            expect(state.notificationPath).toBeUndefined();
            expect(state.warnings).toEqual(['Sending of notifications is disabled in app-config.yaml.']);
        });

        it('should fail the run when the report cannot be sent', async () => {
            const state = createState();
            state.notice = { kind: 'completed', attachment: join(root, 'temp', 'missing.xlsx') };

            await notifyRequester(state);

            expect(state.errors[0]).toMatchObject({ step: 'notify', fatal: true, exitCode: 4 });
        });

        it('should not fail the run when an error notice cannot be sent', async () => {
            const state = createState();
            state.notice = { kind: 'error', message: 'x', attachment: join(root, 'missing.xlsx') };

            await notifyRequester(state);

            expect(state.errors[0]).toMatchObject({ step: 'notify', fatal: false });
        });
    });

    describe('Cleanup', () => {
        it('should disconnect and remove temporary files', async () => {
            const bridge = new FakeBridge();
            const state = withInput(createState(), bridge);
            mkdirSync(state.workspace.temp);
            writeFileSync(join(state.workspace.temp, 'report.xlsx'), 'x');

            await cleanup(state);

            expect(bridge.disconnected).toBe(1);
            expect(state.connection).toBeUndefined();
            expect(existsSync(state.workspace.temp)).toBe(false);
        });

        it('should warn when disconnecting fails', async () => {
            const state = withInput(createState(), new FakeBridge(new Error('session gone')));

            await cleanup(state);

            expect(state.warnings).toEqual(['Failed to disconnect from the session: session gone']);
        });
    });

    // ========================================================================
    // Runner
    // ========================================================================

    describe('Runner', () => {
        it('should run only the final steps after a fatal error', async () => {
            const ran: string[] = [];
            const step = (name: string, fatal = false): PipelineStepDefinition['fn'] => async (state) => {
                ran.push(name);
                if (fatal) {
                    state.errors.push({ step: name, message: 'boom', fatal: true, exitCode: 3 });
                }
                return state;
            };

            const state = await runPipeline(createState(), [
                { name: 'a', fn: step('a') },
                { name: 'b', fn: step('b', true) },
                { name: 'c', fn: step('c') },
                { name: 'd', fn: step('d'), always: true },
            ]);

            expect(ran).toEqual(['a', 'b', 'd']);
            expect(resolveExitCode(state)).toBe(3);
            expect(console.log).toHaveBeenCalledWith('\n→ Step 4/4: d...');
            expect(console.log).not.toHaveBeenCalledWith('\n→ Step 3/4: c...');
            expect(console.error).toHaveBeenCalledWith('\n✖ Fatal error in step "b". Skipping to final steps.');
        });

        it('should exit with the code of the first fatal error', () => {
            const state = createState();
            state.errors.push(
                { step: 'notify', message: 'warn only', fatal: false, exitCode: 4 },
                { step: 'load-input', message: 'bad', fatal: true, exitCode: 2 },
                { step: 'report', message: 'worse', fatal: true, exitCode: 4 }
            );

            expect(resolveExitCode(state)).toBe(2);
            expect(resolveExitCode(createState())).toBe(0);
        });

        it('should process a request end to end', async () => {
            const bridge = new FakeBridge();
            vi.mocked(loadBridge).mockResolvedValue(bridge);
            vi.mocked(modifyItems).mockResolvedValue(outcome);

            const state = await runPipeline(createState(), MODIFY_STEPS);

            expect(resolveExitCode(state)).toBe(0);
            expect(state.reportPath).toBe(join(root, 'temp', 'report.xlsx'));
            expect(bridge.disconnected).toBe(1);
            expect(existsSync(join(root, 'temp'))).toBe(false);

            const envelope: unknown = JSON.parse(readFileSync(state.notificationPath ?? '', 'utf-8'));
            expect(envelope).toMatchObject({ attachments: [expect.stringMatching(/_report\.xlsx$/)] });
        });

        it('should notify and clean up after an input error', async () => {
            const bridge = new FakeBridge();
            vi.mocked(loadBridge).mockResolvedValue(bridge);
            await writeRequestWorkbook(workbookPath, []);

            const state = await runPipeline(createState(), MODIFY_STEPS);

            expect(resolveExitCode(state)).toBe(2);
            expect(bridge.connected).toEqual([]);
            expect(modifyItems).not.toHaveBeenCalled();
            expect(state.notificationPath).toBeDefined();
            const envelope: unknown = JSON.parse(readFileSync(state.notificationPath ?? '', 'utf-8'));
            expect(envelope).toMatchObject({ html: expect.stringContaining(USER_MESSAGES.NO_RECORDS) });
        });

        it('should attach the request when nothing was found', async () => {
            vi.mocked(loadBridge).mockResolvedValue(new FakeBridge());
            vi.mocked(modifyItems).mockRejectedValue(new NoItemsFoundError('none'));

            const state = await runPipeline(createState(), MODIFY_STEPS);

            expect(resolveExitCode(state)).toBe(3);
            expect(state.reportPath).toBeUndefined();
            const envelope: unknown = JSON.parse(readFileSync(state.notificationPath ?? '', 'utf-8'));
            expect(envelope).toMatchObject({ attachments: [expect.stringMatching(/_request\.xlsx$/)] });
        });
    });
});
