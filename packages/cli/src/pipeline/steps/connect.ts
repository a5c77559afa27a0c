import { GuiSessionAdapter } from '@itemfix/core';
import type { PipelineStep } from '../types.js';
import { EXIT_CODES } from '../../types.js';
import { loadBridge } from '../../bridge/loader.js';
import { getBridgePath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/buffer.js';

/**
 * Step 2: Connect
 * Loads the scripting bridge and attaches to the configured system.
 */
export const connectSession: PipelineStep = async (state) => {
    const system = state.config.sap.system;

    try {
        const bridge = await loadBridge(getBridgePath(state.workspace, state.config));
        const gui = await bridge.connect(system);
        state.connection = { bridge, gui, session: new GuiSessionAdapter(gui, bridge.clipboard) };
    } catch (err) {
        state.errors.push({
            step: 'connect',
            message: `Failed to connect to system ${system}: ${errorMessage(err)}`,
            fatal: true,
            exitCode: EXIT_CODES.INITIALIZATION,
            error: err,
        });
    }

    return state;
};
