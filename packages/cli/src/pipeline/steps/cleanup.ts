import { rm } from 'node:fs/promises';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/buffer.js';

/**
 * Step 6: Cleanup
 * Detaches from the session and removes temporary files, whatever the outcome.
 */
export const cleanup: PipelineStep = async (state) => {
    const connection = state.connection;
    if (connection) {
        try {
            await connection.bridge.disconnect(connection.gui);
        } catch (err) {
            state.warnings.push(`Failed to disconnect from the session: ${errorMessage(err)}`);
        }
        state.connection = undefined;
    }

    try {
        await rm(state.workspace.temp, { recursive: true, force: true });
    } catch (err) {
        state.warnings.push(`Failed to remove temporary files: ${errorMessage(err)}`);
    }

    return state;
};
