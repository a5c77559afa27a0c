import type { PipelineStep } from '../types.js';
import { EXIT_CODES } from '../../types.js';
import { composeNotification } from '../../notifications/compose.js';
import { deliverToOutbox } from '../../notifications/outbox.js';
import { getOutboxPath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/buffer.js';

/**
 * Step 5: Notify
 * Sends the requester the report, or the reason the request was rejected.
 * Runs after fatal errors too.
 */
export const notifyRequester: PipelineStep = async (state) => {
    const notice = state.notice;
    if (!notice) {
        return state;
    }

    const settings = state.config.messages.notifications;
    if (!settings.send) {
        state.warnings.push('Sending of notifications is disabled in app-config.yaml.');
        return state;
    }

    try {
        const notification = composeNotification(notice.kind, {
            templatesDir: state.workspace.templates,
            sender: settings.sender,
            recipient: state.options.sender,
            subject: settings.subject,
            errorMessage: notice.kind === 'error' ? notice.message : undefined,
            attachment: notice.attachment,
        });
        state.notificationPath = await deliverToOutbox(getOutboxPath(state.workspace, state.config), notification);
    } catch (err) {
        // Without the report notification the requester gets nothing, so that one fails the run.
        state.errors.push({
            step: 'notify',
            message: `Failed to send notification: ${errorMessage(err)}`,
            fatal: notice.kind === 'completed',
            exitCode: EXIT_CODES.REPORTING,
            error: err,
        });
    }

    return state;
};
