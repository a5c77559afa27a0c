import { readFileSync } from 'node:fs';
import { join } from 'node:path';

export type NotificationKind = 'completed' | 'error';

export interface Notification {
    from: string;
    to: string;
    subject: string;
    html: string;
    /** Paths of files to attach. */
    attachments: string[];
}

export interface ComposeOptions {
    templatesDir: string;
    sender: string;
    recipient: string;
    subject: string;
    errorMessage?: string;
    attachment?: string;
}

const ERROR_PLACEHOLDER = '$error_msg$';

export function loadTemplate(templatesDir: string, kind: NotificationKind): string {
    return readFileSync(join(templatesDir, `template_${kind}.html`), 'utf-8');
}

/**
 * Builds the notification for a finished request: the completion template,
 * or the error template with the message filled in.
 */
export function composeNotification(kind: NotificationKind, options: ComposeOptions): Notification {
    let html = loadTemplate(options.templatesDir, kind);

    if (kind === 'error') {
        html = html.split(ERROR_PLACEHOLDER).join(escapeHtml(options.errorMessage ?? ''));
    }

    return {
        from: options.sender,
        to: options.recipient,
        subject: options.subject,
        html,
        attachments: options.attachment ? [options.attachment] : [],
    };
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/\n/g, '<br>');
}
