import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Notification } from './compose.js';

/**
 * Envelope written for the mail relay. Attachments are file names
 * relative to the outbox directory.
 */
export interface OutboxEnvelope {
    from: string;
    to: string;
    subject: string;
    html: string;
    attachments: string[];
}

/**
 * Timestamp used to name outbox entries, e.g. 20241019T083015123Z.
 */
export function outboxStamp(now: Date): string {
    return now.toISOString().replace(/[-:.]/g, '');
}

/**
 * Writes `notification` to the outbox as `<stamp>.json` and copies its
 * attachments beside it as `<stamp>_<name>`.
 *
 * @returns Path of the envelope file
 */
export async function deliverToOutbox(
    outboxDir: string,
    notification: Notification,
    now: Date = new Date()
): Promise<string> {
    const stamp = outboxStamp(now);
    await mkdir(outboxDir, { recursive: true });

    const attachments: string[] = [];
    for (const file of notification.attachments) {
        const name = `${stamp}_${basename(file)}`;
        await copyFile(file, join(outboxDir, name));
        attachments.push(name);
    }

    const envelope: OutboxEnvelope = {
        from: notification.from,
        to: notification.to,
        subject: notification.subject,
        html: notification.html,
        attachments,
    };

    const envelopePath = join(outboxDir, `${stamp}.json`);
    await writeFile(envelopePath, JSON.stringify(envelope, null, 2), 'utf-8');
    return envelopePath;
}
