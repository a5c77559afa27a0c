/**
 * Classification of the status line shown after loading items.
 *
 * The status line is the only feedback the session gives about a load,
 * so its text is matched against fixed markers here and nowhere else.
 */

import { STATUS_MARKERS } from '../types/index.js';

export type LoadStatus =
    | { kind: 'loaded' }
    | { kind: 'no-items' }
    | { kind: 'failed'; detail: string };

export function classifyStatusLine(text: string): LoadStatus {
    if (text.includes(STATUS_MARKERS.NO_ITEMS_SELECTED)) {
        return { kind: 'no-items' };
    }
    if (text.includes(STATUS_MARKERS.ITEMS_DISPLAYED)) {
        return { kind: 'loaded' };
    }
    return { kind: 'failed', detail: text };
}
