/**
 * Loads the scripting bridge: the module that attaches to a running GUI
 * client and exposes its scripting object model and the system clipboard.
 */

import { pathToFileURL } from 'node:url';
import type { Clipboard, GuiSession } from '@itemfix/core';

export interface ScriptingBridge {
    /** Attaches to the first session logged on to `system`. */
    connect(system: string): Promise<GuiSession>;
    disconnect(session: GuiSession): Promise<void>;
    clipboard: Clipboard;
}

function isFunction(value: unknown): value is (...args: never[]) => unknown {
    return typeof value === 'function';
}

function isClipboard(value: unknown): value is Clipboard {
    return (
        typeof value === 'object' &&
        value !== null &&
        'write' in value &&
        'clear' in value &&
        isFunction(value.write) &&
        isFunction(value.clear)
    );
}

export function isScriptingBridge(value: unknown): value is ScriptingBridge {
    return (
        typeof value === 'object' &&
        value !== null &&
        'connect' in value &&
        'disconnect' in value &&
        'clipboard' in value &&
        isFunction(value.connect) &&
        isFunction(value.disconnect) &&
        isClipboard(value.clipboard)
    );
}

export async function loadBridge(modulePath: string): Promise<ScriptingBridge> {
    const loaded: unknown = await import(pathToFileURL(modulePath).href);

    if (!isScriptingBridge(loaded)) {
        throw new Error(
            `Scripting bridge ${modulePath} must export connect(system), disconnect(session) and clipboard { write, clear }`
        );
    }
    return loaded;
}
