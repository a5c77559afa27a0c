import { existsSync } from 'node:fs';
import { join, dirname, parse, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { AppConfig } from '@itemfix/shared';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const APP_CONFIG = join('config', 'app-config.yaml');

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        temp: join(root, 'temp'),
        templates: resolveTemplatesPath(),
        config: {
            appConfigPath: join(root, APP_CONFIG),
        },
    };
}

/**
 * Nearest directory at or above `from` that holds config/app-config.yaml.
 */
export function findWorkspaceRoot(from: string = process.cwd()): string | null {
    const { root } = parse(resolve(from));
    for (let dir = resolve(from); ; dir = dirname(dir)) {
        if (existsSync(join(dir, APP_CONFIG))) {
            return dir;
        }
        if (dir === root) {
            return null;
        }
    }
}

/**
 * Templates ship in the package's assets/ directory, two levels above both
 * src/workspace/paths.ts and the built dist/workspace/paths.js.
 */
export function resolveTemplatesPath(): string {
    return join(__dirname, '..', '..', 'assets', 'templates');
}

/**
 * Outbox directory for notifications; relative paths are taken from the workspace root.
 */
export function getOutboxPath(workspace: Workspace, config: AppConfig): string {
    return resolve(workspace.root, config.messages.notifications.outbox);
}

/**
 * Module path of the scripting bridge, relative to the workspace root.
 */
export function getBridgePath(workspace: Workspace, config: AppConfig): string {
    return resolve(workspace.root, config.sap.bridge);
}

export function getReportPath(workspace: Workspace, config: AppConfig): string {
    return join(workspace.temp, config.data.report_name);
}
