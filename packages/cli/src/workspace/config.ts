import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { AppConfigSchema, type AppConfig } from '@itemfix/shared';
import type { Workspace } from '../types.js';
import { findWorkspaceRoot, resolveWorkspace } from './paths.js';

/**
 * Loads and validates the application configuration (app-config.yaml).
 */
export function loadAppConfig(workspace: Workspace): AppConfig {
    const path = workspace.config.appConfigPath;
    if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    const result = AppConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration in ${path}: ${issues}`);
    }

    return result.data;
}

/**
 * Finds the workspace (explicit root or detected from the working
 * directory) and loads its configuration.
 */
export function openWorkspace(explicitRoot?: string): { workspace: Workspace; config: AppConfig } {
    const root = explicitRoot || findWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Expected "config/app-config.yaml" in the workspace root.');
    }
    const workspace = resolveWorkspace(root);
    return { workspace, config: loadAppConfig(workspace) };
}
