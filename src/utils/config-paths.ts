/**
 * Configuration file path utilities
 * Provides cross-platform paths for user config files
 */

import envPaths from 'env-paths';
import { makeDirectory } from 'make-dir';
import { join } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('mcp-dispatch', { suffix: '' });

export const CONFIG_PATH_ENV_VAR = 'MCP_DISPATCH_CONFIG';

/**
 * Directory holding endpoints.json
 */
export function getConfigDir(): string {
    return paths.config;
}

/**
 * Endpoints file path: MCP_DISPATCH_CONFIG when set, else the platform default
 */
export function getEndpointsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    const override = env[CONFIG_PATH_ENV_VAR];
    if(override !== undefined && override !== '') {
        return override;
    }
    return join(paths.config, 'endpoints.json');
}

/**
 * Ensure the config directory exists
 */
export async function ensureConfigDir(): Promise<string> {
    await makeDirectory(paths.config);
    return paths.config;
}
