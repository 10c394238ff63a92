/**
 * Configuration loading
 *
 * Generic JSON config loading with zod validation, plus the endpoint config
 * loader with ${VAR} environment substitution.
 */

import { access, constants, readFile } from 'node:fs/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { ZodError } from 'zod';
import _ from 'lodash';
import { ClientConfigSchema, type ClientConfig } from '../types/config.js';
import { errorMessage, logger } from './logger.js';

/**
 * Options for loading JSON configuration
 */
export interface LoadJsonConfigOptions<T> {
    /** Path to the configuration file */
    path: string

    /** Zod schema for validation */
    schema: ZodType<T, ZodTypeDef, unknown>

    /** Optional transformation applied after parsing but before validation */
    transform?: (data: unknown) => unknown
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path, constants.F_OK);
        return true;
    } catch{
        return false;
    }
}

/**
 * Turn zod issues into one readable message
 */
export function formatZodError(error: ZodError, source: string): Error {
    const errorMessages = _.map(error.issues, issue => `${_.join(issue.path, '.')}: ${issue.message}`);
    return new Error(`Invalid configuration in ${source}: ${_.join(errorMessages, ', ')}`);
}

/**
 * Validate already-parsed configuration data
 */
export function parseConfig<T>(
    data: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    source: string,
    transform?: (data: unknown) => unknown
): T {
    try {
        return schema.parse(transform ? transform(data) : data);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ error: error.issues, configPath: source }, 'Invalid configuration');
            throw formatZodError(error, source);
        }
        throw error;
    }
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws Error if the file is missing, is invalid JSON, or fails validation
 *
 * @example
 * ```typescript
 * const config = await loadJsonConfig({
 *   path: '/path/to/endpoints.json',
 *   schema: ClientConfigSchema,
 * });
 * ```
 */
export async function loadJsonConfig<T>(options: LoadJsonConfigOptions<T>): Promise<T> {
    const { path, schema, transform } = options;

    if(!await fileExists(path)) {
        throw new Error(`Config file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new Error(`Invalid JSON in config file ${path}: ${errorMessage(error)}`);
    }

    return parseConfig(data, schema, path, transform);
}

/**
 * Substitute ${VAR_NAME} references from the environment. Unset variables are
 * left in place and reported.
 */
export function substituteString(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return _.replace(str, /\$\{([^}]+)\}/g, (match: string, varName: string) => {
        const value = env[varName];
        if(value === undefined) {
            logger.warn({ varName }, 'Environment variable not found, leaving unreplaced');
            return match;
        }
        return value;
    });
}

/**
 * Apply substituteString to every string inside a parsed JSON value
 */
export function substituteEnvVars(data: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if(_.isString(data)) {
        return substituteString(data, env);
    }
    if(_.isArray(data)) {
        return _.map(data, item => substituteEnvVars(item, env));
    }
    if(_.isPlainObject(data) && _.isObject(data)) {
        return _.mapValues(data, value => substituteEnvVars(value, env));
    }
    return data;
}

/**
 * Validate an in-memory client configuration (env references substituted)
 */
export function parseClientConfig(data: unknown, env: NodeJS.ProcessEnv = process.env): ClientConfig {
    return parseConfig(data, ClientConfigSchema, 'client configuration', raw => substituteEnvVars(raw, env));
}

/**
 * Load the endpoints file
 */
export async function loadClientConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ClientConfig> {
    const config = await loadJsonConfig({
        path,
        schema:    ClientConfigSchema,
        transform: raw => substituteEnvVars(raw, env),
    });

    logger.debug({ configPath: path, endpointCount: _.size(config.endpoints) }, 'Loaded client configuration');
    return config;
}
