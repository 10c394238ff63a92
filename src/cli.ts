#!/usr/bin/env node
/**
 * mcp-dispatch CLI Entry Point
 *
 * Commands:
 * - list-endpoints: List configured endpoints (credentials redacted)
 * - tools [endpoint]: List operations exposed by one or all endpoints
 * - call <operation>: Dispatch one request and print the response payload
 * - repl: Dispatch requests read line by line from stdin
 * - validate: Validate the endpoints file
 * - config-path: Show where the endpoints file is read from
 * - init: Write a starter endpoints file
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import { z } from 'zod';
import { createMcpDispatchClient, type McpDispatchClient } from './index.js';
import { buildHttpHeaders, redactHeaders, resolveStdioCommand } from './backend/transport-factory.js';
import { formatFailure, parsePayload, runRepl } from './cli/repl.js';
import { loadClientConfig } from './utils/config-loader.js';
import { ensureConfigDir, getConfigDir, getEndpointsConfigPath } from './utils/config-paths.js';
import { errorMessage } from './utils/logger.js';

const PackageJsonSchema = z.object({
    version:     z.string(),
    description: z.string(),
});

interface GlobalOptions {
    config?: string
}

const STARTER_CONFIG = {
    endpoints: {
        whatsapp: {
            type:        'http',
            url:         'http://127.0.0.1:2001/mcp',
            credentials: { token: '${MCP_API_TOKEN}' },
            headers:     {
                'x-whatsapp-phone-id':    '${PHONE_NUMBER_ID}',
                'x-whatsapp-token':       '${WABATOKEN}',
                'x-whatsapp-api-version': 'v18.0',
            },
        },
    },
    dispatch: {
        failurePolicy:    'fail-fast',
        requestTimeoutMs: 30000,
    },
};

function print(line = ''): void {
    // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
    console.log(line);
}

function parseTimeout(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if(!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Timeout must be a positive number of milliseconds');
    }
    return parsed;
}

async function main(): Promise<void> {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
    const packageJson = PackageJsonSchema.parse(JSON.parse(await readFile(packageJsonPath, 'utf-8')));

    const program = new Command();

    program
        .name('mcp-dispatch')
        .description(packageJson.description)
        .version(packageJson.version)
        .option('-c, --config <path>', 'Path to the endpoints file');

    const configPath = (): string => program.opts<GlobalOptions>().config ?? getEndpointsConfigPath();

    const withClient = async <T>(run: (client: McpDispatchClient) => Promise<T>): Promise<T> => {
        const client = createMcpDispatchClient(await loadClientConfig(configPath()));
        try {
            return await run(client);
        } finally {
            await client.close();
        }
    };

    program
        .command('list-endpoints')
        .description('List configured endpoints')
        .action(async () => {
            const config = await loadClientConfig(configPath());
            const endpoints = Object.entries(config.endpoints);

            if(endpoints.length === 0) {
                print('No endpoints configured.');
                return;
            }

            print('\nConfigured Endpoints:\n');
            for(const [endpointId, endpoint] of endpoints) {
                print(`  ${endpointId} (${endpoint.type})`);
                if(endpoint.type === 'http') {
                    print(`    URL: ${endpoint.url}`);
                    const headers = redactHeaders(buildHttpHeaders(endpoint));
                    for(const [name, value] of Object.entries(headers)) {
                        print(`    ${name}: ${value}`);
                    }
                } else {
                    const { command, args } = resolveStdioCommand(endpoint);
                    print(`    Command: ${_.trim(`${command} ${_.join(args, ' ')}`)}`);
                    if(endpoint.env && _.size(endpoint.env) > 0) {
                        print(`    Env vars: ${_.join(_.keys(endpoint.env), ', ')}`);
                    }
                }
                print();
            }
            print(`Failure policy: ${config.dispatch.failurePolicy}`);
        });

    program
        .command('tools')
        .description('List operations exposed by one endpoint, or by all of them')
        .argument('[endpoint]', 'Endpoint id')
        .action(async (endpointId: string | undefined) => {
            await withClient(async ({ discovery }) => {
                const { endpoints, failed } = endpointId === undefined
                    ? await discovery.listAllTools()
                    : { endpoints: [{ endpointId, tools: await discovery.listTools(endpointId) }], failed: [] };

                for(const { endpointId: id, tools } of endpoints) {
                    print(`\n${id} (${tools.length} tools):`);
                    for(const tool of tools) {
                        print(`  - ${tool.name}${tool.description ? `: ${tool.description}` : ''}`);
                    }
                }
                for(const failure of failed) {
                    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
                    console.error(`\n${failure.endpointId}: unavailable (${failure.error})`);
                }
                print();
            });
        });

    program
        .command('call')
        .description('Dispatch one request and print the response payload')
        .argument('<operation>', 'Operation (tool) name')
        .option('-p, --payload <json>', 'JSON object payload', '{}')
        .option('-t, --target <endpoint>', 'Endpoint id (defaults to round-robin)')
        .option('--timeout <ms>', 'Request timeout in milliseconds', parseTimeout)
        .action(async (operation: string, options: { payload: string, target?: string, timeout?: number }) => {
            const payload = parsePayload(options.payload);

            await withClient(async ({ dispatcher }) => {
                const controller = new AbortController();
                const onInterrupt = (): void => controller.abort();
                process.once('SIGINT', onInterrupt);

                try {
                    const response = await dispatcher.call(operation, payload, {
                        signal: controller.signal,
                        ...(options.target ? { target: options.target } : {}),
                        ...(options.timeout ? { timeoutMs: options.timeout } : {}),
                    });
                    print(JSON.stringify(response.payload, null, 2));
                } catch (error) {
                    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
                    console.error(formatFailure(error));
                    process.exitCode = 1;
                } finally {
                    process.off('SIGINT', onInterrupt);
                }
            });
        });

    program
        .command('repl')
        .description('Dispatch "<operation> [json]" lines read from stdin')
        .action(async () => {
            await withClient(async ({ dispatcher }) => {
                print('mcp-dispatch ready. Type "<operation> [json]", or "exit" to quit.');
                await runRepl(dispatcher, { input: process.stdin, output: process.stdout });
            });
        });

    program
        .command('validate')
        .description('Validate the endpoints file')
        .action(async () => {
            const path = configPath();
            print(`Validating ${path}...`);
            const config = await loadClientConfig(path);
            print(`✓ ${_.size(config.endpoints)} endpoint(s) configured, failure policy ${config.dispatch.failurePolicy}`);
        });

    program
        .command('config-path')
        .description('Show where the endpoints file is read from')
        .option('-v, --verbose', 'Show the config directory as well')
        .action((options: { verbose?: boolean }) => {
            if(options.verbose) {
                print('\nConfiguration paths:');
                print(`  Config directory: ${getConfigDir()}`);
                print(`  Endpoints file:   ${configPath()}`);
                print();
            } else {
                print(configPath());
            }
        });

    program
        .command('init')
        .description('Write a starter endpoints file')
        .option('-f, --force', 'Overwrite an existing file')
        .action(async (options: { force?: boolean }) => {
            const path = configPath();
            if(!program.opts<GlobalOptions>().config) {
                await ensureConfigDir();
            }
            await writeFile(path, `${JSON.stringify(STARTER_CONFIG, null, 4)}\n`, { encoding: 'utf-8', flag: options.force ? 'w' : 'wx' });
            print(`Wrote ${path}`);
        });

    await program.parseAsync();
}

main().catch((error: unknown) => {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(errorMessage(error));
    process.exitCode = 1;
});
