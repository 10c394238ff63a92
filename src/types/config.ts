/**
 * Configuration type definitions for mcp-dispatch
 */

import { z } from 'zod';

/**
 * Credentials placeholder. Only a bearer token is understood; anything else a
 * server needs goes in `headers` (http) or `env` (stdio).
 */
export const CredentialsSchema = z.object({
    token: z.string().min(1, 'Token cannot be empty').optional(),
});

// STDIO transport: the endpoint is a subprocess speaking MCP on stdin/stdout
export const StdioEndpointConfigSchema = z.object({
    type:        z.literal('stdio').default('stdio'),
    command:     z.string().min(1, 'Command cannot be empty').optional(),
    // Script path; when no command is given the interpreter is inferred from it
    path:        z.string().min(1, 'Path cannot be empty').optional(),
    args:        z.array(z.string()).optional(),
    env:         z.record(z.string(), z.string()).optional(),
    cwd:         z.string().optional(),
    credentials: CredentialsSchema.optional(),
});

// Streamable HTTP transport
export const HttpEndpointConfigSchema = z.object({
    type:        z.literal('http'),
    url:         z.string().url('Endpoint url must be a valid URL'),
    headers:     z.record(z.string(), z.string()).optional(),
    credentials: CredentialsSchema.optional(),
});

// Endpoints without a "type" are stdio
export const EndpointConfigSchema = z.union([
    HttpEndpointConfigSchema,
    StdioEndpointConfigSchema,
]).superRefine((config, ctx) => {
    if(config.type === 'stdio' && !config.command && !config.path) {
        ctx.addIssue({
            code:    z.ZodIssueCode.custom,
            message: 'A stdio endpoint needs either "command" or "path"',
            path:    ['command'],
        });
    }
});

export const FailurePolicySchema = z.enum(['fail-fast', 'skip']);

export const RetryConfigSchema = z.object({
    maxRetries:   z.number().int().min(0).default(0),
    retryDelayMs: z.number().int().min(0).default(1000),
});

export const DispatchConfigSchema = z.object({
    failurePolicy:    FailurePolicySchema.default('fail-fast'),
    requestTimeoutMs: z.number().int().positive().default(30000),
    connectTimeoutMs: z.number().int().positive().default(15000),
    connectAttempts:  z.number().int().min(1).default(1),
    retry:            RetryConfigSchema.default({}),
});

export const ClientConfigSchema = z.object({
    endpoints: z.record(z.string().min(1), EndpointConfigSchema),
    dispatch:  DispatchConfigSchema.default({}),
});

export type Credentials = z.infer<typeof CredentialsSchema>;
export type StdioEndpointConfig = z.infer<typeof StdioEndpointConfigSchema>;
export type HttpEndpointConfig = z.infer<typeof HttpEndpointConfigSchema>;
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type FailurePolicy = z.infer<typeof FailurePolicySchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/** Input shape accepted by the schema (defaults not yet applied) */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
