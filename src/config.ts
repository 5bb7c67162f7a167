// ========================================
// Docker Command Gateway - Configuration
// ========================================

import path from 'path';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, UnknownServiceError, errorMessage } from './errors.js';
import type { ResolvedTarget } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Sources live in src/, the build in dist/; both sit one level below the project root.
export const PROJECT_ROOT = path.resolve(__dirname, '..');
export const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, 'config', 'default-config.json');

type Env = Record<string, string | undefined>;

// ========================================
// Settings snapshot
// ========================================
export interface SshSettings {
    host: string;
    user: string;
    privateKeyPath: string;
    port: number;
    connectTimeoutMs: number;
}

interface ExecutionCommon {
    commandTimeoutMs: number;
    maxOutputLength: number;
}

export type ExecutionSettings =
    | (ExecutionCommon & { strategy: 'local' })
    | (ExecutionCommon & { strategy: 'remote'; ssh: SshSettings });

export type ExecutionStrategyName = ExecutionSettings['strategy'];

export interface LLMSettings {
    provider: string;
    modelName: string;
    apiKey: string;
    baseUrl: string;
    systemPrompt: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

export interface Settings {
    instanceId: string;
    apiHost: string;
    apiPort: number;
    corsOrigins: string[];
    apiKey: string | null;
    llm: LLMSettings;
    execution: ExecutionSettings;
    services: Readonly<Record<string, string>>;
    auditLedgerPath: string | null;
}

// ========================================
// File + environment schemas
// ========================================
const fileConfigSchema = z.object({
    gateway: z.object({
        instance_id: z.string(),
        api_host: z.string(),
        api_port: z.number(),
        cors_origins: z.string(),
    }),
    llm: z.object({
        provider: z.string(),
        api_base_url: z.string(),
        temperature: z.number(),
        max_tokens: z.number(),
        timeout_ms: z.number(),
        system_prompt: z.string(),
    }),
    execution: z.object({
        command_timeout_seconds: z.number(),
        max_command_output_length: z.number(),
        ssh_port: z.number(),
        ssh_connect_timeout_ms: z.number(),
    }),
    services: z.record(z.string(), z.string()),
    audit: z.object({ ledger_path: z.string() }),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

const STRATEGY_ALIASES: Record<string, ExecutionStrategyName> = {
    local: 'local',
    local_socket: 'local',
    remote: 'remote',
    ssh: 'remote',
};

const strategySchema = z.preprocess(
    (value) => (typeof value === 'string' ? STRATEGY_ALIASES[value.trim().toLowerCase()] ?? value : value),
    z.enum(['local', 'remote'], {
        errorMap: () => ({ message: 'EXECUTION_STRATEGY must be one of local, remote (or local_socket, ssh)' }),
    }),
);

const mergedSchema = z
    .object({
        instanceId: z.string().min(1),
        apiHost: z.string().min(1),
        apiPort: z.coerce.number().int().min(0).max(65535),
        corsOrigins: z.string(),
        apiKey: z.string().optional(),
        llm: z.object({
            provider: z.string().min(1),
            modelName: z.string({ required_error: 'LLM_MODEL_NAME is required' }).min(1),
            apiKey: z.string({ required_error: 'LLM_API_KEY is required' }).min(1),
            baseUrl: z.string().url(),
            systemPrompt: z.string().min(1),
            temperature: z.coerce.number().min(0).max(2),
            maxTokens: z.coerce.number().int().positive(),
            timeoutMs: z.coerce.number().int().positive(),
        }),
        strategy: strategySchema,
        commandTimeoutSeconds: z.coerce.number().positive(),
        maxOutputLength: z.coerce.number().int().positive(),
        ssh: z.object({
            host: z.string().optional(),
            user: z.string().optional(),
            privateKeyPath: z.string().optional(),
            port: z.coerce.number().int().positive(),
            connectTimeoutMs: z.coerce.number().int().positive(),
        }),
        services: z.record(z.string(), z.string().min(1)),
        auditLedgerPath: z.string(),
    })
    .superRefine((value, ctx) => {
        if (value.strategy !== 'remote') return;
        const required = [
            ['host', 'SSH_TARGET_HOST'],
            ['user', 'SSH_TARGET_USER'],
            ['privateKeyPath', 'SSH_PRIVATE_KEY_PATH'],
        ] as const;
        for (const [key, envName] of required) {
            if (!value.ssh[key]) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['ssh', key],
                    message: `${envName} is required when EXECUTION_STRATEGY is remote`,
                });
            }
        }
    });

// Empty strings count as unset.
function envValue(env: Env, name: string): string | undefined {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value;
}

export function serviceEnvName(logicalName: string): string {
    return `CONTAINER_NAME_FOR_${logicalName.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

function mergeServices(fileServices: Record<string, string>, env: Env): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const [logicalName, containerName] of Object.entries(fileServices)) {
        merged[logicalName] = envValue(env, serviceEnvName(logicalName)) ?? containerName;
    }
    return merged;
}

function readConfigFile(configPath: string): FileConfig {
    let raw: unknown;
    try {
        raw = fs.readJSONSync(configPath);
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Malformed config file ${configPath}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function resolveLedgerPath(value: string): string | null {
    if (value.trim().toLowerCase() === 'off') return null;
    return path.isAbsolute(value) ? value : path.join(PROJECT_ROOT, value);
}

/**
 * Build the immutable settings snapshot. Throws ConfigError on anything
 * missing or malformed; callers treat that as fatal.
 */
export function loadSettings(env: Env = process.env, configPath: string = DEFAULT_CONFIG_PATH): Settings {
    const file = readConfigFile(configPath);

    const parsed = mergedSchema.safeParse({
        instanceId: envValue(env, 'GATEWAY_INSTANCE_ID') ?? file.gateway.instance_id,
        apiHost: envValue(env, 'API_HOST') ?? file.gateway.api_host,
        apiPort: envValue(env, 'PORT') ?? file.gateway.api_port,
        corsOrigins: envValue(env, 'CORS_ORIGINS') ?? file.gateway.cors_origins,
        apiKey: envValue(env, 'GATEWAY_API_KEY'),
        llm: {
            provider: envValue(env, 'LLM_PROVIDER') ?? file.llm.provider,
            modelName: envValue(env, 'LLM_MODEL_NAME'),
            apiKey: envValue(env, 'LLM_API_KEY'),
            baseUrl: envValue(env, 'LLM_API_BASE_URL') ?? file.llm.api_base_url,
            systemPrompt: envValue(env, 'LLM_SYSTEM_PROMPT') ?? file.llm.system_prompt,
            temperature: envValue(env, 'LLM_TEMPERATURE') ?? file.llm.temperature,
            maxTokens: envValue(env, 'LLM_MAX_TOKENS') ?? file.llm.max_tokens,
            timeoutMs: envValue(env, 'LLM_TIMEOUT_MS') ?? file.llm.timeout_ms,
        },
        strategy: envValue(env, 'EXECUTION_STRATEGY'),
        commandTimeoutSeconds: envValue(env, 'COMMAND_TIMEOUT_SECONDS') ?? file.execution.command_timeout_seconds,
        maxOutputLength: envValue(env, 'MAX_COMMAND_OUTPUT_LENGTH') ?? file.execution.max_command_output_length,
        ssh: {
            host: envValue(env, 'SSH_TARGET_HOST'),
            user: envValue(env, 'SSH_TARGET_USER'),
            privateKeyPath: envValue(env, 'SSH_PRIVATE_KEY_PATH'),
            port: envValue(env, 'SSH_PORT') ?? file.execution.ssh_port,
            connectTimeoutMs: envValue(env, 'SSH_CONNECT_TIMEOUT_MS') ?? file.execution.ssh_connect_timeout_ms,
        },
        services: mergeServices(file.services, env),
        auditLedgerPath: envValue(env, 'AUDIT_LEDGER_PATH') ?? file.audit.ledger_path,
    });

    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }

    const v = parsed.data;
    const common: ExecutionCommon = {
        commandTimeoutMs: Math.round(v.commandTimeoutSeconds * 1000),
        maxOutputLength: v.maxOutputLength,
    };

    let execution: ExecutionSettings;
    if (v.strategy === 'remote') {
        const { host, user, privateKeyPath } = v.ssh;
        if (!host || !user || !privateKeyPath) {
            // Unreachable: superRefine reports these.
            throw new ConfigError('Invalid configuration: SSH settings incomplete');
        }
        execution = {
            ...common,
            strategy: 'remote',
            ssh: { host, user, privateKeyPath, port: v.ssh.port, connectTimeoutMs: v.ssh.connectTimeoutMs },
        };
    } else {
        execution = { ...common, strategy: 'local' };
    }

    const settings: Settings = {
        instanceId: v.instanceId,
        apiHost: v.apiHost,
        apiPort: v.apiPort,
        corsOrigins: v.corsOrigins.split(',').map((o) => o.trim()).filter((o) => o.length > 0),
        apiKey: v.apiKey ?? null,
        llm: v.llm,
        execution,
        services: Object.freeze({ ...v.services }),
        auditLedgerPath: resolveLedgerPath(v.auditLedgerPath),
    };
    return deepFreeze(settings);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

// ========================================
// Target resolution
// ========================================

/** Logical service name -> container name. No fallback for unknown names. */
export function resolveTarget(services: Readonly<Record<string, string>>, logicalName: string): ResolvedTarget {
    if (!Object.prototype.hasOwnProperty.call(services, logicalName)) {
        throw new UnknownServiceError(logicalName);
    }
    return { logicalName, containerName: services[logicalName] };
}
