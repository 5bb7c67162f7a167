import { describe, test, expect } from 'vitest';
import path from 'path';
import { PROJECT_ROOT, loadSettings, resolveTarget, serviceEnvName } from './config.js';
import { ConfigError, UnknownServiceError } from './errors.js';

const BASE_ENV = {
    LLM_MODEL_NAME: 'test-model',
    LLM_API_KEY: 'test-secret',
    EXECUTION_STRATEGY: 'local',
};

describe('loadSettings', () => {
    test('fills defaults from the config file', () => {
        const settings = loadSettings(BASE_ENV);

        expect(settings.instanceId).toBe('gateway-local');
        expect(settings.apiHost).toBe('0.0.0.0');
        expect(settings.apiPort).toBe(8080);
        expect(settings.corsOrigins).toEqual(['*']);
        expect(settings.apiKey).toBeNull();
        expect(settings.llm).toMatchObject({
            provider: 'openai',
            modelName: 'test-model',
            apiKey: 'test-secret',
            baseUrl: 'https://api.openai.com/v1',
            temperature: 0.1,
            maxTokens: 150,
            timeoutMs: 10000,
        });
        expect(settings.execution).toEqual({ strategy: 'local', commandTimeoutMs: 30000, maxOutputLength: 10000 });
        expect(settings.services).toEqual({
            'market-predictor': 'market-predictor',
            'coding-ai-agent': 'coding-ai-agent',
            'devops-ai-agent': 'devops-ai-agent',
        });
        expect(settings.auditLedgerPath).toBe(path.join(PROJECT_ROOT, 'runtime/audit/ledger.jsonl'));
    });

    test('environment overrides the file', () => {
        const settings = loadSettings({
            ...BASE_ENV,
            PORT: '9090',
            CORS_ORIGINS: 'https://a.example, https://b.example',
            GATEWAY_API_KEY: 'test-key',
            COMMAND_TIMEOUT_SECONDS: '2.5',
            MAX_COMMAND_OUTPUT_LENGTH: '500',
            [serviceEnvName('market-predictor')]: 'mp-prod-1',
            AUDIT_LEDGER_PATH: 'off',
        });

        expect(settings.apiPort).toBe(9090);
        expect(settings.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
        expect(settings.apiKey).toBe('test-key');
        expect(settings.execution).toEqual({ strategy: 'local', commandTimeoutMs: 2500, maxOutputLength: 500 });
        expect(settings.services['market-predictor']).toBe('mp-prod-1');
        expect(settings.auditLedgerPath).toBeNull();
    });

    test('blank environment values fall back to defaults', () => {
        const settings = loadSettings({ ...BASE_ENV, PORT: '  ', COMMAND_TIMEOUT_SECONDS: '' });
        expect(settings.apiPort).toBe(8080);
        expect(settings.execution.commandTimeoutMs).toBe(30000);
    });

    test.each([
        ['local_socket', 'local'],
        ['LOCAL', 'local'],
    ])('accepts strategy alias %s', (value, expected) => {
        expect(loadSettings({ ...BASE_ENV, EXECUTION_STRATEGY: value }).execution.strategy).toBe(expected);
    });

    test('builds remote settings when the SSH triple is present', () => {
        const settings = loadSettings({
            ...BASE_ENV,
            EXECUTION_STRATEGY: 'ssh',
            SSH_TARGET_HOST: 'docker-host.internal',
            SSH_TARGET_USER: 'deploy',
            SSH_PRIVATE_KEY_PATH: '/keys/id_test',
        });

        expect(settings.execution).toEqual({
            strategy: 'remote',
            commandTimeoutMs: 30000,
            maxOutputLength: 10000,
            ssh: {
                host: 'docker-host.internal',
                user: 'deploy',
                privateKeyPath: '/keys/id_test',
                port: 22,
                connectTimeoutMs: 10000,
            },
        });
    });

    test('refuses remote strategy without SSH credentials', () => {
        expect(() => loadSettings({ ...BASE_ENV, EXECUTION_STRATEGY: 'remote', SSH_TARGET_HOST: 'h' })).toThrow(
            'Invalid configuration: ssh.user: SSH_TARGET_USER is required when EXECUTION_STRATEGY is remote; ' +
                'ssh.privateKeyPath: SSH_PRIVATE_KEY_PATH is required when EXECUTION_STRATEGY is remote',
        );
    });

    test('requires model and key', () => {
        expect(() => loadSettings({ EXECUTION_STRATEGY: 'local' })).toThrow(ConfigError);
        expect(() => loadSettings({ EXECUTION_STRATEGY: 'local', LLM_API_KEY: 'test-secret' })).toThrow(
            'llm.modelName: LLM_MODEL_NAME is required',
        );
    });

    test('rejects unknown strategies and non-numeric limits', () => {
        expect(() => loadSettings({ ...BASE_ENV, EXECUTION_STRATEGY: 'kubernetes' })).toThrow(
            'strategy: EXECUTION_STRATEGY must be one of local, remote (or local_socket, ssh)',
        );
        expect(() => loadSettings({ ...BASE_ENV, COMMAND_TIMEOUT_SECONDS: 'soon' })).toThrow(ConfigError);
    });

    test('fails on a missing config file', () => {
        expect(() => loadSettings(BASE_ENV, path.join(PROJECT_ROOT, 'config', 'missing.json'))).toThrow(
            /^Cannot read config file/,
        );
    });

    test('returns a frozen snapshot', () => {
        const settings = loadSettings(BASE_ENV);
        expect(Object.isFrozen(settings)).toBe(true);
        expect(Object.isFrozen(settings.services)).toBe(true);
        expect(Object.isFrozen(settings.execution)).toBe(true);
    });
});

describe('resolveTarget', () => {
    const services = { 'coding-ai-agent': 'coding-agent-7f3c' };

    test('maps logical to container name', () => {
        expect(resolveTarget(services, 'coding-ai-agent')).toEqual({
            logicalName: 'coding-ai-agent',
            containerName: 'coding-agent-7f3c',
        });
    });

    test('fails closed for unknown names', () => {
        expect(() => resolveTarget(services, 'billing')).toThrow(UnknownServiceError);
        expect(() => resolveTarget(services, 'toString')).toThrow('Unknown logical service name: toString');
    });

    test('derives override variable names', () => {
        expect(serviceEnvName('devops-ai-agent')).toBe('CONTAINER_NAME_FOR_DEVOPS_AI_AGENT');
    });
});
