import { describe, test, expect, vi, beforeAll, afterAll } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { COMMAND_REJECTED_MESSAGE, type CommandSynthesizer, GatewayService, classifyOutcome } from './gateway-service.js';
import { type CommandExecutor, LocalDockerExecutor } from './executors/index.js';
import type { AuditSink, LedgerEntry } from './ledger.js';
import type { CandidateCommand, ExecutionResult, GatewayRequest } from './types.js';

const SERVICES = { 'market-predictor': 'mp-prod-1', 'coding-ai-agent': 'coding-agent-7f3c' };
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function request(name: string, intent = 'restart the service', context?: string): GatewayRequest {
    return {
        source_id: 'ops-console',
        target_resource: { name },
        action_request: { intent, context, priority: 'NORMAL' },
    };
}

function ok(stdout = ''): ExecutionResult {
    return { status: 'SUCCESS', exit_code: 0, stdout, stderr: '' };
}

function setup(
    candidate: () => Promise<CandidateCommand>,
    run: (command: string, timeoutMs: number) => Promise<ExecutionResult> = async () => ok(),
) {
    const generate = vi.fn<CommandSynthesizer['generate']>(candidate);
    const execute = vi.fn<CommandExecutor['execute']>(run);
    const entries: LedgerEntry[] = [];
    const ledger: AuditSink = {
        record: async (entry) => {
            entries.push(entry);
        },
    };
    const service = new GatewayService({
        services: SERVICES,
        generator: { generate },
        executor: { kind: 'fake', execute },
        commandTimeoutMs: 30000,
        ledger,
    });
    return { service, generate, execute, entries };
}

describe('GatewayService.processRequest', () => {
    test('runs an accepted command and reports success', async () => {
        const { service, generate, execute, entries } = setup(async () => ({
            success: true,
            command: 'docker restart mp-prod-1',
        }), async () => ok('mp-prod-1\n'));

        const response = await service.processRequest(request('market-predictor'));

        expect(response.request_id).toMatch(UUID);
        expect(new Date(response.timestamp_processed_utc).toISOString()).toBe(response.timestamp_processed_utc);
        expect(response.overall_status).toBe('COMPLETED_SUCCESS');
        expect(response.execution_details).toEqual({
            command: 'docker restart mp-prod-1',
            execution_result: { status: 'SUCCESS', exit_code: 0, stdout: 'mp-prod-1\n', stderr: '' },
        });
        expect(response.error_details).toBeUndefined();

        expect(generate).toHaveBeenCalledWith('restart the service', 'mp-prod-1', undefined);
        expect(execute).toHaveBeenCalledWith('docker restart mp-prod-1', 30000);
        expect(entries).toEqual([
            {
                event: 'COMMAND_EXECUTED',
                request_id: response.request_id,
                source_id: 'ops-console',
                target: 'market-predictor',
                command: 'docker restart mp-prod-1',
                overall_status: 'COMPLETED_SUCCESS',
                exec_status: 'SUCCESS',
            },
        ]);
    });

    test('passes the caller context to the synthesizer', async () => {
        const { service, generate } = setup(async () => ({ success: true, command: 'docker logs --tail 50 coding-agent-7f3c' }));

        await service.processRequest(request('coding-ai-agent', 'show recent logs', 'errors since the last deploy'));

        expect(generate).toHaveBeenCalledWith('show recent logs', 'coding-agent-7f3c', 'errors since the last deploy');
    });

    test('fails closed on an unknown service without calling the LLM', async () => {
        const { service, generate, execute, entries } = setup(async () => ({ success: true, command: 'docker ps' }));

        const response = await service.processRequest(request('billing'));

        expect(response.overall_status).toBe('VALIDATION_ERROR');
        expect(response.error_details).toEqual({
            error_code: 'UNKNOWN_SERVICE',
            error_message: 'Unknown logical service name: billing',
        });
        expect(response.execution_details).toBeUndefined();
        expect(generate).not.toHaveBeenCalled();
        expect(execute).not.toHaveBeenCalled();
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({ event: 'REQUEST_FAILED', command: null, error_code: 'UNKNOWN_SERVICE' });
    });

    test('reports synthesis failures', async () => {
        const { service, execute } = setup(async () => ({
            success: false,
            command: '',
            errorMessage: 'LLM generation failed: HTTP 429 from completion endpoint',
        }));

        const response = await service.processRequest(request('market-predictor'));

        expect(response.overall_status).toBe('SYNTHESIS_FAILED');
        expect(response.error_details).toEqual({
            error_code: 'LLM_ERROR',
            error_message: 'LLM generation failed: HTTP 429 from completion endpoint',
        });
        expect(execute).not.toHaveBeenCalled();
    });

    test('never executes a rejected command', async () => {
        const { service, execute, entries } = setup(async () => ({
            success: true,
            command: 'docker exec mp-prod-1 rm -rf /',
        }));

        const response = await service.processRequest(request('market-predictor', 'free some disk space'));

        expect(response.overall_status).toBe('VALIDATION_ERROR');
        expect(response.error_details).toEqual({ error_code: 'COMMAND_REJECTED', error_message: COMMAND_REJECTED_MESSAGE });
        expect(execute).not.toHaveBeenCalled();
        expect(entries).toEqual([
            {
                event: 'COMMAND_REJECTED',
                request_id: response.request_id,
                source_id: 'ops-console',
                target: 'market-predictor',
                command: 'docker exec mp-prod-1 rm -rf /',
                overall_status: 'VALIDATION_ERROR',
                error_code: 'COMMAND_REJECTED',
                reason: 'DANGEROUS_PATTERN: Dangerous pattern detected: rm -rf',
            },
        ]);
    });

    test('rejects non-docker output the same way', async () => {
        const { service, execute, entries } = setup(async () => ({ success: true, command: 'rm -rf /' }));

        const response = await service.processRequest(request('market-predictor'));

        expect(response.error_details?.error_code).toBe('COMMAND_REJECTED');
        expect(execute).not.toHaveBeenCalled();
        expect(entries[0].reason).toBe("NOT_DOCKER: Command must start with 'docker '");
    });

    test('a timed out command completes with failure', async () => {
        const timedOut: ExecutionResult = {
            status: 'TIMEOUT',
            exit_code: -1,
            stdout: '',
            stderr: 'Command timed out after 30 seconds',
        };
        const { service } = setup(async () => ({ success: true, command: 'docker logs mp-prod-1' }), async () => timedOut);

        const response = await service.processRequest(request('market-predictor', 'show logs'));

        expect(response.overall_status).toBe('COMPLETED_FAILURE');
        expect(response.execution_details?.execution_result).toEqual(timedOut);
        expect(response.error_details).toBeUndefined();
    });

    test('an executor that throws is an execution error', async () => {
        const { service, entries } = setup(
            async () => ({ success: true, command: 'docker ps' }),
            async () => {
                throw new Error('docker socket unavailable');
            },
        );

        const response = await service.processRequest(request('market-predictor'));

        expect(response.overall_status).toBe('EXECUTION_ERROR');
        expect(response.error_details).toEqual({
            error_code: 'EXECUTION_FAILED',
            error_message: 'Execution failed: docker socket unavailable',
        });
        expect(entries[0]).toMatchObject({ event: 'REQUEST_FAILED', command: 'docker ps' });
    });

    test('an unexpected fault becomes an internal error', async () => {
        const { service } = setup(async () => {
            throw new Error('synthesizer exploded');
        });

        const response = await service.processRequest(request('market-predictor'));

        expect(response.overall_status).toBe('INTERNAL_ERROR');
        expect(response.error_details).toEqual({ error_code: 'GATEWAY_ERROR', error_message: 'synthesizer exploded' });
    });

    test('a failing ledger does not change the response', async () => {
        const service = new GatewayService({
            services: SERVICES,
            generator: { generate: async () => ({ success: true, command: 'docker ps' }) },
            executor: { kind: 'fake', execute: async () => ok() },
            commandTimeoutMs: 30000,
            ledger: {
                record: async () => {
                    throw new Error('disk full');
                },
            },
        });

        const response = await service.processRequest(request('market-predictor'));
        expect(response.overall_status).toBe('COMPLETED_SUCCESS');
    });

    test('each response has its own id and is frozen', async () => {
        const { service } = setup(async () => ({ success: true, command: 'docker ps' }));

        const first = await service.processRequest(request('market-predictor'));
        const second = await service.processRequest(request('billing'));

        expect(first.request_id).not.toBe(second.request_id);
        expect(Object.isFrozen(first)).toBe(true);
        expect(Object.isFrozen(second)).toBe(true);
    });
});

describe('classifyOutcome', () => {
    test.each([
        ['SUCCESS', 'COMPLETED_SUCCESS'],
        ['FAILURE', 'COMPLETED_FAILURE'],
        ['TIMEOUT', 'COMPLETED_FAILURE'],
        ['CHANNEL_ERROR', 'COMPLETED_FAILURE'],
        ['EXECUTOR_ERROR', 'COMPLETED_FAILURE'],
    ] as const)('%s -> %s', (status, overall) => {
        expect(classifyOutcome(status)).toBe(overall);
    });
});

describe('GatewayService with the local executor', () => {
    // Stub shells stand in for /bin/sh so no docker daemon is needed: the
    // executor runs `<shell> -c <command>`.
    let dir: string;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gateway-e2e-'));
        await fs.writeFile(path.join(dir, 'echo-shell'), '#!/bin/sh\nprintf \'%s\\n\' "$2"\n', { mode: 0o755 });
        await fs.writeFile(path.join(dir, 'hung-shell'), '#!/bin/sh\nsleep 5\n', { mode: 0o755 });
    });

    afterAll(async () => {
        await fs.remove(dir);
    });

    function serviceWithShell(shell: string, commandTimeoutMs: number): GatewayService {
        return new GatewayService({
            services: SERVICES,
            generator: { generate: async (_intent, containerName) => ({ success: true, command: `docker restart ${containerName}` }) },
            executor: new LocalDockerExecutor({ maxOutputLength: 1000, shell: path.join(dir, shell) }),
            commandTimeoutMs,
        });
    }

    test('restart of a known service completes successfully', async () => {
        const response = await serviceWithShell('echo-shell', 5000).processRequest(request('market-predictor'));

        expect(response.overall_status).toBe('COMPLETED_SUCCESS');
        expect(response.execution_details).toEqual({
            command: 'docker restart mp-prod-1',
            execution_result: { status: 'SUCCESS', exit_code: 0, stdout: 'docker restart mp-prod-1\n', stderr: '' },
        });
    });

    test('a command that outlives the timeout completes with failure', async () => {
        const response = await serviceWithShell('hung-shell', 200).processRequest(request('market-predictor'));

        expect(response.overall_status).toBe('COMPLETED_FAILURE');
        expect(response.execution_details?.execution_result).toEqual({
            status: 'TIMEOUT',
            exit_code: -1,
            stdout: '',
            stderr: 'Command timed out after 0.2 seconds',
        });
    });
});
