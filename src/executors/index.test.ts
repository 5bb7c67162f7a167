import { describe, test, expect } from 'vitest';
import { LocalDockerExecutor, SshDockerExecutor, createExecutor } from './index.js';

describe('createExecutor', () => {
    test('local strategy runs on the host', () => {
        const executor = createExecutor({ strategy: 'local', commandTimeoutMs: 1000, maxOutputLength: 100 });
        expect(executor).toBeInstanceOf(LocalDockerExecutor);
        expect(executor.kind).toBe('local');
    });

    test('remote strategy goes over SSH', () => {
        const executor = createExecutor({
            strategy: 'remote',
            commandTimeoutMs: 1000,
            maxOutputLength: 100,
            ssh: { host: 'docker-host.test', user: 'deploy', privateKeyPath: '/keys/id_test', port: 22, connectTimeoutMs: 100 },
        });
        expect(executor).toBeInstanceOf(SshDockerExecutor);
        expect(executor.kind).toBe('remote');
    });
});
