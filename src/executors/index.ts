// ========================================
// Docker Command Gateway - Executor Selection
// ========================================

import type { ExecutionSettings } from '../config.js';
import { LocalDockerExecutor } from './local.js';
import { SshDockerExecutor } from './ssh.js';

export type { CommandExecutor } from './common.js';
export { LocalDockerExecutor } from './local.js';
export { SshDockerExecutor } from './ssh.js';

export type DockerExecutor = LocalDockerExecutor | SshDockerExecutor;

/**
 * Pick the execution backend once, at startup. There is no per-request
 * switching and no failover between the two.
 */
export function createExecutor(execution: ExecutionSettings): DockerExecutor {
    switch (execution.strategy) {
        case 'local':
            return new LocalDockerExecutor({ maxOutputLength: execution.maxOutputLength });
        case 'remote':
            return new SshDockerExecutor({ ssh: execution.ssh, maxOutputLength: execution.maxOutputLength });
        default: {
            const unreachable: never = execution;
            throw new Error(`Unsupported execution strategy: ${JSON.stringify(unreachable)}`);
        }
    }
}
