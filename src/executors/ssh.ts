// ========================================
// Docker Command Gateway - SSH Executor
// ========================================

import type { SshSettings } from '../config.js';
import { errorMessage } from '../errors.js';
import type { ExecutionResult } from '../types.js';
import { type CommandExecutor, TIMED_OUT, completedResult, describeTimeout, failedResult, withTimeout } from './common.js';
import { type ChannelOpener, type RemoteChannel, openSshChannel } from './ssh-channel.js';

export interface SshExecutorOptions {
    ssh: SshSettings;
    maxOutputLength: number;
    openChannel?: ChannelOpener;
}

/**
 * Runs the command on a fixed remote host. One connection per call, closed on every path.
 */
export class SshDockerExecutor implements CommandExecutor {
    readonly kind = 'remote' as const;
    private readonly ssh: SshSettings;
    private readonly maxOutputLength: number;
    private readonly openChannel: ChannelOpener;

    constructor(opts: SshExecutorOptions) {
        this.ssh = opts.ssh;
        this.maxOutputLength = opts.maxOutputLength;
        this.openChannel = opts.openChannel ?? openSshChannel;
    }

    private async connect(): Promise<RemoteChannel | string> {
        const opening = this.openChannel(this.ssh);
        let opened: RemoteChannel | typeof TIMED_OUT;
        try {
            opened = await withTimeout(opening, this.ssh.connectTimeoutMs);
        } catch (err) {
            return errorMessage(err);
        }
        if (opened === TIMED_OUT) {
            // Close the channel if the handshake completes after we gave up on it.
            void opening.then(
                (late) => late.close(),
                (err: unknown) => console.error(`[SSH] Late connection failure:`, errorMessage(err)),
            );
            return `connect timed out after ${this.ssh.connectTimeoutMs}ms`;
        }
        return opened;
    }

    async execute(command: string, timeoutMs: number): Promise<ExecutionResult> {
        console.log(`[EXEC] SSH ${this.ssh.user}@${this.ssh.host}: ${command}`);

        const channel = await this.connect();
        if (typeof channel === 'string') {
            console.error(`[FAIL] SSH connection failed: ${channel}`);
            return failedResult('CHANNEL_ERROR', `SSH connection failed: ${channel}`, this.maxOutputLength);
        }

        try {
            const result = await withTimeout(channel.exec(command, this.maxOutputLength), timeoutMs);
            if (result === TIMED_OUT) {
                console.error(`[FAIL] Remote command timed out after ${timeoutMs}ms: ${command}`);
                return failedResult('TIMEOUT', describeTimeout(timeoutMs), this.maxOutputLength);
            }
            const outcome = completedResult(result.exitCode ?? -1, result.stdout, result.stderr, this.maxOutputLength);
            console.log(`[EXEC] SSH finished: ${outcome.status} (exit ${outcome.exit_code})`);
            return outcome;
        } catch (err) {
            console.error(`[FAIL] SSH command execution failed:`, errorMessage(err));
            return failedResult('EXECUTOR_ERROR', `SSH execution error: ${errorMessage(err)}`, this.maxOutputLength);
        } finally {
            channel.close();
        }
    }
}
