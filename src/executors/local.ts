// ========================================
// Docker Command Gateway - Local Executor
// ========================================

import { spawn, type ChildProcess } from 'child_process';
import { errorMessage } from '../errors.js';
import { OutputCollector } from '../truncate.js';
import type { ExecutionResult } from '../types.js';
import { type CommandExecutor, completedResult, describeTimeout, failedResult } from './common.js';

export interface LocalExecutorOptions {
    maxOutputLength: number;
    shell?: string;
}

// The shell runs in its own process group so a timeout takes docker down with it.
function killGroup(child: ChildProcess): void {
    if (child.pid === undefined) return;
    try {
        process.kill(-child.pid, 'SIGKILL');
    } catch {
        child.kill('SIGKILL');
    }
}

/**
 * Runs the command through the host shell (which reaches the local docker socket).
 */
export class LocalDockerExecutor implements CommandExecutor {
    readonly kind = 'local' as const;
    private readonly maxOutputLength: number;
    private readonly shell: string;

    constructor(opts: LocalExecutorOptions) {
        this.maxOutputLength = opts.maxOutputLength;
        this.shell = opts.shell ?? '/bin/sh';
    }

    execute(command: string, timeoutMs: number): Promise<ExecutionResult> {
        console.log(`[EXEC] Local: ${command}`);

        return new Promise<ExecutionResult>((resolve) => {
            let settled = false;
            let timer: NodeJS.Timeout | undefined;

            const finish = (result: ExecutionResult) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                console.log(`[EXEC] Local finished: ${result.status} (exit ${result.exit_code})`);
                resolve(result);
            };

            let child: ChildProcess;
            try {
                child = spawn(command, {
                    shell: this.shell,
                    detached: true,
                    stdio: ['ignore', 'pipe', 'pipe'],
                });
            } catch (err) {
                finish(failedResult('EXECUTOR_ERROR', `Execution error: ${errorMessage(err)}`, this.maxOutputLength));
                return;
            }

            const stdout = new OutputCollector(this.maxOutputLength);
            const stderr = new OutputCollector(this.maxOutputLength);
            child.stdout?.setEncoding('utf8');
            child.stderr?.setEncoding('utf8');
            child.stdout?.on('data', (chunk: string) => stdout.append(chunk));
            child.stderr?.on('data', (chunk: string) => stderr.append(chunk));

            timer = setTimeout(() => {
                console.error(`[FAIL] Command timed out after ${timeoutMs}ms: ${command}`);
                killGroup(child);
                finish(failedResult('TIMEOUT', describeTimeout(timeoutMs), this.maxOutputLength));
            }, timeoutMs);

            child.on('error', (err) => {
                console.error(`[FAIL] Local execution failed:`, err.message);
                finish(failedResult('EXECUTOR_ERROR', `Execution error: ${err.message}`, this.maxOutputLength));
            });

            child.on('close', (code: number | null) => {
                finish(completedResult(code ?? -1, stdout.text(), stderr.text(), this.maxOutputLength));
            });
        });
    }
}
