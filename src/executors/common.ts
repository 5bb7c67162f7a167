// ========================================
// Docker Command Gateway - Executor Contract
// ========================================

import type { ExecutionResult } from '../types.js';
import { truncateOutput } from '../truncate.js';

export interface CommandExecutor {
    readonly kind: string;
    execute(command: string, timeoutMs: number): Promise<ExecutionResult>;
}

export const TIMED_OUT: unique symbol = Symbol('timed-out');

/** Resolve with the promise's value, or TIMED_OUT once timeoutMs elapses. */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<typeof TIMED_OUT>((resolve) => {
        timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });
    return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

export function describeTimeout(timeoutMs: number): string {
    return `Command timed out after ${timeoutMs / 1000} seconds`;
}

export function completedResult(exitCode: number, stdout: string, stderr: string, maxOutputLength: number): ExecutionResult {
    return {
        status: exitCode === 0 ? 'SUCCESS' : 'FAILURE',
        exit_code: exitCode,
        stdout: truncateOutput(stdout, maxOutputLength),
        stderr: truncateOutput(stderr, maxOutputLength),
    };
}

export function failedResult(status: 'TIMEOUT' | 'CHANNEL_ERROR' | 'EXECUTOR_ERROR', message: string, maxOutputLength: number): ExecutionResult {
    return {
        status,
        exit_code: -1,
        stdout: '',
        stderr: truncateOutput(message, maxOutputLength),
    };
}
