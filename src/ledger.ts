// ========================================
// Docker Command Gateway - Audit Ledger
// ========================================

import path from 'path';
import fs from 'fs-extra';
import type { ErrorCode, ExecutionStatus, OverallStatus } from './types.js';

export type LedgerEvent = 'COMMAND_EXECUTED' | 'COMMAND_REJECTED' | 'REQUEST_FAILED';

export interface LedgerEntry {
    event: LedgerEvent;
    request_id: string;
    source_id: string;
    target: string;
    command: string | null;
    overall_status: OverallStatus;
    exec_status?: ExecutionStatus;
    error_code?: ErrorCode;
    reason?: string;
}

export interface AuditSink {
    record(entry: LedgerEntry): Promise<void>;
}

/**
 * Append-only JSONL record of every request's terminal state.
 * A failed write is logged and dropped; it never changes a response.
 */
export class AuditLedger implements AuditSink {
    private readonly file: string;

    constructor(file: string) {
        this.file = file;
    }

    async record(entry: LedgerEntry): Promise<void> {
        try {
            const line = {
                ts: new Date().toISOString(),
                actor: 'command-gateway',
                ...entry,
            };
            await fs.ensureDir(path.dirname(this.file));
            await fs.appendFile(this.file, JSON.stringify(line) + '\n');
        } catch (err) {
            console.error('[LEDGER] Ledger logging failed:', err);
        }
    }
}

export const noopLedger: AuditSink = {
    record: async () => {},
};
