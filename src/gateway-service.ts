// ========================================
// Docker Command Gateway - Gateway Service (Orchestrator)
// ========================================

import { randomUUID } from 'crypto';
import { resolveTarget } from './config.js';
import { UnknownServiceError, errorMessage } from './errors.js';
import type { CommandExecutor } from './executors/index.js';
import { type AuditSink, type LedgerEntry, noopLedger } from './ledger.js';
import type {
    CandidateCommand,
    CompletedStatus,
    ErrorCode,
    ErrorStatus,
    ExecutionResult,
    ExecutionStatus,
    GatewayRequest,
    GatewayResponse,
    ResolvedTarget,
} from './types.js';
import { validate } from './validator.js';

export const COMMAND_REJECTED_MESSAGE = 'Generated command was rejected by the safety policy';

export interface CommandSynthesizer {
    generate(intent: string, containerName: string, context?: string): Promise<CandidateCommand>;
}

export interface GatewayServiceDeps {
    services: Readonly<Record<string, string>>;
    generator: CommandSynthesizer;
    executor: CommandExecutor;
    commandTimeoutMs: number;
    ledger?: AuditSink;
}

export function classifyOutcome(status: ExecutionStatus): CompletedStatus {
    switch (status) {
        case 'SUCCESS':
            return 'COMPLETED_SUCCESS';
        case 'FAILURE':
        case 'TIMEOUT':
        case 'CHANNEL_ERROR':
        case 'EXECUTOR_ERROR':
            return 'COMPLETED_FAILURE';
        default: {
            const unreachable: never = status;
            throw new Error(`Unknown execution status: ${String(unreachable)}`);
        }
    }
}

interface RequestScope {
    requestId: string;
    request: GatewayRequest;
}

/**
 * resolve -> synthesize -> validate -> execute -> respond, once per request.
 * processRequest never rejects; every path ends in exactly one GatewayResponse.
 */
export class GatewayService {
    private readonly services: Readonly<Record<string, string>>;
    private readonly generator: CommandSynthesizer;
    private readonly executor: CommandExecutor;
    private readonly commandTimeoutMs: number;
    private readonly ledger: AuditSink;

    constructor(deps: GatewayServiceDeps) {
        this.services = deps.services;
        this.generator = deps.generator;
        this.executor = deps.executor;
        this.commandTimeoutMs = deps.commandTimeoutMs;
        this.ledger = deps.ledger ?? noopLedger;
    }

    async processRequest(request: GatewayRequest): Promise<GatewayResponse> {
        const scope: RequestScope = { requestId: randomUUID(), request };
        const { source_id, target_resource, action_request } = request;

        console.log(
            `[GATEWAY] ${scope.requestId} from ${source_id} -> ${target_resource.name} ` +
                `(${action_request.priority}): ${action_request.intent}`,
        );

        let command: string | null = null;
        try {
            let target: ResolvedTarget;
            try {
                target = resolveTarget(this.services, target_resource.name);
            } catch (err) {
                if (err instanceof UnknownServiceError) {
                    console.error(`[RESOLVE] ${err.message}`);
                    return await this.fail(scope, 'VALIDATION_ERROR', 'UNKNOWN_SERVICE', err.message, { command });
                }
                throw err;
            }
            console.log(`[RESOLVE] ${target.logicalName} -> ${target.containerName}`);

            const candidate = await this.generator.generate(action_request.intent, target.containerName, action_request.context);
            if (!candidate.success) {
                return await this.fail(scope, 'SYNTHESIS_FAILED', 'LLM_ERROR', candidate.errorMessage, { command });
            }
            command = candidate.command;

            const verdict = validate(command);
            if (!verdict.accepted) {
                console.warn(`[POLICY] ${scope.requestId} rejected (${verdict.rule}): ${verdict.reason} :: ${command}`);
                return await this.fail(scope, 'VALIDATION_ERROR', 'COMMAND_REJECTED', COMMAND_REJECTED_MESSAGE, {
                    command,
                    event: 'COMMAND_REJECTED',
                    reason: `${verdict.rule}: ${verdict.reason}`,
                });
            }

            let result: ExecutionResult;
            try {
                result = await this.executor.execute(command, this.commandTimeoutMs);
            } catch (err) {
                console.error(`[FAIL] Executor raised for ${scope.requestId}:`, errorMessage(err));
                return await this.fail(scope, 'EXECUTION_ERROR', 'EXECUTION_FAILED', `Execution failed: ${errorMessage(err)}`, {
                    command,
                });
            }

            return await this.complete(scope, command, result);
        } catch (err) {
            console.error(`[FAIL] Gateway service error for ${scope.requestId}:`, errorMessage(err));
            return this.fail(scope, 'INTERNAL_ERROR', 'GATEWAY_ERROR', errorMessage(err), { command });
        }
    }

    private async complete(scope: RequestScope, command: string, result: ExecutionResult): Promise<GatewayResponse> {
        const overall = classifyOutcome(result.status);
        console.log(`[GATEWAY] ${scope.requestId} ${overall} (${result.status}, exit ${result.exit_code})`);

        await this.audit({
            event: 'COMMAND_EXECUTED',
            request_id: scope.requestId,
            source_id: scope.request.source_id,
            target: scope.request.target_resource.name,
            command,
            overall_status: overall,
            exec_status: result.status,
        });

        return Object.freeze({
            request_id: scope.requestId,
            timestamp_processed_utc: new Date().toISOString(),
            overall_status: overall,
            execution_details: { command, execution_result: result },
        });
    }

    private async fail(
        scope: RequestScope,
        overall: ErrorStatus,
        code: ErrorCode,
        message: string,
        extra: { command: string | null; event?: LedgerEntry['event']; reason?: string },
    ): Promise<GatewayResponse> {
        await this.audit({
            event: extra.event ?? 'REQUEST_FAILED',
            request_id: scope.requestId,
            source_id: scope.request.source_id,
            target: scope.request.target_resource.name,
            command: extra.command,
            overall_status: overall,
            error_code: code,
            reason: extra.reason ?? message,
        });

        return Object.freeze({
            request_id: scope.requestId,
            timestamp_processed_utc: new Date().toISOString(),
            overall_status: overall,
            error_details: { error_code: code, error_message: message },
        });
    }

    private async audit(entry: LedgerEntry): Promise<void> {
        try {
            await this.ledger.record(entry);
        } catch (err) {
            console.error('[LEDGER] Audit sink failed:', errorMessage(err));
        }
    }
}
