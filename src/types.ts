// ========================================
// Docker Command Gateway - Shared Types
// ========================================

// ----------------------------------------
// Inbound request
// ----------------------------------------
export type RequestPriority = 'LOW' | 'NORMAL' | 'HIGH' | 'URGENT';

export interface TargetResource {
    name: string;
}

export interface ActionRequest {
    intent: string;
    context?: string;
    priority: RequestPriority;
}

export interface GatewayRequest {
    source_id: string;
    target_resource: TargetResource;
    action_request: ActionRequest;
}

// ----------------------------------------
// Pipeline values
// ----------------------------------------
export interface ResolvedTarget {
    logicalName: string;
    containerName: string;
}

export type CandidateCommand =
    | { success: true; command: string }
    | { success: false; command: ''; errorMessage: string };

export type PolicyRule =
    | 'NOT_DOCKER'
    | 'DISALLOWED_SUBCOMMAND'
    | 'EXEC_MISSING_COMMAND'
    | 'DANGEROUS_PATTERN'
    | 'RM_FORCE_RECURSIVE';

export type ValidationVerdict =
    | { accepted: true }
    | { accepted: false; rule: PolicyRule; reason: string };

export type ExecutionStatus = 'SUCCESS' | 'FAILURE' | 'TIMEOUT' | 'CHANNEL_ERROR' | 'EXECUTOR_ERROR';

export interface ExecutionResult {
    status: ExecutionStatus;
    exit_code: number;
    stdout: string;
    stderr: string;
}

// ----------------------------------------
// Outbound response
// ----------------------------------------
export interface ExecutionDetails {
    command: string;
    execution_result: ExecutionResult;
}

export type ErrorCode =
    | 'UNKNOWN_SERVICE'
    | 'LLM_ERROR'
    | 'COMMAND_REJECTED'
    | 'EXECUTION_FAILED'
    | 'GATEWAY_ERROR';

export interface ErrorDetails {
    error_code: ErrorCode;
    error_message: string;
}

export type CompletedStatus = 'COMPLETED_SUCCESS' | 'COMPLETED_FAILURE';
export type ErrorStatus = 'VALIDATION_ERROR' | 'SYNTHESIS_FAILED' | 'EXECUTION_ERROR' | 'INTERNAL_ERROR';
export type OverallStatus = CompletedStatus | ErrorStatus;

interface ResponseStamp {
    request_id: string;
    timestamp_processed_utc: string;
}

/**
 * Exactly one of execution_details / error_details is present,
 * keyed by overall_status.
 */
export type GatewayResponse = Readonly<
    | (ResponseStamp & { overall_status: CompletedStatus; execution_details: ExecutionDetails; error_details?: never })
    | (ResponseStamp & { overall_status: ErrorStatus; error_details: ErrorDetails; execution_details?: never })
>;

// ----------------------------------------
// Completion backend
// ----------------------------------------
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

export interface BackendCallResult {
    answer: string;
    model?: string;
}

export interface LLMBackend {
    name: string;
    call(messages: ChatMessage[], options: CompletionOptions): Promise<BackendCallResult>;
}
