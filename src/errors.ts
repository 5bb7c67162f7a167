// ========================================
// Docker Command Gateway - Error Types
// ========================================

/** Invalid or incomplete startup configuration. Fatal. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class UnknownServiceError extends Error {
    readonly logicalName: string;

    constructor(logicalName: string) {
        super(`Unknown logical service name: ${logicalName}`);
        this.name = 'UnknownServiceError';
        this.logicalName = logicalName;
    }
}

/** Transport failure, timeout or malformed reply from the completion backend. */
export class CompletionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CompletionError';
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
