import type { ItemKey } from "./storage/store";

export class PointsError extends Error {
    public readonly code: string;
    /** True when the caller may retry the whole request. */
    public readonly retryable: boolean;

    constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.retryable = retryable;
        this.name = this.constructor.name;
    }
}

export class ValidationError extends PointsError {
    constructor(public readonly field: string, reason: string) {
        super(`Invalid ${field}: ${reason}`, "VALIDATION_ERROR", false);
    }
}

export class AlreadyExistsError extends PointsError {
    constructor(public readonly key: ItemKey) {
        super(`Item ${key.partition}/${key.sort} already exists`, "ALREADY_EXISTS", false);
    }
}

export class VersionConflictError extends PointsError {
    constructor(
        public readonly key: ItemKey,
        public readonly expectedVersion: number,
        public readonly actualVersion: number | undefined
    ) {
        super(
            `Version conflict on ${key.partition}/${key.sort}: expected ${expectedVersion}, found ${actualVersion ?? "none"}`,
            "VERSION_CONFLICT",
            true
        );
    }
}

export class RetryExhaustedError extends PointsError {
    constructor(public readonly operation: string, public readonly attempts: number) {
        super(`${operation} gave up after ${attempts} conflicting attempts`, "RETRY_EXHAUSTED", true);
    }
}

export class StoreUnavailableError extends PointsError {
    constructor(operation: string, cause?: unknown) {
        const detail = cause instanceof Error ? `: ${cause.message}` : "";
        super(`Store unavailable during ${operation}${detail}`, "STORE_UNAVAILABLE", true, { cause });
    }
}

export class OperationCancelledError extends PointsError {
    constructor(operation: string) {
        super(`${operation} cancelled`, "CANCELLED", false);
    }
}

export class InvalidRecordError extends PointsError {
    constructor(family: string, key: ItemKey, reason: string) {
        super(`Stored ${family} ${key.partition}/${key.sort} is malformed: ${reason}`, "INVALID_RECORD", false);
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
