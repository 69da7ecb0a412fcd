import { ValidationError } from "./errors";
import type { AppliedOperation } from "./types";

export const DEFAULT_APPLIED_WINDOW = 256;

/**
 * Finds an operation already folded into the balance under this key. A key
 * recorded by the other kind of operation is a caller error, not a replay.
 */
export function findApplied(
    applied: readonly AppliedOperation[],
    key: string,
    kind: AppliedOperation["kind"]
): AppliedOperation | undefined {
    const op = applied.find((o) => o.key === key);
    if (op && op.kind !== kind) throw new ValidationError("idempotencyKey", `${key} was already used for a ${op.kind}`);
    return op;
}

/**
 * Appends an operation to the bounded recent-operations window, evicting the
 * oldest entries past the limit. A key evicted here is no longer recognised as
 * a replay, so the window must outlive any realistic retry horizon.
 */
export function rememberApplied(
    applied: readonly AppliedOperation[],
    op: AppliedOperation,
    limit: number = DEFAULT_APPLIED_WINDOW
): AppliedOperation[] {
    const next = [...applied, op];
    return next.length > limit ? next.slice(next.length - limit) : next;
}

export function achievementIdempotencyKey(userId: string, achievementId: string): string {
    return `achievement:${userId}:${achievementId}`;
}

export function redemptionIdempotencyKey(requestId: string): string {
    return `redemption:${requestId}`;
}
