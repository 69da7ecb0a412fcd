import { AlreadyExistsError, ValidationError } from "./errors";
import { DEFAULT_APPLIED_WINDOW, findApplied, rememberApplied } from "./idempotency";
import { logger } from "./logger";
import { ensureActive, withConflictRetry, type ConflictRetryOptions, type RetryPolicy } from "./retry";
import { Collection, type Versioned } from "./storage/collection";
import { balanceKey } from "./storage/keys";
import type { KeyValueStore } from "./storage/store";
import { nowIso } from "./time";
import {
    PointBalanceSchema,
    type AppliedOperation,
    type BalanceView,
    type DebitResult,
    type LedgerReceipt,
    type OperationOptions,
    type PointBalance,
} from "./types";

export type LedgerOptions = {
    retry?: Partial<RetryPolicy>;
    appliedWindow?: number;
    /** Test seams for the backoff between conflicting attempts. */
    random?: () => number;
    sleep?: (ms: number) => Promise<void>;
};

export function assertId(field: string, value: string) {
    if (typeof value !== "string" || value.trim() === "") throw new ValidationError(field, "must be a non-empty string");
}

export function assertPoints(field: string, value: number) {
    if (!Number.isSafeInteger(value) || value <= 0) throw new ValidationError(field, "must be a positive integer");
}

/**
 * Owns every mutation of a user's point balance. Each credit or debit is a
 * read, a pure compute step and a version-checked write; a lost race re-reads
 * and tries again. Applied idempotency keys live on the balance record itself,
 * so the replay check and the balance change land in the same write.
 */
export class PointLedger {
    private readonly balances: Collection<PointBalance>;
    private readonly log = logger.child({ component: "ledger" });

    constructor(store: KeyValueStore, private readonly options: LedgerOptions = {}) {
        this.balances = new Collection(store, "balance", PointBalanceSchema);
    }

    async getBalance(userId: string): Promise<BalanceView> {
        assertId("userId", userId);
        const current = await this.balances.get(balanceKey(userId));
        if (!current) return { userId, balance: 0, version: 0 };
        return {
            userId,
            balance: current.value.balance,
            version: current.version,
            updatedAt: current.value.updatedAt,
        };
    }

    async credit(userId: string, amount: number, idempotencyKey: string, opts: OperationOptions = {}): Promise<LedgerReceipt> {
        assertId("userId", userId);
        assertId("idempotencyKey", idempotencyKey);
        assertPoints("amount", amount);

        return withConflictRetry("ledger.credit", async () => {
            const current = await this.readOrCreate(userId, opts.signal);

            const prior = findApplied(current.value.applied, idempotencyKey, "credit");
            if (prior) {
                this.log.debug("Credit replay", { userId, idempotencyKey });
                return receipt(userId, current.value.balance, prior, true);
            }

            const op = this.operation(idempotencyKey, "credit", amount, current.value.balance + amount);
            await this.write(current, op, opts.signal);
            this.log.info("Credit applied", { userId, amount, balanceAfter: op.balanceAfter, idempotencyKey });
            return receipt(userId, op.balanceAfter, op, false);
        }, this.retryOptions(opts.signal));
    }

    async debit(userId: string, amount: number, idempotencyKey: string, opts: OperationOptions = {}): Promise<DebitResult> {
        assertId("userId", userId);
        assertId("idempotencyKey", idempotencyKey);
        assertPoints("amount", amount);

        return withConflictRetry<DebitResult>("ledger.debit", async () => {
            ensureActive(opts.signal, "ledger.debit");
            const current = await this.balances.get(balanceKey(userId));

            const prior = current ? findApplied(current.value.applied, idempotencyKey, "debit") : undefined;
            if (prior) {
                this.log.debug("Debit replay", { userId, idempotencyKey });
                return { ok: true, ...receipt(userId, prior.balanceAfter, prior, true) };
            }

            const balance = current?.value.balance ?? 0;
            if (!current || balance < amount) {
                this.log.info("Debit rejected: insufficient balance", { userId, balance, amount });
                return { ok: false, reason: "insufficient_balance", userId, balance, required: amount };
            }

            const op = this.operation(idempotencyKey, "debit", amount, balance - amount);
            await this.write(current, op, opts.signal);
            this.log.info("Debit applied", { userId, amount, balanceAfter: op.balanceAfter, idempotencyKey });
            return { ok: true, ...receipt(userId, op.balanceAfter, op, false) };
        }, this.retryOptions(opts.signal));
    }

    /** The operation recorded under this key, while it is still inside the applied window. */
    async findApplied(userId: string, idempotencyKey: string, kind: AppliedOperation["kind"]): Promise<AppliedOperation | undefined> {
        assertId("userId", userId);
        assertId("idempotencyKey", idempotencyKey);
        const current = await this.balances.get(balanceKey(userId));
        return current ? findApplied(current.value.applied, idempotencyKey, kind) : undefined;
    }

    private async readOrCreate(userId: string, signal: AbortSignal | undefined): Promise<Versioned<PointBalance>> {
        const key = balanceKey(userId);
        const existing = await this.balances.get(key);
        if (existing) return existing;

        ensureActive(signal, "ledger.credit");
        try {
            return await this.balances.create(key, { userId, balance: 0, applied: [], updatedAt: nowIso() });
        } catch (e) {
            if (!(e instanceof AlreadyExistsError)) throw e;
        }
        // Another writer created it first.
        ensureActive(signal, "ledger.credit");
        const raced = await this.balances.get(key);
        if (!raced) throw new Error(`Balance for ${userId} reported existing but could not be read`);
        return raced;
    }

    private operation(key: string, kind: AppliedOperation["kind"], amount: number, balanceAfter: number): AppliedOperation {
        return { key, kind, amount, balanceAfter, appliedAt: nowIso() };
    }

    private async write(current: Versioned<PointBalance>, op: AppliedOperation, signal: AbortSignal | undefined) {
        ensureActive(signal, `ledger.${op.kind}`);
        const next: PointBalance = {
            ...current.value,
            balance: op.balanceAfter,
            applied: rememberApplied(current.value.applied, op, this.options.appliedWindow ?? DEFAULT_APPLIED_WINDOW),
            updatedAt: op.appliedAt,
        };
        await this.balances.update(current.key, next, current.version);
    }

    private retryOptions(signal: AbortSignal | undefined): ConflictRetryOptions {
        return { ...this.options.retry, signal, random: this.options.random, sleep: this.options.sleep };
    }
}

function receipt(userId: string, balance: number, op: AppliedOperation, replayed: boolean): LedgerReceipt {
    return { userId, balance, amount: op.amount, idempotencyKey: op.key, replayed };
}
