import { AlreadyExistsError } from "./errors";
import { achievementIdempotencyKey } from "./idempotency";
import { PointLedger, assertId, assertPoints } from "./ledger";
import { logger } from "./logger";
import { withConflictRetry, type ConflictRetryOptions } from "./retry";
import { Collection, type Versioned } from "./storage/collection";
import { achievementKey, achievementPartition } from "./storage/keys";
import type { KeyValueStore } from "./storage/store";
import { nowIso } from "./time";
import {
    AchievementRecordSchema,
    type AchievementRecord,
    type CompletionResult,
    type OperationOptions,
} from "./types";

/**
 * Records achievement completions and awards their points exactly once.
 *
 * A completion is two-phase: the record is created `pending`, the ledger is
 * credited under a key derived from (user, achievement), then the record is
 * flipped to `credited`. A crash between phases leaves a pending record that
 * any later attempt, or `resumePending`, drives forward; the derived key makes
 * the repeated credit a no-op if it already landed.
 */
export class AchievementService {
    private readonly records: Collection<AchievementRecord>;
    private readonly log = logger.child({ component: "achievements" });

    constructor(
        store: KeyValueStore,
        private readonly ledger: PointLedger,
        private readonly retry: Omit<ConflictRetryOptions, "signal"> = {}
    ) {
        this.records = new Collection(store, "achievement", AchievementRecordSchema);
    }

    async completeAchievement(
        userId: string,
        achievementId: string,
        pointsValue: number,
        opts: OperationOptions = {}
    ): Promise<CompletionResult> {
        assertId("userId", userId);
        assertId("achievementId", achievementId);
        assertPoints("pointsValue", pointsValue);

        const key = achievementKey(userId, achievementId);
        const now = nowIso();
        let record: Versioned<AchievementRecord>;
        try {
            record = await this.records.create(key, {
                userId,
                achievementId,
                points: pointsValue,
                status: "pending",
                idempotencyKey: achievementIdempotencyKey(userId, achievementId),
                createdAt: now,
                updatedAt: now,
            });
        } catch (e) {
            if (!(e instanceof AlreadyExistsError)) throw e;
            const existing = await this.records.get(key);
            if (!existing) throw new Error(`Achievement ${achievementId} for ${userId} reported existing but could not be read`);
            if (existing.value.status === "credited") {
                this.log.debug("Achievement already completed", { userId, achievementId });
                const { balance } = await this.ledger.getBalance(userId);
                return { outcome: "already_completed", achievement: existing.value, balance };
            }
            if (existing.value.points !== pointsValue) {
                this.log.warn("Pending achievement resumed with its recorded points", {
                    userId,
                    achievementId,
                    recorded: existing.value.points,
                    requested: pointsValue,
                });
            }
            record = existing;
        }

        return this.creditAndSettle(record, opts);
    }

    async getAchievement(userId: string, achievementId: string): Promise<AchievementRecord | undefined> {
        assertId("userId", userId);
        assertId("achievementId", achievementId);
        return (await this.records.get(achievementKey(userId, achievementId)))?.value;
    }

    async listAchievements(userId: string): Promise<AchievementRecord[]> {
        assertId("userId", userId);
        const rows = await this.records.list(achievementPartition(userId));
        return rows.map((r) => r.value);
    }

    /** Drives every pending completion of a user to `credited`. */
    async resumePending(userId: string, opts: OperationOptions = {}): Promise<CompletionResult[]> {
        assertId("userId", userId);
        const pending = (await this.records.list(achievementPartition(userId))).filter((r) => r.value.status === "pending");
        const out: CompletionResult[] = [];
        for (const record of pending) {
            out.push(await this.creditAndSettle(record, opts));
        }
        if (pending.length) this.log.info("Resumed pending achievements", { userId, count: pending.length });
        return out;
    }

    private async creditAndSettle(record: Versioned<AchievementRecord>, opts: OperationOptions): Promise<CompletionResult> {
        const { userId, achievementId, points, idempotencyKey } = record.value;
        const credit = await this.ledger.credit(userId, points, idempotencyKey, opts);
        const settled = await this.markCredited(record, opts);

        this.log.info("Achievement credited", { userId, achievementId, points, replayed: credit.replayed });
        return { outcome: "credited", achievement: settled, balance: credit.balance };
    }

    private async markCredited(record: Versioned<AchievementRecord>, opts: OperationOptions): Promise<AchievementRecord> {
        let current = record;
        return withConflictRetry("achievement.settle", async (attempt) => {
            if (attempt > 1) {
                const fresh = await this.records.get(record.key);
                if (!fresh) throw new Error(`Achievement ${record.key.sort} vanished while settling`);
                current = fresh;
            }
            // A concurrent identical completion got there first.
            if (current.value.status === "credited") return current.value;

            const now = nowIso();
            const next: AchievementRecord = { ...current.value, status: "credited", updatedAt: now, creditedAt: now };
            return (await this.records.update(current.key, next, current.version)).value;
        }, { ...this.retry, signal: opts.signal });
    }
}
