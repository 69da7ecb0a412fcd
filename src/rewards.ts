import { AlreadyExistsError, ValidationError } from "./errors";
import { redemptionIdempotencyKey } from "./idempotency";
import { PointLedger, assertId } from "./ledger";
import { logger } from "./logger";
import { Collection } from "./storage/collection";
import { REWARD_PARTITION, redemptionKey, redemptionPartition, rewardKey } from "./storage/keys";
import type { KeyValueStore } from "./storage/store";
import { nowIso } from "./time";
import {
    RedemptionRecordSchema,
    RewardCatalogEntrySchema,
    type OperationOptions,
    type RedeemResult,
    type RedemptionRecord,
    type RewardCatalogEntry,
} from "./types";

export class RewardService {
    private readonly catalog: Collection<RewardCatalogEntry>;
    private readonly redemptions: Collection<RedemptionRecord>;
    private readonly log = logger.child({ component: "rewards" });

    constructor(store: KeyValueStore, private readonly ledger: PointLedger) {
        this.catalog = new Collection(store, "reward", RewardCatalogEntrySchema);
        this.redemptions = new Collection(store, "redemption", RedemptionRecordSchema);
    }

    async getReward(rewardId: string): Promise<RewardCatalogEntry | undefined> {
        assertId("rewardId", rewardId);
        return (await this.catalog.get(rewardKey(rewardId)))?.value;
    }

    async listRewards(): Promise<RewardCatalogEntry[]> {
        return (await this.catalog.list(REWARD_PARTITION)).map((r) => r.value);
    }

    /**
     * Spends points on a catalog reward. `requestId` identifies the caller's
     * attempt: retrying with the same id never debits twice and returns the
     * redemption recorded the first time.
     */
    async redeem(userId: string, rewardId: string, requestId: string, opts: OperationOptions = {}): Promise<RedeemResult> {
        assertId("userId", userId);
        assertId("rewardId", rewardId);
        assertId("requestId", requestId);
        const key = redemptionKey(userId, requestId);

        const recorded = await this.redemptions.get(key);
        if (recorded) return this.replay(recorded.value, rewardId);

        const debitKey = redemptionIdempotencyKey(requestId);
        const entry = await this.getReward(rewardId);

        // An earlier attempt may have debited and then failed to write its record.
        // Those points are spent, so the record is finished whatever the catalog says now.
        const settled = await this.ledger.findApplied(userId, debitKey, "debit");
        if (settled) {
            this.log.warn("Redeem resuming after an earlier debit", { userId, rewardId, requestId });
            const title = entry?.title ?? rewardId;
            return this.record(userId, requestId, rewardId, title, settled.amount, settled.balanceAfter, true);
        }

        if (!entry) {
            this.log.info("Redeem rejected: unknown reward", { userId, rewardId, requestId });
            return { ok: false, reason: "reward_not_found", rewardId };
        }
        if (entry.stock === 0) {
            this.log.info("Redeem rejected: out of stock", { userId, rewardId, requestId });
            return { ok: false, reason: "out_of_stock", rewardId };
        }

        const debit = await this.ledger.debit(userId, entry.cost, debitKey, opts);
        if (!debit.ok) {
            return { ok: false, reason: "insufficient_balance", rewardId, balance: debit.balance, required: debit.required };
        }
        // the amount the ledger actually moved, which on replay is the first attempt's
        return this.record(userId, requestId, rewardId, entry.title, debit.amount, debit.balance, debit.replayed);
    }

    async listRedemptionHistory(userId: string): Promise<RedemptionRecord[]> {
        assertId("userId", userId);
        const rows = (await this.redemptions.list(redemptionPartition(userId))).map((r) => r.value);
        return rows.sort((a, b) => a.redeemedAt.localeCompare(b.redeemedAt) || a.requestId.localeCompare(b.requestId));
    }

    private async record(
        userId: string,
        requestId: string,
        rewardId: string,
        rewardTitle: string,
        pointsSpent: number,
        balanceAfter: number,
        replayed: boolean
    ): Promise<RedeemResult> {
        const key = redemptionKey(userId, requestId);
        const redemption: RedemptionRecord = {
            userId,
            requestId,
            rewardId,
            rewardTitle,
            pointsSpent,
            balanceAfter,
            redeemedAt: nowIso(),
        };
        try {
            await this.redemptions.create(key, redemption);
        } catch (e) {
            if (!(e instanceof AlreadyExistsError)) throw e;
            const existing = await this.redemptions.get(key);
            if (!existing) throw new Error(`Redemption ${requestId} for ${userId} reported existing but could not be read`);
            return this.replay(existing.value, rewardId);
        }

        this.log.info("Reward redeemed", { userId, rewardId, requestId, cost: pointsSpent, balanceAfter });
        return { ok: true, redemption, balance: balanceAfter, replayed };
    }

    private replay(redemption: RedemptionRecord, rewardId: string): RedeemResult {
        if (redemption.rewardId !== rewardId) {
            throw new ValidationError("requestId", `already used to redeem ${redemption.rewardId}`);
        }
        this.log.debug("Redeem replay", { userId: redemption.userId, requestId: redemption.requestId });
        return { ok: true, redemption, balance: redemption.balanceAfter, replayed: true };
    }
}

/** Loads externally managed catalog entries into the store, overwriting existing ones. */
export async function seedCatalog(store: KeyValueStore, entries: unknown[]): Promise<RewardCatalogEntry[]> {
    const catalog = new Collection(store, "reward", RewardCatalogEntrySchema);
    const seeded: RewardCatalogEntry[] = [];
    for (const [i, raw] of entries.entries()) {
        const parsed = RewardCatalogEntrySchema.safeParse(raw);
        if (!parsed.success) {
            throw new ValidationError(`catalog[${i}]`, parsed.error.issues[0]?.message ?? "malformed entry");
        }
        await catalog.put(rewardKey(parsed.data.rewardId), parsed.data);
        seeded.push(parsed.data);
    }
    logger.info("Reward catalog seeded", { count: seeded.length });
    return seeded;
}
