import { describe, it, expect, beforeEach } from "vitest";
import { RetryExhaustedError, StoreUnavailableError, ValidationError } from "../errors";
import { summarizePoints } from "../economy";
import { redemptionIdempotencyKey } from "../idempotency";
import { seedCatalog } from "../rewards";
import { balanceKey } from "../storage/keys";
import { MemoryStore } from "../storage/memoryStore";
import { PointBalanceSchema } from "../types";
import { makeHarness, type Harness } from "./test-utils";

describe("RewardService", () => {
    let h: Harness;

    beforeEach(async () => {
        h = await makeHarness();
    });

    async function fund(userId: string, points: number, achievementId = "seed") {
        await h.achievements.completeAchievement(userId, achievementId, points);
    }

    it("lists the catalog in reward-id order", async () => {
        expect((await h.rewards.listRewards()).map((r) => r.rewardId)).toEqual(["coffee", "day-off", "hoodie"]);
        expect(await h.rewards.getReward("coffee")).toEqual({ rewardId: "coffee", title: "Coffee voucher", cost: 50 });
    });

    it("fails unknown rewards without touching the balance", async () => {
        await fund("u1", 100);

        const res = await h.rewards.redeem("u1", "yacht", "r1");
        expect(res).toEqual({ ok: false, reason: "reward_not_found", rewardId: "yacht" });
        expect((await h.ledger.getBalance("u1")).balance).toBe(100);
    });

    it("fails rewards whose stock is exhausted", async () => {
        await fund("u1", 300);

        const res = await h.rewards.redeem("u1", "hoodie", "r1");
        expect(res).toEqual({ ok: false, reason: "out_of_stock", rewardId: "hoodie" });
        expect((await h.ledger.getBalance("u1")).balance).toBe(300);
    });

    it("fails when the balance does not cover the cost", async () => {
        await fund("u1", 30);

        const res = await h.rewards.redeem("u1", "coffee", "r1");
        expect(res).toEqual({ ok: false, reason: "insufficient_balance", rewardId: "coffee", balance: 30, required: 50 });
        expect(await h.rewards.listRedemptionHistory("u1")).toEqual([]);
    });

    it("debits the cost and records the redemption", async () => {
        await fund("u1", 100);

        const res = await h.rewards.redeem("u1", "coffee", "r1");
        expect(res.ok).toBe(true);
        if (!res.ok) return;
        expect(res.balance).toBe(50);
        expect(res.replayed).toBe(false);
        expect(res.redemption).toMatchObject({
            userId: "u1",
            requestId: "r1",
            rewardId: "coffee",
            rewardTitle: "Coffee voucher",
            pointsSpent: 50,
            balanceAfter: 50,
        });
        expect(await h.rewards.listRedemptionHistory("u1")).toEqual([res.redemption]);
    });

    it("lets only one of two competing redemptions through", async () => {
        await fund("u1", 100);

        const [a, b] = await Promise.all([
            h.rewards.redeem("u1", "day-off", "req-a"),
            h.rewards.redeem("u1", "day-off", "req-b"),
        ]);

        const wins = [a, b].filter((r) => r.ok);
        const losses = [a, b].filter((r) => !r.ok);
        expect(wins).toHaveLength(1);
        expect(losses).toEqual([expect.objectContaining({ ok: false, reason: "insufficient_balance", balance: 20 })]);
        expect((await h.ledger.getBalance("u1")).balance).toBe(20);
        expect(await h.rewards.listRedemptionHistory("u1")).toHaveLength(1);
    });

    it("returns the recorded redemption when a request is retried", async () => {
        await fund("u1", 100);

        const first = await h.rewards.redeem("u1", "coffee", "r1");
        const second = await h.rewards.redeem("u1", "coffee", "r1");

        expect(second.ok && first.ok).toBe(true);
        if (!first.ok || !second.ok) return;
        expect(second.replayed).toBe(true);
        expect(second.redemption).toEqual(first.redemption);
        expect(second.balance).toBe(50);
        expect((await h.ledger.getBalance("u1")).balance).toBe(50);
        expect(await h.rewards.listRedemptionHistory("u1")).toHaveLength(1);
    });

    it("debits and records once for concurrent copies of one request", async () => {
        await fund("u1", 100);

        const results = await Promise.all(Array.from({ length: 5 }, () => h.rewards.redeem("u1", "coffee", "dup")));

        expect(results.every((r) => r.ok)).toBe(true);
        expect((await h.ledger.getBalance("u1")).balance).toBe(50);
        expect(await h.rewards.listRedemptionHistory("u1")).toHaveLength(1);

        const stored = PointBalanceSchema.parse((await h.backend.get(balanceKey("u1")))?.value);
        expect(stored.applied.filter((op) => op.key === redemptionIdempotencyKey("dup"))).toHaveLength(1);
    });

    it("records a redemption whose first attempt failed after the debit", async () => {
        await fund("u1", 100);
        h.store.failNext("conditionalPut", "unavailable");

        await expect(h.rewards.redeem("u1", "coffee", "r1")).rejects.toBeInstanceOf(StoreUnavailableError);
        expect((await h.ledger.getBalance("u1")).balance).toBe(50);
        expect(await h.rewards.listRedemptionHistory("u1")).toEqual([]);

        const retried = await h.rewards.redeem("u1", "coffee", "r1");
        expect(retried).toMatchObject({ ok: true, balance: 50, replayed: true });
        expect((await h.ledger.getBalance("u1")).balance).toBe(50);
        expect(await h.rewards.listRedemptionHistory("u1")).toHaveLength(1);
    });

    it("finishes a debited redemption even if the reward sold out before the retry", async () => {
        await fund("u1", 100);
        h.store.failNext("conditionalPut", "unavailable");
        await expect(h.rewards.redeem("u1", "day-off", "r1")).rejects.toBeInstanceOf(StoreUnavailableError);

        await seedCatalog(h.backend, [{ rewardId: "day-off", title: "Half day off", cost: 80, stock: 0 }]);
        const retried = await h.rewards.redeem("u1", "day-off", "r1");

        expect(retried).toMatchObject({
            ok: true,
            balance: 20,
            replayed: true,
            redemption: { rewardId: "day-off", rewardTitle: "Half day off", pointsSpent: 80, balanceAfter: 20 },
        });
        expect((await summarizePoints(h, "u1")).difference).toBe(0);
    });

    it("propagates RetryExhaustedError from the debit without recording anything", async () => {
        await fund("u1", 100);
        h.store.failNext("conditionalUpdate", "conflict", 5);

        await expect(h.rewards.redeem("u1", "coffee", "r1")).rejects.toBeInstanceOf(RetryExhaustedError);
        expect(await h.rewards.listRedemptionHistory("u1")).toEqual([]);
        expect((await h.ledger.getBalance("u1")).balance).toBe(100);
    });

    it("refuses to reuse a request id for a different reward", async () => {
        await fund("u1", 200);
        await h.rewards.redeem("u1", "coffee", "r1");

        await expect(h.rewards.redeem("u1", "day-off", "r1")).rejects.toBeInstanceOf(ValidationError);
        expect((await h.ledger.getBalance("u1")).balance).toBe(150);
    });

    it("conserves points across achievements and redemptions", async () => {
        await fund("u1", 100, "a1");
        await fund("u1", 40, "a2");
        await h.rewards.redeem("u1", "coffee", "r1");
        await h.rewards.redeem("u1", "day-off", "r2");
        const rejected = await h.rewards.redeem("u1", "coffee", "r3");
        expect(rejected.ok).toBe(false);

        expect(await summarizePoints(h, "u1")).toEqual({
            userId: "u1",
            balance: 10,
            creditedAchievements: 2,
            pendingAchievements: 0,
            totalCredited: 140,
            redemptions: 2,
            totalRedeemed: 130,
            difference: 0,
        });
    });
});

describe("seedCatalog", () => {
    it("rejects malformed entries", async () => {
        const store = new MemoryStore();
        await expect(seedCatalog(store, [{ rewardId: "x", title: "X", cost: -1 }])).rejects.toBeInstanceOf(ValidationError);
    });

    it("overwrites an existing entry", async () => {
        const store = new MemoryStore();
        await seedCatalog(store, [{ rewardId: "x", title: "X", cost: 10 }]);
        await seedCatalog(store, [{ rewardId: "x", title: "X", cost: 15 }]);

        expect(await store.get({ partition: "rewards", sort: "x" })).toMatchObject({ value: { cost: 15 }, version: 2 });
    });
});
