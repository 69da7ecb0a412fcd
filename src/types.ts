import { z } from "zod";

const isoDate = z.string().min(1);
const points = z.number().int().nonnegative();

export const AppliedOperationSchema = z.object({
    key: z.string().min(1),
    kind: z.enum(["credit", "debit"]),
    amount: points,
    balanceAfter: points,
    appliedAt: isoDate,
});

export const PointBalanceSchema = z.object({
    userId: z.string().min(1),
    balance: points,
    applied: z.array(AppliedOperationSchema),
    updatedAt: isoDate,
});

const AchievementStatusSchema = z.enum(["pending", "credited"]);

export const AchievementRecordSchema = z.object({
    userId: z.string().min(1),
    achievementId: z.string().min(1),
    points: z.number().int().positive(),
    status: AchievementStatusSchema,
    idempotencyKey: z.string().min(1),
    createdAt: isoDate,
    updatedAt: isoDate,
    creditedAt: isoDate.optional(),
});

export const RewardCatalogEntrySchema = z.object({
    rewardId: z.string().min(1),
    title: z.string().min(1),
    description: z.string().optional(),
    cost: z.number().int().positive(),
    stock: z.number().int().nonnegative().optional(),
});

export const RedemptionRecordSchema = z.object({
    userId: z.string().min(1),
    requestId: z.string().min(1),
    rewardId: z.string().min(1),
    rewardTitle: z.string(),
    pointsSpent: z.number().int().positive(),
    balanceAfter: points,
    redeemedAt: isoDate,
});

export type AppliedOperation = z.infer<typeof AppliedOperationSchema>;
export type PointBalance = z.infer<typeof PointBalanceSchema>;
export type AchievementRecord = z.infer<typeof AchievementRecordSchema>;
export type RewardCatalogEntry = z.infer<typeof RewardCatalogEntrySchema>;
export type RedemptionRecord = z.infer<typeof RedemptionRecordSchema>;

export type BalanceView = {
    userId: string;
    balance: number;
    /** 0 when the user has never been credited. */
    version: number;
    updatedAt?: string;
};

export type LedgerReceipt = {
    userId: string;
    balance: number;
    /** Amount the operation moved; on replay, the amount recorded the first time. */
    amount: number;
    idempotencyKey: string;
    replayed: boolean;
};

export type DebitResult =
    | ({ ok: true } & LedgerReceipt)
    | { ok: false; reason: "insufficient_balance"; userId: string; balance: number; required: number };

export type CompletionResult = {
    outcome: "credited" | "already_completed";
    achievement: AchievementRecord;
    balance: number;
};

export type RedeemFailureReason = "reward_not_found" | "out_of_stock" | "insufficient_balance";

export type RedeemResult =
    | { ok: true; redemption: RedemptionRecord; balance: number; replayed: boolean }
    | { ok: false; reason: RedeemFailureReason; rewardId: string; balance?: number; required?: number };

export type OperationOptions = {
    signal?: AbortSignal;
};
