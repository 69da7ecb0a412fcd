import type { ItemKey } from "./store";

export const balanceKey = (userId: string): ItemKey => ({ partition: `balance#${userId}`, sort: "current" });

export const achievementPartition = (userId: string) => `achievements#${userId}`;
export const achievementKey = (userId: string, achievementId: string): ItemKey => ({
    partition: achievementPartition(userId),
    sort: achievementId,
});

export const redemptionPartition = (userId: string) => `redemptions#${userId}`;
export const redemptionKey = (userId: string, requestId: string): ItemKey => ({
    partition: redemptionPartition(userId),
    sort: requestId,
});

export const REWARD_PARTITION = "rewards";
export const rewardKey = (rewardId: string): ItemKey => ({ partition: REWARD_PARTITION, sort: rewardId });
