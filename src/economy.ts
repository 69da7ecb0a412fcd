import type { Core } from "./core";

export type PointsSummary = {
    userId: string;
    balance: number;
    creditedAchievements: number;
    pendingAchievements: number;
    totalCredited: number;
    redemptions: number;
    totalRedeemed: number;
    /** Zero whenever credited points minus redeemed points equals the balance. */
    difference: number;
};

// Three independent reads, so only meaningful when nothing for the user is in flight.
export async function summarizePoints(core: Core, userId: string): Promise<PointsSummary> {
    const [view, achievements, history] = await Promise.all([
        core.ledger.getBalance(userId),
        core.achievements.listAchievements(userId),
        core.rewards.listRedemptionHistory(userId),
    ]);

    const credited = achievements.filter((a) => a.status === "credited");
    const totalCredited = credited.reduce((sum, a) => sum + a.points, 0);
    const totalRedeemed = history.reduce((sum, r) => sum + r.pointsSpent, 0);

    return {
        userId,
        balance: view.balance,
        creditedAchievements: credited.length,
        pendingAchievements: achievements.length - credited.length,
        totalCredited,
        redemptions: history.length,
        totalRedeemed,
        difference: totalCredited - totalRedeemed - view.balance,
    };
}
