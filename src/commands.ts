import type { Core } from "./core";
import { summarizePoints } from "./economy";
import { errorMessage, PointsError } from "./errors";
import { logger } from "./logger";
import { formatForDisplay } from "./time";

export type CommandContext = {
    userId: string;
    text: string;
    /** Unique per slash-command invocation; doubles as the redemption request id. */
    triggerId: string;
};

export type CommandEnv = {
    core: Core;
    adminUserIds: readonly string[];
    displayTz: string;
};

function parseUserMention(text: string): string | null {
    const m = text.match(/<@([UW][A-Z0-9]+)(?:\|[^>]+)?>/i);
    return m ? m[1] : null;
}

function args(text: string): string[] {
    return (text || "").trim().split(/\s+/).filter(Boolean);
}

function isAdmin(env: CommandEnv, userId: string): boolean {
    return env.adminUserIds.includes(userId);
}

/** Maps transient and client errors to a reply; anything else propagates. */
function describeFailure(e: unknown): string {
    if (e instanceof PointsError) {
        return e.retryable ? "The points service is busy. Try again in a moment." : `Request rejected: ${e.message}`;
    }
    throw e;
}

export async function pointsCommand(env: CommandEnv, ctx: CommandContext): Promise<string> {
    const s = await summarizePoints(env.core, ctx.userId);
    const lines = [
        `You have *${s.balance}* points.`,
        `Achievements credited: ${s.creditedAchievements} (${s.totalCredited} pts)`,
        `Rewards redeemed: ${s.redemptions} (${s.totalRedeemed} pts)`,
    ];
    if (s.pendingAchievements) lines.push(`Pending achievements: ${s.pendingAchievements}`);
    return lines.join("\n");
}

export async function rewardsCommand(env: CommandEnv): Promise<string> {
    const rewards = await env.core.rewards.listRewards();
    if (!rewards.length) return "No rewards available.";
    const lines = rewards.map((r) => {
        const stock = r.stock === undefined ? "" : r.stock === 0 ? " (out of stock)" : ` (${r.stock} left)`;
        return `• \`${r.rewardId}\` ${r.title} — ${r.cost} pts${stock}`;
    });
    return "*Rewards:*\n" + lines.join("\n");
}

export async function redeemCommand(env: CommandEnv, ctx: CommandContext): Promise<string> {
    const [rewardId] = args(ctx.text);
    if (!rewardId) return "Usage: `/redeem <rewardId>`";

    try {
        const res = await env.core.rewards.redeem(ctx.userId, rewardId, ctx.triggerId);
        if (res.ok) {
            return `Redeemed *${res.redemption.rewardTitle}* for ${res.redemption.pointsSpent} pts. Balance: *${res.balance}*.`;
        }
        switch (res.reason) {
            case "reward_not_found":
                return `No reward called \`${rewardId}\`.`;
            case "out_of_stock":
                return `\`${rewardId}\` is out of stock.`;
            case "insufficient_balance":
                return `Not enough points: you have ${res.balance ?? 0}, need ${res.required ?? 0}.`;
        }
    } catch (e) {
        logger.warn("Redeem command failed", { userId: ctx.userId, rewardId, error: errorMessage(e) });
        return describeFailure(e);
    }
}

export async function redemptionsCommand(env: CommandEnv, ctx: CommandContext): Promise<string> {
    const history = await env.core.rewards.listRedemptionHistory(ctx.userId);
    if (!history.length) return "No redemptions yet.";
    const lines = history.map(
        (r) => `${formatForDisplay(r.redeemedAt, env.displayTz)} — ${r.rewardTitle} (${r.pointsSpent} pts)`
    );
    return "*Your redemptions:*\n" + lines.join("\n");
}

export async function awardCommand(env: CommandEnv, ctx: CommandContext): Promise<string> {
    if (!isAdmin(env, ctx.userId)) return "Only admins can award achievements.";

    const parts = args(ctx.text);
    const target = parts[0] ? parseUserMention(parts[0]) : null;
    const achievementId = parts[1];
    const points = Number(parts[2]);
    if (!target || !achievementId || !Number.isSafeInteger(points) || points <= 0) {
        return "Usage: `/award @user <achievementId> <points>`";
    }

    try {
        const res = await env.core.achievements.completeAchievement(target, achievementId, points);
        if (res.outcome === "already_completed") {
            return `<@${target}> already completed \`${achievementId}\`.`;
        }
        return `<@${target}> completed \`${achievementId}\` (+${res.achievement.points}). Balance: *${res.balance}*.`;
    } catch (e) {
        logger.warn("Award command failed", { target, achievementId, error: errorMessage(e) });
        return describeFailure(e);
    }
}

export async function reconcileCommand(env: CommandEnv, ctx: CommandContext): Promise<string> {
    if (!isAdmin(env, ctx.userId)) return "Only admins can reconcile.";
    const [first] = args(ctx.text);
    const target = first ? parseUserMention(first) : null;
    if (!target) return "Usage: `/reconcile @user`";

    const resumed = await env.core.achievements.resumePending(target);
    const s = await summarizePoints(env.core, target);
    const drift = s.difference === 0 ? "ledger balanced" : `drift of ${s.difference} pts`;
    return `Resumed ${resumed.length} pending achievement(s) for <@${target}>; ${drift}.`;
}
