import { AchievementService } from "./achievements";
import type { AppConfig } from "./config";
import { PointLedger, type LedgerOptions } from "./ledger";
import { RewardService } from "./rewards";
import type { KeyValueStore } from "./storage/store";

export type Core = {
    ledger: PointLedger;
    achievements: AchievementService;
    rewards: RewardService;
};

export function buildCore(store: KeyValueStore, options: LedgerOptions = {}): Core {
    const ledger = new PointLedger(store, options);
    return {
        ledger,
        achievements: new AchievementService(store, ledger, {
            ...options.retry,
            random: options.random,
            sleep: options.sleep,
        }),
        rewards: new RewardService(store, ledger),
    };
}

export function ledgerOptionsFrom(config: Pick<AppConfig, "retry" | "appliedWindow">): LedgerOptions {
    return { retry: config.retry, appliedWindow: config.appliedWindow };
}
