import { App, LogLevel } from "@slack/bolt";
import type { AppConfig } from "./config";
import {
    awardCommand,
    pointsCommand,
    reconcileCommand,
    redeemCommand,
    redemptionsCommand,
    rewardsCommand,
    type CommandContext,
    type CommandEnv,
} from "./commands";
import { errorMessage } from "./errors";
import { logger } from "./logger";

type Handler = (env: CommandEnv, ctx: CommandContext) => Promise<string>;

export const COMMANDS: Record<string, Handler> = {
    "/points": pointsCommand,
    "/rewards": (env) => rewardsCommand(env),
    "/redeem": redeemCommand,
    "/redemptions": redemptionsCommand,
    "/award": awardCommand,
    "/reconcile": reconcileCommand,
};

export function buildSlackApp(config: AppConfig, env: CommandEnv) {
    const app = new App({
        token: config.slack.botToken,
        socketMode: true,
        appToken: config.slack.appToken,
        signingSecret: config.slack.signingSecret,
        logLevel: LogLevel.WARN,
    });

    for (const [name, handler] of Object.entries(COMMANDS)) {
        app.command(name, async ({ ack, respond, command }) => {
            await ack();
            const ctx: CommandContext = { userId: command.user_id, text: command.text, triggerId: command.trigger_id };
            try {
                const text = await handler(env, ctx);
                await respond({ response_type: "ephemeral", text });
            } catch (e) {
                logger.error("Command failed", { command: name, userId: ctx.userId, error: errorMessage(e) });
                await respond({ response_type: "ephemeral", text: "Something went wrong. Please try again." });
            }
        });
    }

    return app;
}

export async function startSlackApp(app: App, port: number) {
    await app.start({ port });
    logger.info("Slack app running (socket mode)", { port });
}
