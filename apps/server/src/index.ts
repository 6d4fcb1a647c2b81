import Fastify from "fastify";
import { parseEnv } from "./config/env";
import { registerWebhookRoutes } from "./routes/webhook";
import { DiscordRestBot } from "./services/discord";
import { createWelcomeEventRouter } from "./services/webhookEvents";
import { WelcomeDispatcher } from "./services/welcomeDispatcher";
import { FileWelcomeStateStore } from "./services/welcomeState";
import { createRequestVerifier } from "./utils/verifySignature";

async function bootstrap(): Promise<void> {
  const env = parseEnv(process.env);
  const app = Fastify({ logger: { level: env.logLevel } });

  const store = new FileWelcomeStateStore({
    filePath: env.welcomeStatePath,
    logger: app.log
  });

  const bot = env.discordBotToken
    ? new DiscordRestBot({
        token: env.discordBotToken,
        apiBaseUrl: env.discordApiBaseUrl,
        logger: app.log.child({ component: "bot" })
      })
    : null;

  if (!bot) {
    app.log.warn("DISCORD_BOT_TOKEN is not set; welcome DMs will be skipped");
  }

  const dispatcher = new WelcomeDispatcher({
    store,
    logger: app.log,
    settleDelayMs: env.welcomeSettleDelayMs
  });

  registerWebhookRoutes(app, {
    logger: app.log,
    verify: createRequestVerifier(env.discordPublicKey, app.log),
    router: createWelcomeEventRouter({
      logger: app.log,
      store,
      dispatcher,
      bot
    })
  });

  app.addHook("onClose", async () => {
    await bot?.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down webhook server");
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ error }, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: env.port, host: env.host });
  app.log.info({ port: env.port }, "Webhook server started");
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
