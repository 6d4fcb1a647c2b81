import { DispatchTicket } from "../runtime/dispatchTicket";
import type { BotHandle } from "../types/bot";
import type { ExternalUser } from "../types/discord";
import type { Logger } from "../types/logger";
import { isCannotMessageError } from "./discord";
import { buildWelcomeComponents, buildWelcomeMessage } from "./welcomeMessage";
import { type WelcomeStateStore, welcomeKey } from "./welcomeState";

export type WelcomeDeliveryResult = "sent" | "blocked" | "failed";

type WelcomeDispatcherDeps = {
  store: WelcomeStateStore;
  logger: Logger;
  settleDelayMs: number;
  buildMessage?: (user: ExternalUser) => string;
};

/**
 * Hands welcome DMs from the webhook request path to the bot loop.
 *
 * `dispatch` resolves to true once the work is queued on the loop. It never
 * waits for the DM itself; the queued work records its own outcome. At most
 * one delivery per user is queued or running at a time.
 */
export class WelcomeDispatcher {
  private readonly store: WelcomeStateStore;
  private readonly logger: Logger;
  private readonly settleDelayMs: number;
  private readonly buildMessage: (user: ExternalUser) => string;
  private readonly inFlight = new Set<string>();

  constructor(deps: WelcomeDispatcherDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.settleDelayMs = deps.settleDelayMs;
    this.buildMessage =
      deps.buildMessage ??
      ((user) => buildWelcomeMessage(user.displayName, { isAuthorization: true }));
  }

  async dispatch(user: ExternalUser, bot: BotHandle | null): Promise<boolean> {
    if (!bot) {
      return this.suppressRetries(user, "bot handle not available");
    }

    const loop = bot.loop;
    if (!loop) {
      return this.suppressRetries(user, "bot event loop not available");
    }
    if (loop.isClosed()) {
      return this.suppressRetries(user, "bot event loop is closed");
    }

    const key = welcomeKey(user.channelType, user.externalId);
    if (this.inFlight.has(key)) {
      this.logger.debug({ externalId: user.externalId }, "Welcome DM already in flight");
      return true;
    }

    const ticket = new DispatchTicket(() => this.deliver(user, bot, key));
    this.inFlight.add(key);
    try {
      const handle = ticket.submitTo(loop);
      this.logger.info(
        { externalId: user.externalId, taskId: handle.id },
        "Scheduled welcome DM"
      );
      return true;
    } catch (error) {
      this.inFlight.delete(key);
      this.logger.error({ error, externalId: user.externalId }, "Failed to schedule welcome DM");
      return this.suppressRetries(user, "submission to bot event loop failed");
    } finally {
      ticket.dispose();
    }
  }

  /**
   * No-retry policy for infrastructure failures: mark the user welcomed so
   * webhook redeliveries stop here. The in-conversation welcome still covers
   * the user.
   */
  private async suppressRetries(user: ExternalUser, reason: string): Promise<false> {
    this.logger.warn(
      { externalId: user.externalId, channelType: user.channelType, reason },
      "Welcome DM skipped; marking user as welcomed to stop retries"
    );
    await this.store.mark(user.channelType, user.externalId);
    return false;
  }

  private async deliver(
    user: ExternalUser,
    bot: BotHandle,
    key: string
  ): Promise<WelcomeDeliveryResult> {
    try {
      return await this.attemptDelivery(user, bot);
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async attemptDelivery(user: ExternalUser, bot: BotHandle): Promise<WelcomeDeliveryResult> {
    await delay(this.settleDelayMs);

    try {
      const text = this.buildMessage(user);
      const components = buildWelcomeComponents(user.externalId);
      const handle = await bot.fetchUser(user.externalId);

      if (!handle) {
        this.logger.error({ externalId: user.externalId }, "Welcome DM target user not found");
        return "failed";
      }

      await handle.send(text, components);
    } catch (error) {
      if (isCannotMessageError(error)) {
        this.logger.warn(
          { externalId: user.externalId, error },
          "Cannot DM user yet (privacy settings or no shared context); leaving welcome to the in-conversation path"
        );
        return "blocked";
      }

      this.logger.error({ externalId: user.externalId, error }, "Welcome DM failed");
      return "failed";
    }

    await this.store.mark(user.channelType, user.externalId);
    this.logger.info({ externalId: user.externalId }, "Sent welcome DM to newly authorized user");
    return "sent";
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
