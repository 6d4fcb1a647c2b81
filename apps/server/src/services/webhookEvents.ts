import type { AccountDirectory, BotHandle } from "../types/bot";
import {
  APPLICATION_AUTHORIZED,
  APPLICATION_DEAUTHORIZED,
  PING_TYPE,
  webhookUserEventSchema,
  type ChannelType,
  type ExternalUser,
  type WebhookEvent
} from "../types/discord";
import type { Logger } from "../types/logger";
import type { WelcomeDispatcher } from "./welcomeDispatcher";
import type { WelcomeStateStore } from "./welcomeState";

export type DecodeResult =
  | { kind: "ping" }
  | { kind: "event"; event: WebhookEvent }
  | { kind: "bad_request"; reason: string };

export type WebhookEventHandler = (event: WebhookEvent) => Promise<boolean>;

export function decodeWebhookBody(rawBody: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    return { kind: "bad_request", reason: "invalid JSON" };
  }

  if (!isRecord(parsed)) {
    return { kind: "bad_request", reason: "payload is not a JSON object" };
  }

  const numericType = typeof parsed.type === "number" ? parsed.type : null;
  if (numericType === PING_TYPE) {
    return { kind: "ping" };
  }

  const envelope: Record<string, unknown> = isRecord(parsed.event) ? parsed.event : {};
  const eventType = readString(envelope.type) ?? readString(parsed.event_type);

  if (!eventType) {
    return { kind: "bad_request", reason: "missing event.type" };
  }

  return {
    kind: "event",
    event: {
      numericType,
      eventType: eventType.toUpperCase(),
      payload: parsed
    }
  };
}

export function extractExternalUser(
  event: WebhookEvent,
  channelType: ChannelType
): ExternalUser | null {
  const parsed = webhookUserEventSchema.safeParse(event.payload);
  if (!parsed.success || !parsed.data.event.data.user.id) {
    return null;
  }

  const user = parsed.data.event.data.user;
  return {
    externalId: user.id,
    displayName: user.global_name ?? user.username ?? "",
    channelType
  };
}

/** Routes decoded events by type. Unknown types are acknowledged. */
export class WebhookEventRouter {
  private readonly handlers = new Map<string, WebhookEventHandler>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  register(eventType: string, handler: WebhookEventHandler): this {
    this.handlers.set(eventType.toUpperCase(), handler);
    return this;
  }

  async route(event: WebhookEvent): Promise<boolean> {
    const handler = this.handlers.get(event.eventType);
    if (!handler) {
      this.logger.debug({ eventType: event.eventType }, "Unhandled webhook event type acknowledged");
      return true;
    }

    return handler(event);
  }
}

type WelcomeRouterDeps = {
  logger: Logger;
  store: WelcomeStateStore;
  dispatcher: WelcomeDispatcher;
  bot: BotHandle | null;
  accounts?: AccountDirectory;
  channelType?: ChannelType;
};

export function createWelcomeEventRouter(deps: WelcomeRouterDeps): WebhookEventRouter {
  const channelType = deps.channelType ?? "discord";
  const router = new WebhookEventRouter(deps.logger);

  router.register(APPLICATION_AUTHORIZED, async (event) => {
    const user = extractExternalUser(event, channelType);
    if (!user) {
      deps.logger.warn({ eventType: event.eventType }, "Authorization event is missing a user id");
      return false;
    }

    deps.logger.info(
      { externalId: user.externalId, displayName: user.displayName },
      "User authorized app"
    );

    if (deps.accounts) {
      const accountId = await deps.accounts.findLinkedAccount(user.externalId, channelType);
      if (accountId) {
        deps.logger.debug({ externalId: user.externalId, accountId }, "User already has a linked account");
        return true;
      }
    }

    if (await deps.store.has(channelType, user.externalId)) {
      deps.logger.debug({ externalId: user.externalId }, "User already welcomed");
      return true;
    }

    return deps.dispatcher.dispatch(user, deps.bot);
  });

  router.register(APPLICATION_DEAUTHORIZED, async (event) => {
    const user = extractExternalUser(event, channelType);
    if (!user) {
      // Nothing to clear; acknowledge so the sender stops redelivering.
      deps.logger.warn({ eventType: event.eventType }, "Deauthorization event is missing a user id");
      return true;
    }

    deps.logger.info(
      { externalId: user.externalId, displayName: user.displayName },
      "User deauthorized app"
    );
    return deps.store.clear(channelType, user.externalId);
  });

  return router;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}
