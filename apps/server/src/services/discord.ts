import { BotEventLoop, type LoopHandle } from "../runtime/eventLoop";
import type { BotHandle, UserHandle } from "../types/bot";
import type { ActionRow } from "../types/discord";
import type { Logger } from "../types/logger";

/** Discord JSON error code for "Cannot send messages to this user". */
export const CANNOT_MESSAGE_USER = 50007;

export class DiscordApiError extends Error {
  readonly status: number;
  readonly code: number | null;

  constructor(status: number, code: number | null, message: string) {
    super(`Discord API error ${status}${code === null ? "" : ` (code ${code})`}: ${message}`);
    this.name = "DiscordApiError";
    this.status = status;
    this.code = code;
  }
}

export function isCannotMessageError(error: unknown): boolean {
  if (error instanceof DiscordApiError && error.code === CANNOT_MESSAGE_USER) {
    return true;
  }

  const message = error instanceof Error ? error.message : String(error);
  return message.includes(String(CANNOT_MESSAGE_USER)) || message.includes("Cannot send messages");
}

type DiscordRestBotOptions = {
  token: string;
  logger: Logger;
  loop?: BotEventLoop;
  apiBaseUrl?: string;
};

/**
 * Minimal REST-only bot handle: looks users up and opens DM channels.
 * All calls are meant to run on the bot's own loop.
 */
export class DiscordRestBot implements BotHandle {
  readonly loop: LoopHandle;
  private readonly eventLoop: BotEventLoop;
  private readonly token: string;
  private readonly logger: Logger;
  private readonly apiBaseUrl: string;

  constructor(options: DiscordRestBotOptions) {
    this.token = options.token;
    this.logger = options.logger;
    this.apiBaseUrl = (options.apiBaseUrl ?? "https://discord.com/api/v10").replace(/\/+$/, "");
    this.eventLoop =
      options.loop ??
      new BotEventLoop({
        onError: (error, taskId) => {
          this.logger.error({ error, taskId }, "Bot loop task failed");
        }
      });
    this.loop = this.eventLoop;
  }

  async fetchUser(userId: string): Promise<UserHandle | null> {
    try {
      await this.request("GET", `/users/${encodeURIComponent(userId)}`);
    } catch (error) {
      if (error instanceof DiscordApiError && error.status === 404) {
        return null;
      }
      throw error;
    }

    return {
      id: userId,
      send: (text, components) => this.sendDirectMessage(userId, text, components)
    };
  }

  close(): Promise<void> {
    return this.eventLoop.close();
  }

  private async sendDirectMessage(
    userId: string,
    content: string,
    components?: ActionRow[]
  ): Promise<void> {
    const startedAt = Date.now();
    const channel = await this.request("POST", "/users/@me/channels", {
      recipient_id: userId
    });

    if (typeof channel.id !== "string") {
      throw new Error("Discord did not return a DM channel id");
    }

    await this.request("POST", `/channels/${channel.id}/messages`, {
      content,
      ...(components ? { components } : {})
    });

    this.logger.info({ latencyMs: Date.now() - startedAt, userId }, "Discord DM sent");
  }

  private async request(
    method: "GET" | "POST",
    route: string,
    payload?: Record<string, unknown>
  ): Promise<Record<string, unknown>> {
    const response = await fetch(`${this.apiBaseUrl}${route}`, {
      method,
      headers: {
        Authorization: `Bot ${this.token}`,
        "Content-Type": "application/json"
      },
      body: payload === undefined ? undefined : JSON.stringify(payload)
    });

    const body: unknown = await response.json().catch(() => ({}));
    const record: Record<string, unknown> =
      typeof body === "object" && body !== null && !Array.isArray(body)
        ? Object.fromEntries(Object.entries(body))
        : {};

    if (!response.ok) {
      const code = typeof record.code === "number" ? record.code : null;
      const message = typeof record.message === "string" ? record.message : response.statusText;
      // Callers classify failures; 404 and 50007 are expected outcomes.
      this.logger.debug({ status: response.status, code, route }, "Discord request failed");
      throw new DiscordApiError(response.status, code, message);
    }

    return record;
  }
}
