import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { BotEventLoop } from "../apps/server/src/runtime/eventLoop";
import type { BotHandle, UserHandle } from "../apps/server/src/types/bot";
import type { ActionRow } from "../apps/server/src/types/discord";
import type { Logger } from "../apps/server/src/types/logger";

export type LoggerMock = {
  logger: Logger;
  calls: Record<"debug" | "info" | "warn" | "error", unknown[][]>;
  messages: (level: "debug" | "info" | "warn" | "error") => string[];
};

export function createLoggerMock(): LoggerMock {
  const calls: LoggerMock["calls"] = { debug: [], info: [], warn: [], error: [] };

  return {
    logger: {
      debug: (...args: unknown[]) => calls.debug.push(args),
      info: (...args: unknown[]) => calls.info.push(args),
      warn: (...args: unknown[]) => calls.warn.push(args),
      error: (...args: unknown[]) => calls.error.push(args)
    },
    calls,
    messages: (level) =>
      calls[level].map((args) => {
        const message = args.find((arg) => typeof arg === "string");
        return typeof message === "string" ? message : "";
      })
  };
}

export async function waitFor(check: () => boolean | Promise<boolean>, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await check()) return;
    await new Promise((resolve) => {
      setTimeout(resolve, 10);
    });
  }
  throw new Error("Timed out waiting for condition");
}

export async function createTempStatePath(): Promise<{ filePath: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "welcome-state-"));
  return {
    filePath: path.join(dir, "nested", "welcome_state.json"),
    cleanup: () => fs.rm(dir, { recursive: true, force: true })
  };
}

export type SentMessage = {
  userId: string;
  text: string;
  components?: ActionRow[];
};

export type FakeBot = {
  bot: BotHandle;
  loop: BotEventLoop;
  sent: SentMessage[];
  fetched: string[];
};

type FakeBotOptions = {
  send?: (message: SentMessage) => Promise<void>;
  knownUsers?: string[];
};

export function createFakeBot(options: FakeBotOptions = {}): FakeBot {
  const loop = new BotEventLoop();
  const sent: SentMessage[] = [];
  const fetched: string[] = [];

  const bot: BotHandle = {
    loop,
    fetchUser: async (userId) => {
      fetched.push(userId);
      if (options.knownUsers && !options.knownUsers.includes(userId)) {
        return null;
      }

      const handle: UserHandle = {
        id: userId,
        send: async (text, components) => {
          const message = { userId, text, components };
          await options.send?.(message);
          sent.push(message);
        }
      };
      return handle;
    }
  };

  return { bot, loop, sent, fetched };
}

export function createDeferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export type SigningKeys = {
  publicKeyHex: string;
  sign: (timestamp: string, body: string) => string;
};

export function createSigningKeys(): SigningKeys {
  const { publicKey, privateKey } = crypto.generateKeyPairSync("ed25519");
  const jwk = publicKey.export({ format: "jwk" });

  return {
    publicKeyHex: Buffer.from(jwk.x ?? "", "base64url").toString("hex"),
    sign: (timestamp, body) =>
      crypto.sign(null, Buffer.from(`${timestamp}${body}`, "utf8"), privateKey).toString("hex")
  };
}

export type CapturedRequest = {
  url: string;
  method: string;
  authorization: string | null;
  body: string;
};

export function stubFetch(
  respond: (request: CapturedRequest) => { status: number; body: unknown }
): { captured: CapturedRequest[]; restore: () => void } {
  const originalFetch = globalThis.fetch;
  const captured: CapturedRequest[] = [];

  const stub: typeof fetch = async (input, init) => {
    const request: CapturedRequest = {
      url: String(input),
      method: init?.method ?? "GET",
      authorization: new Headers(init?.headers).get("authorization"),
      body: typeof init?.body === "string" ? init.body : ""
    };
    captured.push(request);

    const { status, body } = respond(request);
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" }
    });
  };

  globalThis.fetch = stub;
  return {
    captured,
    restore: () => {
      globalThis.fetch = originalFetch;
    }
  };
}
