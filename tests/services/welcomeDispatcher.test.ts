import assert from "node:assert/strict";
import test from "node:test";
import { LoopClosedError, type LoopHandle } from "../../apps/server/src/runtime/eventLoop";
import { DiscordApiError, DiscordRestBot } from "../../apps/server/src/services/discord";
import { WelcomeDispatcher } from "../../apps/server/src/services/welcomeDispatcher";
import { FileWelcomeStateStore } from "../../apps/server/src/services/welcomeState";
import type { BotHandle } from "../../apps/server/src/types/bot";
import type { ExternalUser } from "../../apps/server/src/types/discord";
import {
  type LoggerMock,
  createDeferred,
  createFakeBot,
  createLoggerMock,
  createTempStatePath,
  stubFetch
} from "../helpers";

const user: ExternalUser = {
  externalId: "111",
  displayName: "Robin",
  channelType: "discord"
};

async function withDispatcher(
  run: (ctx: {
    dispatcher: WelcomeDispatcher;
    store: FileWelcomeStateStore;
    log: LoggerMock;
  }) => Promise<void>,
  settleDelayMs = 0
): Promise<void> {
  const { filePath, cleanup } = await createTempStatePath();
  const log = createLoggerMock();
  const store = new FileWelcomeStateStore({ filePath, logger: log.logger });
  const dispatcher = new WelcomeDispatcher({ store, logger: log.logger, settleDelayMs });

  try {
    await run({ dispatcher, store, log });
  } finally {
    await cleanup();
  }
}

test("dispatch without a bot handle marks the user welcomed and returns false", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    assert.equal(await dispatcher.dispatch(user, null), false);
    assert.equal(await store.has("discord", "111"), true);
    assert.equal(log.calls.warn.length, 1);
  });
});

test("dispatch without a loop handle marks the user welcomed and returns false", async () => {
  await withDispatcher(async ({ dispatcher, store }) => {
    const bot: BotHandle = {
      loop: null,
      fetchUser: async () => null
    };

    assert.equal(await dispatcher.dispatch(user, bot), false);
    assert.equal(await store.has("discord", "111"), true);
  });
});

test("dispatch against a closed loop marks the user welcomed and returns false", async () => {
  await withDispatcher(async ({ dispatcher, store }) => {
    const fake = createFakeBot();
    await fake.loop.close();

    assert.equal(await dispatcher.dispatch(user, fake.bot), false);
    assert.equal(await store.has("discord", "111"), true);
    assert.deepEqual(fake.fetched, []);
  });
});

test("dispatch recovers when the loop closes between the check and the submission", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    let submitCalls = 0;
    const racingLoop: LoopHandle = {
      isClosed: () => false,
      submit: () => {
        submitCalls += 1;
        throw new LoopClosedError();
      }
    };
    const bot: BotHandle = {
      loop: racingLoop,
      fetchUser: async () => null
    };

    assert.equal(await dispatcher.dispatch(user, bot), false);
    assert.equal(submitCalls, 1);
    assert.equal(await store.has("discord", "111"), true);
    assert.equal(log.calls.error.length, 1);

    assert.equal(await dispatcher.dispatch(user, bot), false);
    assert.equal(submitCalls, 2);
  });
});

test("dispatch hands off immediately and marks welcomed only after the DM is sent", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    const gate = createDeferred();
    const fake = createFakeBot({ send: () => gate.promise });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    assert.equal(await store.has("discord", "111"), false);

    gate.resolve();
    await fake.loop.whenIdle();

    assert.equal(await store.has("discord", "111"), true);
    assert.equal(fake.sent.length, 1);
    assert.equal(fake.sent[0].userId, "111");
    assert.match(fake.sent[0].text, /Hi Robin, welcome aboard!/);
    assert.deepEqual(
      fake.sent[0].components?.[0].components.map((button) => button.custom_id),
      ["welcome_create_account:111", "welcome_link_account:111"]
    );
    assert.ok(log.messages("info").includes("Sent welcome DM to newly authorized user"));
  });
});

test("dispatch waits for the settling delay before sending", async () => {
  await withDispatcher(async ({ dispatcher }) => {
    const startedAt = Date.now();
    let sentAfterMs = -1;
    const fake = createFakeBot({
      send: async () => {
        sentAfterMs = Date.now() - startedAt;
      }
    });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();

    assert.ok(sentAfterMs >= 40, `sent after ${sentAfterMs}ms`);
  }, 50);
});

test("privacy-blocked DM is logged as benign and leaves the user unwelcomed", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    const fake = createFakeBot({
      send: async () => {
        throw new DiscordApiError(403, 50007, "Cannot send messages to this user");
      }
    });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();

    assert.equal(await store.has("discord", "111"), false);
    assert.equal(log.calls.error.length, 0);
    assert.ok(
      log
        .messages("warn")
        .some((message) => message.startsWith("Cannot DM user yet"))
    );
  });
});

test("unexpected DM failure is logged as an error and leaves the user unwelcomed", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    const fake = createFakeBot({
      send: async () => {
        throw new Error("socket hang up");
      }
    });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();

    assert.equal(await store.has("discord", "111"), false);
    assert.deepEqual(log.messages("error"), ["Welcome DM failed"]);
  });
});

test("unknown target user leaves the user unwelcomed", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    const fake = createFakeBot({ knownUsers: [] });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();

    assert.deepEqual(fake.fetched, ["111"]);
    assert.equal(fake.sent.length, 0);
    assert.equal(await store.has("discord", "111"), false);
    assert.deepEqual(log.messages("error"), ["Welcome DM target user not found"]);
  });
});

test("duplicate dispatch while a delivery is in flight submits nothing", async () => {
  await withDispatcher(async ({ dispatcher, store }) => {
    const gate = createDeferred();
    const fake = createFakeBot({ send: () => gate.promise });

    const results = await Promise.all([
      dispatcher.dispatch(user, fake.bot),
      dispatcher.dispatch(user, fake.bot)
    ]);
    assert.deepEqual(results, [true, true]);

    gate.resolve();
    await fake.loop.whenIdle();

    assert.deepEqual(fake.fetched, ["111"]);
    assert.equal(fake.sent.length, 1);
    assert.equal(await store.has("discord", "111"), true);
  });
});

test("a failed delivery releases the user for the next dispatch", async () => {
  await withDispatcher(async ({ dispatcher, store }) => {
    let attempts = 0;
    const fake = createFakeBot({
      send: async () => {
        attempts += 1;
        if (attempts === 1) {
          throw new Error("socket hang up");
        }
      }
    });

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();
    assert.equal(await store.has("discord", "111"), false);

    assert.equal(await dispatcher.dispatch(user, fake.bot), true);
    await fake.loop.whenIdle();

    assert.deepEqual(fake.fetched, ["111", "111"]);
    assert.equal(fake.sent.length, 1);
    assert.equal(await store.has("discord", "111"), true);
  });
});

test("privacy-blocked DM through the REST bot logs no errors", async () => {
  await withDispatcher(async ({ dispatcher, store, log }) => {
    const { restore } = stubFetch((request) => {
      if (request.url.endsWith("/users/@me/channels")) {
        return { status: 200, body: { id: "dm_111" } };
      }
      if (request.url.endsWith("/channels/dm_111/messages")) {
        return { status: 403, body: { message: "Cannot send messages to this user", code: 50007 } };
      }
      return { status: 200, body: { id: "111", username: "robin" } };
    });
    const bot = new DiscordRestBot({
      token: "test-token",
      logger: log.logger,
      apiBaseUrl: "https://discord.test/api/v10"
    });

    try {
      assert.equal(await dispatcher.dispatch(user, bot), true);
      await bot.close();

      assert.deepEqual(log.messages("error"), []);
      assert.ok(
        log
          .messages("warn")
          .some((message) => message.startsWith("Cannot DM user yet"))
      );
      assert.equal(await store.has("discord", "111"), false);
    } finally {
      restore();
    }
  });
});
