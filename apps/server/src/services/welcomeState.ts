import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "../types/logger";

const welcomeRecordSchema = z
  .object({
    welcomed: z.boolean(),
    welcomed_at: z.string().optional(),
    welcomed_at_iso: z.string().optional(),
    channel_type: z.string().optional()
  })
  .passthrough();

const ledgerSchema = z.record(welcomeRecordSchema);

export type WelcomeRecord = z.infer<typeof welcomeRecordSchema>;
export type WelcomeLedger = z.infer<typeof ledgerSchema>;

export interface WelcomeStateStore {
  has(channelType: string, externalId: string): Promise<boolean>;
  mark(channelType: string, externalId: string): Promise<boolean>;
  clear(channelType: string, externalId: string): Promise<boolean>;
}

type FileWelcomeStateOptions = {
  filePath: string;
  logger: Logger;
  now?: () => Date;
};

type LoadResult =
  | { status: "ok"; ledger: WelcomeLedger }
  | { status: "missing" }
  | { status: "corrupt"; reason: string };

export function welcomeKey(channelType: string, externalId: string): string {
  return `${channelType}:${externalId}`;
}

/**
 * JSON-file ledger of welcomed users. Every change rewrites the whole file
 * through a temp file and rename; changes from this process are applied one
 * at a time.
 */
export class FileWelcomeStateStore implements WelcomeStateStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(options: FileWelcomeStateOptions) {
    this.filePath = path.resolve(options.filePath);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async has(channelType: string, externalId: string): Promise<boolean> {
    try {
      const loaded = await this.load();
      if (loaded.status !== "ok") return false;

      return loaded.ledger[welcomeKey(channelType, externalId)]?.welcomed === true;
    } catch (error) {
      this.logger.error({ error, filePath: this.filePath }, "Welcome state read failed");
      return false;
    }
  }

  mark(channelType: string, externalId: string): Promise<boolean> {
    return this.mutate("mark", async () => {
      const ledger = await this.loadForWrite();
      const at = this.now();
      const iso = at.toISOString();

      ledger[welcomeKey(channelType, externalId)] = {
        welcomed_at: `${iso.slice(0, 10)} ${iso.slice(11, 19)}`,
        welcomed_at_iso: iso,
        channel_type: channelType,
        welcomed: true
      };

      await this.persist(ledger);
      this.logger.debug({ channelType, externalId }, "Marked user as welcomed");
      return true;
    });
  }

  clear(channelType: string, externalId: string): Promise<boolean> {
    return this.mutate("clear", async () => {
      const loaded = await this.load();
      const key = welcomeKey(channelType, externalId);

      if (loaded.status !== "ok" || !(key in loaded.ledger)) {
        return true;
      }

      const ledger = { ...loaded.ledger };
      delete ledger[key];
      await this.persist(ledger);
      this.logger.debug({ channelType, externalId }, "Cleared welcomed status");
      return true;
    });
  }

  private mutate(operation: string, change: () => Promise<boolean>): Promise<boolean> {
    const result = this.writeChain.then(change).catch((error: unknown) => {
      this.logger.error({ error, operation, filePath: this.filePath }, "Welcome state update failed");
      return false;
    });

    this.writeChain = result;
    return result;
  }

  private async loadForWrite(): Promise<WelcomeLedger> {
    const loaded = await this.load();
    if (loaded.status === "ok") return loaded.ledger;

    if (loaded.status === "corrupt") {
      this.logger.warn({ filePath: this.filePath }, "Replacing corrupt welcome state file");
    }
    return {};
  }

  private async load(): Promise<LoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return { status: "missing" };
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return this.corrupt("invalid JSON");
    }

    const parsed = ledgerSchema.safeParse(json);
    if (!parsed.success) {
      return this.corrupt(parsed.error.issues[0]?.message ?? "schema mismatch");
    }

    return { status: "ok", ledger: parsed.data };
  }

  private corrupt(reason: string): LoadResult {
    this.logger.warn({ filePath: this.filePath, reason }, "Welcome state file is corrupt");
    return { status: "corrupt", reason };
  }

  private async persist(ledger: WelcomeLedger): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(ledger, null, 2)}\n`, "utf8");
    await fs.rename(tempPath, this.filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
