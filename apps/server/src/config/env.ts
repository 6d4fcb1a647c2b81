import { config } from "dotenv";
import { z } from "zod";

config();

const hexKey = z
  .string()
  .trim()
  .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex Ed25519 public key");

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(8080),
    HOST: z.string().min(1).default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    DISCORD_PUBLIC_KEY: hexKey.optional(),
    DISCORD_BOT_TOKEN: z.string().min(1).optional(),
    DISCORD_API_BASE_URL: z.string().url().default("https://discord.com/api/v10"),
    WELCOME_STATE_PATH: z.string().min(1).default("data/welcome_state.json"),
    WELCOME_SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(1000)
  })
  .refine((value) => value.NODE_ENV !== "production" || Boolean(value.DISCORD_PUBLIC_KEY), {
    message: "DISCORD_PUBLIC_KEY is required when NODE_ENV=production",
    path: ["DISCORD_PUBLIC_KEY"]
  });

export type Env = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  host: string;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  discordPublicKey?: string;
  discordBotToken?: string;
  discordApiBaseUrl: string;
  welcomeStatePath: string;
  welcomeSettleDelayMs: number;
};

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  // Blank values in .env files mean "unset".
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.parse(cleaned);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    discordPublicKey: parsed.DISCORD_PUBLIC_KEY,
    discordBotToken: parsed.DISCORD_BOT_TOKEN,
    discordApiBaseUrl: parsed.DISCORD_API_BASE_URL,
    welcomeStatePath: parsed.WELCOME_STATE_PATH,
    welcomeSettleDelayMs: parsed.WELCOME_SETTLE_DELAY_MS
  };
}
