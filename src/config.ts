// src/config.ts
import dotenv from "dotenv";
import { z } from "zod";

import { isValidTimeZone } from "./clock";
import { ValidationFailure } from "./errors";
import { MAX_INSERT_CHUNK_SIZE } from "./eventStore";

const DEFAULT_FEED_URL =
  "https://stadtplan.dresden.de/project/cardo3Apps/IDU_DDStadtplan/abfall/ical.ashx";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, "is required"),
  TELEGRAM_API_URL: z.string().url().default("https://api.telegram.org"),
  DATABASE_PATH: z.string().min(1).default("waste_bot.db"),
  FEED_URL: z.string().url().default(DEFAULT_FEED_URL),
  TIMEZONE: z
    .string()
    .default("Europe/Berlin")
    .refine(isValidTimeZone, "is not a known IANA time zone"),
  FEED_WINDOW_DAYS: positiveInt(90),
  FEED_TIMEOUT_MS: positiveInt(30_000),
  FEED_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  DELIVERY_CONCURRENCY: positiveInt(15),
  INSERT_CHUNK_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_INSERT_CHUNK_SIZE)
    .default(250),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface AppConfig {
  telegramBotToken: string;
  telegramApiUrl: string;
  databasePath: string;
  feedUrl: string;
  timeZone: string;
  feedWindowDays: number;
  feedTimeoutMs: number;
  feedDelayMs: number;
  deliveryConcurrency: number;
  insertChunkSize: number;
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ValidationFailure(`Invalid configuration: ${problems}`);
  }

  const e = result.data;
  return {
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    telegramApiUrl: e.TELEGRAM_API_URL,
    databasePath: e.DATABASE_PATH,
    feedUrl: e.FEED_URL,
    timeZone: e.TIMEZONE,
    feedWindowDays: e.FEED_WINDOW_DAYS,
    feedTimeoutMs: e.FEED_TIMEOUT_MS,
    feedDelayMs: e.FEED_DELAY_MS,
    deliveryConcurrency: e.DELIVERY_CONCURRENCY,
    insertChunkSize: e.INSERT_CHUNK_SIZE,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
