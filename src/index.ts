// src/index.ts
import { zonedClock } from "./clock";
import { createFeedClient } from "./cityClient";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { describeError } from "./errors";
import { EventStore } from "./eventStore";
import { logger, setLogLevel } from "./logger";
import { startScheduler } from "./scheduler";
import { createApp } from "./server";
import { TelegramClient } from "./telegramClient";
import { SubscriptionStore } from "./userStore";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info("starting waste pickup alerts");

  const db = openDatabase(config.databasePath);
  logger.info({ path: config.databasePath }, "database ready");

  const clock = zonedClock(config.timeZone);
  const users = new SubscriptionStore(db);
  const events = new EventStore(db, {
    clock,
    insertChunkSize: config.insertChunkSize,
  });

  const scheduler = startScheduler({
    clock,
    timeZone: config.timeZone,
    dispatch: {
      db,
      users,
      channel: new TelegramClient({
        token: config.telegramBotToken,
        apiUrl: config.telegramApiUrl,
      }),
      concurrency: config.deliveryConcurrency,
    },
    ingest: {
      users,
      events,
      fetchFeed: createFeedClient({
        feedUrl: config.feedUrl,
        timeoutMs: config.feedTimeoutMs,
      }),
      windowDays: config.feedWindowDays,
      delayMs: config.feedDelayMs,
    },
  });

  const server = createApp({ users, events, clock }).listen(config.port, () => {
    logger.info(`API listening on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");

    await scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();
    logger.info("bye");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err: describeError(err) }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err: describeError(err) }, "startup failed");
  process.exit(1);
});
