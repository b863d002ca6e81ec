// src/scheduler.ts
import cron from "node-cron";

import type { Clock } from "./clock";
import { describeError } from "./errors";
import { type IngestDeps, type IngestSummary, updateAllFeeds } from "./ingest";
import { childLogger } from "./logger";
import {
  type DispatchDeps,
  type DispatchSummary,
  dispatchNotifications,
} from "./sendAlert";

const log = childLogger("scheduler");

// Top of every hour
export const NOTIFICATION_CRON = "0 * * * *";
// Saturdays 04:00; only the first Saturday of a month actually runs
export const INGESTION_CRON = "0 4 * * 6";

export interface SchedulerDeps {
  dispatch: Omit<DispatchDeps, "clock">;
  ingest: Omit<IngestDeps, "clock" | "signal">;
  clock: Clock;
  timeZone: string;
  /** Refresh calendars right away instead of waiting for the first trigger. */
  ingestOnStart?: boolean;
}

export interface SchedulerHandle {
  runDispatch(): Promise<DispatchSummary | null>;
  runIngestion(): Promise<IngestSummary | null>;
  /** Stops both timers and waits for in-flight runs to settle. */
  stop(): Promise<void>;
}

export function isFirstWeekOfMonth(clock: Clock): boolean {
  return clock().date() <= 7;
}

export function startScheduler(deps: SchedulerDeps): SchedulerHandle {
  const abort = new AbortController();
  const inFlight = new Set<Promise<unknown>>();
  let dispatching = false;
  let ingesting = false;

  function track<T>(promise: Promise<T>): Promise<T> {
    const tracked = promise.finally(() => inFlight.delete(tracked));
    inFlight.add(tracked);
    return tracked;
  }

  async function runDispatch(): Promise<DispatchSummary | null> {
    if (dispatching) {
      log.warn("previous notification run still in progress, skipping");
      return null;
    }
    dispatching = true;
    try {
      return await dispatchNotifications({
        ...deps.dispatch,
        clock: deps.clock,
      });
    } catch (err) {
      log.error({ err: describeError(err) }, "notification run failed");
      return null;
    } finally {
      dispatching = false;
    }
  }

  async function runIngestion(): Promise<IngestSummary | null> {
    if (ingesting) {
      log.warn("previous calendar update still in progress, skipping");
      return null;
    }
    ingesting = true;
    try {
      return await updateAllFeeds({
        ...deps.ingest,
        clock: deps.clock,
        signal: abort.signal,
      });
    } catch (err) {
      log.error({ err: describeError(err) }, "calendar update failed");
      return null;
    } finally {
      ingesting = false;
    }
  }

  const notificationTask = cron.schedule(
    NOTIFICATION_CRON,
    () => {
      void track(runDispatch());
    },
    { timezone: deps.timeZone }
  );

  const ingestionTask = cron.schedule(
    INGESTION_CRON,
    () => {
      if (!isFirstWeekOfMonth(deps.clock)) return;
      void track(runIngestion());
    },
    { timezone: deps.timeZone }
  );

  if (deps.ingestOnStart ?? true) {
    void track(runIngestion());
  }

  log.info({ timeZone: deps.timeZone }, "scheduler started");

  return {
    runDispatch: () => track(runDispatch()),
    runIngestion: () => track(runIngestion()),
    async stop() {
      notificationTask.stop();
      ingestionTask.stop();
      abort.abort();
      await Promise.allSettled([...inFlight]);
      log.info("scheduler stopped");
    },
  };
}
