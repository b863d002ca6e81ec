// src/sendAlert.ts
import type { Db } from "./db";
import { type Clock, addDays, formatSlot, localDate } from "./clock";
import { describeError } from "./errors";
import { childLogger } from "./logger";
import type { NotificationTask } from "./models";
import { dueNotifications } from "./notificationMatcher";
import { forEachConcurrent } from "./semaphore";
import type { DeliveryChannel, DeliveryResult } from "./telegramClient";
import type { SubscriptionStore } from "./userStore";
import { wasteTypeLabel } from "./wasteTypes";

const log = childLogger("sendAlert");

// Telegram allows roughly 30 messages/second across chats
export const DEFAULT_DELIVERY_CONCURRENCY = 15;

export interface DispatchDeps {
  db: Db;
  users: SubscriptionStore;
  channel: DeliveryChannel;
  clock: Clock;
  concurrency?: number;
}

export interface DispatchSummary {
  slot: string;
  due: number;
  sent: number;
  permanentFailures: number;
  transientFailures: number;
}

export function formatNotification(task: NotificationTask): string {
  const prefix = task.offset === 1 ? "Tomorrow" : "Today";
  const label = wasteTypeLabel(task.wasteType);
  return `📅 ${prefix} at ${task.locationLabel}: ${label} collection.`;
}

/**
 * One hourly tick: finds everything due for the current hour and sends it,
 * once per task. Recipients that blocked the bot are deleted on the spot.
 */
export async function dispatchNotifications(
  deps: DispatchDeps
): Promise<DispatchSummary> {
  const now = deps.clock();
  const slot = formatSlot(now.hour());
  const today = localDate(() => now);
  const tomorrow = addDays(today, 1);

  const tasks = dueNotifications(deps.db, slot, today, tomorrow);
  log.info({ slot, today, due: tasks.length }, "dispatching notifications");

  const summary: DispatchSummary = {
    slot,
    due: tasks.length,
    sent: 0,
    permanentFailures: 0,
    transientFailures: 0,
  };
  const limit = deps.concurrency ?? DEFAULT_DELIVERY_CONCURRENCY;

  await forEachConcurrent(tasks, limit, async (task) => {
    const { subscriberId } = task;
    let result: DeliveryResult;
    try {
      result = await deps.channel.send(subscriberId, formatNotification(task));
    } catch (err) {
      result = { ok: false, kind: "transient", reason: describeError(err) };
    }
    if (result.ok) {
      summary.sent += 1;
      return;
    }

    if (result.kind === "permanent") {
      summary.permanentFailures += 1;
      log.info(
        { subscriberId, reason: result.reason },
        "recipient unreachable, removing subscriber"
      );
      try {
        deps.users.deleteSubscriber(subscriberId);
      } catch (err) {
        log.error(
          { subscriberId, err: describeError(err) },
          "failed to remove subscriber"
        );
      }
      return;
    }

    summary.transientFailures += 1;
    log.warn(
      { subscriberId, reason: result.reason },
      "notification failed, will retry next tick"
    );
  });

  log.info(summary, "notifications dispatched");
  return summary;
}
