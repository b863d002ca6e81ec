// src/ingest.ts
import { type Clock, addDays, localDate } from "./clock";
import type { FetchFeed } from "./cityClient";
import { describeError } from "./errors";
import type { EventStore } from "./eventStore";
import { parseFeed } from "./feedParser";
import { childLogger } from "./logger";
import type { SubscriptionStore } from "./userStore";

const log = childLogger("ingest");

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface IngestDeps {
  users: SubscriptionStore;
  events: EventStore;
  fetchFeed: FetchFeed;
  clock: Clock;
  windowDays: number;
  /** Pause between two locations so the city endpoint is not hammered. */
  delayMs: number;
  signal?: AbortSignal;
}

export interface IngestSummary {
  locations: number;
  updated: number;
  failed: string[];
}

/**
 * Refreshes the calendar of every location someone subscribes to. A location
 * that fails is logged and skipped; the others still update.
 */
export async function updateAllFeeds(deps: IngestDeps): Promise<IngestSummary> {
  const locations = deps.users.distinctLocationCodes();
  const from = localDate(deps.clock);
  const to = addDays(from, deps.windowDays);
  const summary: IngestSummary = {
    locations: locations.length,
    updated: 0,
    failed: [],
  };

  log.info(
    { locations: locations.length, from, to },
    "starting calendar update"
  );

  for (const [index, locationCode] of locations.entries()) {
    if (deps.signal?.aborted) {
      log.info("calendar update aborted");
      break;
    }

    try {
      const body = await deps.fetchFeed({ locationCode, from, to });
      const events = parseFeed(body);
      deps.events.sync(locationCode, events);
      summary.updated += 1;
      log.info({ locationCode, events: events.length }, "calendar updated");
    } catch (err) {
      summary.failed.push(locationCode);
      log.error(
        { locationCode, err: describeError(err) },
        "calendar update failed"
      );
    }

    if (index < locations.length - 1 && deps.delayMs > 0) {
      await sleep(deps.delayMs);
    }
  }

  log.info(summary, "calendar update finished");
  return summary;
}
