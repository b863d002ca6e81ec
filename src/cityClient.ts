// src/cityClient.ts
import axios, { type AxiosResponse } from "axios";

import { formatFeedDate } from "./clock";
import { FetchFailure, describeError } from "./errors";
import { childLogger } from "./logger";

const log = childLogger("cityClient");

export const CALENDAR_BEGIN_MARKER = "BEGIN:VCALENDAR";

export interface FeedRequest {
  locationCode: string;
  from: string; // YYYY-MM-DD, inclusive
  to: string; // YYYY-MM-DD, inclusive
}

export interface FeedClientOptions {
  feedUrl: string;
  timeoutMs: number;
}

export type FetchFeed = (request: FeedRequest) => Promise<string>;

/**
 * Builds a fetcher for the city's iCal endpoint. Network errors, timeouts,
 * non-2xx answers and bodies without a calendar all surface as FetchFailure.
 */
export function createFeedClient(options: FeedClientOptions): FetchFeed {
  return async function fetchCalendar({
    locationCode,
    from,
    to,
  }: FeedRequest): Promise<string> {
    const params = {
      STANDORT: locationCode,
      DATUM_VON: formatFeedDate(from),
      DATUM_BIS: formatFeedDate(to),
    };

    log.debug({ locationCode, params }, "requesting calendar");

    let res: AxiosResponse<string>;
    try {
      res = await axios.get<string>(options.feedUrl, {
        params,
        timeout: options.timeoutMs,
        responseType: "text",
        // keep the raw body; the feed is not JSON
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new FetchFailure(
        `Calendar request for ${locationCode} failed: ${describeError(err)}`,
        undefined,
        { cause: err }
      );
    }

    if (res.status < 200 || res.status >= 300) {
      throw new FetchFailure(
        `Calendar for ${locationCode} returned status ${res.status}`,
        res.status
      );
    }

    const body = typeof res.data === "string" ? res.data : "";
    if (!body.includes(CALENDAR_BEGIN_MARKER)) {
      throw new FetchFailure(
        `Calendar for ${locationCode} is not an iCalendar document`,
        res.status
      );
    }

    return body;
  };
}
