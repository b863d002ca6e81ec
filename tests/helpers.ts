import http from "node:http";

import { type Clock, fixedClock } from "../src/clock";
import { type Db, openDatabase } from "../src/db";
import type { SubscriberId } from "../src/models";
import type { DeliveryChannel, DeliveryResult } from "../src/telegramClient";

export const TZ = "Europe/Berlin";

export function memoryDb(): Db {
  return openDatabase(":memory:");
}

/** Wall clock pinned to a local time in Europe/Berlin. */
export function clockAt(localDateTime: string): Clock {
  return fixedClock(localDateTime, TZ);
}

type CalendarEvent = { start?: string; summary?: string };

export function ical(...events: CalendarEvent[]): string {
  const lines = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    "PRODID:-//Test//Abfall//DE",
  ];
  for (const event of events) {
    lines.push("BEGIN:VEVENT");
    if (event.start !== undefined) {
      lines.push(`DTSTART;VALUE=DATE:${event.start}`);
    }
    if (event.summary !== undefined) lines.push(`SUMMARY:${event.summary}`);
    lines.push("END:VEVENT");
  }
  lines.push("END:VCALENDAR");
  return lines.join("\r\n");
}

export class FakeChannel implements DeliveryChannel {
  readonly sent: Array<{ subscriberId: SubscriberId; text: string }> = [];
  private readonly outcomes = new Map<SubscriberId, DeliveryResult>();

  failFor(subscriberId: SubscriberId, result: DeliveryResult): void {
    this.outcomes.set(subscriberId, result);
  }

  async send(
    subscriberId: SubscriberId,
    text: string
  ): Promise<DeliveryResult> {
    const outcome = this.outcomes.get(subscriberId);
    if (outcome) return outcome;
    this.sent.push({ subscriberId, text });
    return { ok: true };
  }
}

type Reply = { status: number; body: string };

export interface TestServer {
  url: string;
  requests: Array<{ method: string; url: string; body: string }>;
  close(): Promise<void>;
}

/** Throwaway HTTP server on an ephemeral port, answering with `handler`. */
export async function startTestServer(
  handler: (req: http.IncomingMessage, body: string) => Reply | null
): Promise<TestServer> {
  const requests: TestServer["requests"] = [];
  const server = http.createServer((req, res) => {
    let body = "";
    req.on("data", (chunk: Buffer) => {
      body += chunk.toString("utf-8");
    });
    req.on("end", () => {
      requests.push({ method: req.method ?? "", url: req.url ?? "", body });
      const reply = handler(req, body);
      // null: never answer, to exercise client timeouts
      if (!reply) return;
      res.writeHead(reply.status, {
        "Content-Type": "text/plain; charset=utf-8",
      });
      res.end(reply.body);
    });
  });

  await new Promise<void>((resolve) =>
    server.listen(0, "127.0.0.1", () => resolve())
  );
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server has no TCP address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
