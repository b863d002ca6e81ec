import { afterEach, describe, expect, it } from "vitest";

import {
  TelegramClient,
  classifyTelegramError,
} from "../src/telegramClient";
import { type TestServer, startTestServer } from "./helpers";

const BLOCKED = "Forbidden: bot was blocked by the user";
const RATE_LIMITED = "Too Many Requests: retry after 5";

describe("classifyTelegramError", () => {
  it("treats blocked, deactivated and missing chats as permanent", () => {
    expect(classifyTelegramError(403, BLOCKED)).toBe("permanent");
    expect(
      classifyTelegramError(403, "Forbidden: user is deactivated")
    ).toBe("permanent");
    expect(classifyTelegramError(400, "Bad Request: chat not found")).toBe(
      "permanent"
    );
  });

  it("treats everything else as transient", () => {
    expect(classifyTelegramError(429, RATE_LIMITED)).toBe("transient");
    expect(classifyTelegramError(500, "Internal Server Error")).toBe(
      "transient"
    );
    expect(
      classifyTelegramError(400, "Bad Request: message is too long")
    ).toBe("transient");
  });
});

describe("TelegramClient", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  function replyWith(status: number, body: object) {
    return startTestServer(() => ({ status, body: JSON.stringify(body) }));
  }

  it("posts sendMessage with the chat id and text", async () => {
    server = await replyWith(200, { ok: true, result: {} });
    const client = new TelegramClient({
      token: "test-token",
      apiUrl: server.url,
    });
    const text = "📅 Tomorrow at Home: Bio collection.";

    const result = await client.send(42, text);

    expect(result).toEqual({ ok: true });
    expect(server.requests[0]?.method).toBe("POST");
    expect(server.requests[0]?.url).toBe("/bottest-token/sendMessage");
    expect(JSON.parse(server.requests[0]?.body ?? "{}")).toEqual({
      chat_id: 42,
      text,
    });
  });

  it("reports a blocked bot as a permanent failure", async () => {
    server = await replyWith(403, {
      ok: false,
      error_code: 403,
      description: BLOCKED,
    });
    const client = new TelegramClient({
      token: "test-token",
      apiUrl: server.url,
    });

    expect(await client.send(42, "hi")).toEqual({
      ok: false,
      kind: "permanent",
      reason: `403 ${BLOCKED}`,
    });
  });

  it("reports rate limiting as transient", async () => {
    server = await replyWith(429, {
      ok: false,
      error_code: 429,
      description: RATE_LIMITED,
    });
    const client = new TelegramClient({
      token: "test-token",
      apiUrl: server.url,
    });

    expect(await client.send(42, "hi")).toEqual({
      ok: false,
      kind: "transient",
      reason: `429 ${RATE_LIMITED}`,
    });
  });

  it("reports an unreachable API as transient", async () => {
    server = await startTestServer(() => null);
    const client = new TelegramClient({
      token: "test-token",
      apiUrl: server.url,
      timeoutMs: 50,
    });

    const result = await client.send(42, "hi");

    expect(result).toMatchObject({ ok: false, kind: "transient" });
  });
});
