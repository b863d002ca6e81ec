// src/telegramClient.ts
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import { describeError } from "./errors";
import type { SubscriberId } from "./models";

export type DeliveryResult =
  | { ok: true }
  | { ok: false; kind: "permanent" | "transient"; reason: string };

export interface DeliveryChannel {
  send(subscriberId: SubscriberId, text: string): Promise<DeliveryResult>;
}

const telegramReply = z.object({
  ok: z.boolean(),
  error_code: z.number().optional(),
  description: z.string().optional(),
});

// The recipient is gone for good; retrying next hour would fail the same way.
const PERMANENT_PATTERNS = [
  /blocked/i,
  /deactivated/i,
  /chat not found/i,
  /kicked/i,
];

export function classifyTelegramError(
  status: number,
  description: string
): "permanent" | "transient" {
  const gone = PERMANENT_PATTERNS.some((p) => p.test(description));
  if ((status === 403 || status === 400) && gone) {
    return "permanent";
  }
  return "transient";
}

const DEFAULT_API_URL = "https://api.telegram.org";

export interface TelegramClientOptions {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
}

/** Sends plain-text messages through the Telegram Bot API. */
export class TelegramClient implements DeliveryChannel {
  private readonly http: AxiosInstance;

  constructor(options: TelegramClientOptions) {
    this.http = axios.create({
      baseURL: `${options.apiUrl ?? DEFAULT_API_URL}/bot${options.token}`,
      timeout: options.timeoutMs ?? 15_000,
      validateStatus: () => true,
    });
  }

  async send(
    subscriberId: SubscriberId,
    text: string
  ): Promise<DeliveryResult> {
    let status: number;
    let body: unknown;
    try {
      const res = await this.http.post<unknown>("/sendMessage", {
        chat_id: subscriberId,
        text,
      });
      status = res.status;
      body = res.data;
    } catch (err) {
      return { ok: false, kind: "transient", reason: describeError(err) };
    }

    const reply = telegramReply.safeParse(body);
    if (status >= 200 && status < 300 && reply.success && reply.data.ok) {
      return { ok: true };
    }

    const description = reply.success ? reply.data.description ?? "" : "";
    const code = reply.success ? reply.data.error_code ?? status : status;
    return {
      ok: false,
      kind: classifyTelegramError(code, description),
      reason: `${code} ${description}`.trim(),
    };
  }
}
