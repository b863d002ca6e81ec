// src/server.ts
import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";

import { type Clock, isValidSlot, localDate } from "./clock";
import { ValidationFailure, describeError } from "./errors";
import type { EventStore } from "./eventStore";
import { childLogger } from "./logger";
import { locationLabel } from "./models";
import { type SubscriptionStore, isValidLocationCode } from "./userStore";
import {
  SUPPORTED_WASTE_TYPES,
  canonicalizeWasteType,
  wasteTypeLabel,
} from "./wasteTypes";

const log = childLogger("server");

export interface AppDeps {
  users: SubscriptionStore;
  events: EventStore;
  clock: Clock;
}

const SUBSCRIPTION_ROUTE =
  "/subscribers/:id/locations/:bindingId/subscriptions/:wasteType";

const subscriberIdParam = z.coerce.number().int();
const bindingIdParam = z.coerce.number().int().positive();

const addLocationBody = z.object({
  locationCode: z
    .string()
    .trim()
    .refine(isValidLocationCode, "must be 1-20 letters or digits"),
  alias: z.string().trim().max(40).optional(),
});

const timeBody = z.object({
  time: z.string().refine(isValidSlot, "must be a full hour like 06:00"),
});

const offsetBody = z.object({
  offset: z.union([z.literal(0), z.literal(1)], {
    errorMap: () => ({ message: "must be 0 (same day) or 1 (day before)" }),
  }),
});

function parseOr400<T>(
  schema: z.ZodType<T>,
  value: unknown,
  res: Response
): T | null {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  res.status(400).json({
    error: result.error.issues
      .map((i) => `${i.path.join(".") || "value"} ${i.message}`)
      .join("; "),
  });
  return null;
}

export function createApp({ users, events, clock }: AppDeps): express.Express {
  const app = express();
  app.use(express.json());

  // Simple health check
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.get("/waste-types", (_req, res) => {
    res.json({ wasteTypes: SUPPORTED_WASTE_TYPES.map(wasteTypeLabel) });
  });

  app.get("/subscribers/:id/locations", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;

    const locations = users.listLocations(id).map((binding) => ({
      ...binding,
      label: locationLabel(binding),
      subscriptions: users.listSubscriptions(binding.id).map(wasteTypeLabel),
    }));
    res.json({ locations });
  });

  /**
   * Registers a location for a chat. New bindings start with the default
   * subscriptions (Bio, Rest, Papier, Gelb); re-posting renames the alias.
   */
  app.post("/subscribers/:id/locations", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;
    const body = parseOr400(addLocationBody, req.body, res);
    if (!body) return;

    const existing = users
      .listLocations(id)
      .some((b) => b.locationCode === body.locationCode);
    const bindingId = users.upsertLocation(id, body.locationCode, body.alias);
    if (!existing) users.addDefaultSubscriptions(bindingId);

    log.info(
      { subscriberId: id, locationCode: body.locationCode, bindingId },
      "location registered"
    );
    res.status(existing ? 200 : 201).json({ id: bindingId });
  });

  app.delete("/subscribers/:id/locations/:ref", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;

    if (!users.deleteLocation(id, req.params.ref)) {
      res.status(404).json({ error: "Location not found" });
      return;
    }
    res.status(204).end();
  });

  app.put("/subscribers/:id/locations/:ref/time", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;
    const body = parseOr400(timeBody, req.body, res);
    if (!body) return;

    if (!users.setNotifyTime(id, req.params.ref, body.time)) {
      res.status(404).json({ error: "Location not found" });
      return;
    }
    res.json({ time: body.time });
  });

  app.put("/subscribers/:id/locations/:ref/offset", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;
    const body = parseOr400(offsetBody, req.body, res);
    if (!body) return;

    if (!users.setNotifyOffset(id, req.params.ref, body.offset)) {
      res.status(404).json({ error: "Location not found" });
      return;
    }
    res.json({ offset: body.offset });
  });

  app.post(SUBSCRIPTION_ROUTE, (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;
    const bindingId = parseOr400(bindingIdParam, req.params.bindingId, res);
    if (bindingId === null) return;

    if (!users.findLocation(id, bindingId)) {
      res.status(404).json({ error: "Location not found" });
      return;
    }
    const wasteType = canonicalizeWasteType(req.params.wasteType);
    users.addSubscription(bindingId, wasteType);
    res.status(201).json({ wasteType: wasteTypeLabel(wasteType) });
  });

  app.delete(SUBSCRIPTION_ROUTE, (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;
    const bindingId = parseOr400(bindingIdParam, req.params.bindingId, res);
    if (bindingId === null) return;

    if (!users.findLocation(id, bindingId)) {
      res.status(404).json({ error: "Location not found" });
      return;
    }
    const wasteType = canonicalizeWasteType(req.params.wasteType);
    users.removeSubscription(bindingId, wasteType);
    res.status(204).end();
  });

  // Opt-out: drops the chat with every location and subscription
  app.delete("/subscribers/:id", (req, res) => {
    const id = parseOr400(subscriberIdParam, req.params.id, res);
    if (id === null) return;

    if (!users.deleteSubscriber(id)) {
      res.status(404).json({ error: "Subscriber not found" });
      return;
    }
    log.info({ subscriberId: id }, "subscriber removed");
    res.status(204).end();
  });

  app.get("/locations/:code/events", (req, res) => {
    if (!isValidLocationCode(req.params.code)) {
      res.status(400).json({ error: "Invalid location code" });
      return;
    }
    const upcoming = events
      .listEvents(req.params.code, localDate(clock))
      .map((e) => ({ date: e.date, wasteType: wasteTypeLabel(e.wasteType) }));
    res.json({ events: upcoming });
  });

  // Store errors are reported to the caller, never fatal for the process
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationFailure) {
      res.status(400).json({ error: err.message });
      return;
    }
    log.error({ err: describeError(err) }, "request failed");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
