import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Db } from "../src/db";
import { ValidationFailure } from "../src/errors";
import { SubscriptionStore, isValidLocationCode } from "../src/userStore";
import { memoryDb } from "./helpers";

describe("SubscriptionStore", () => {
  let db: Db;
  let users: SubscriptionStore;

  beforeEach(() => {
    db = memoryDb();
    users = new SubscriptionStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it("creates, finds and deletes subscribers", () => {
    users.createSubscriber(12345);
    users.createSubscriber(12345);

    expect(users.findSubscriber(12345)?.id).toBe(12345);
    expect(users.deleteSubscriber(12345)).toBe(true);
    expect(users.findSubscriber(12345)).toBeNull();
    expect(users.deleteSubscriber(12345)).toBe(false);
  });

  it("creates the subscriber along with the first location", () => {
    const id = users.upsertLocation(1, "LOC1", "Home");

    expect(users.findSubscriber(1)).not.toBeNull();
    expect(users.listLocations(1)).toEqual([
      {
        id,
        subscriberId: 1,
        locationCode: "LOC1",
        alias: "Home",
        notifyTime: "18:00",
        notifyOffset: 1,
      },
    ]);
  });

  it("updates only the alias when a location is added again", () => {
    const id = users.upsertLocation(1, "LOC1", "Home");
    users.setNotifyTime(1, "LOC1", "06:00");
    users.setNotifyOffset(1, "LOC1", 0);

    const again = users.upsertLocation(1, "LOC1", "Office");

    expect(again).toBe(id);
    expect(users.findLocation(1, id)).toEqual({
      id,
      subscriberId: 1,
      locationCode: "LOC1",
      alias: "Office",
      notifyTime: "06:00",
      notifyOffset: 0,
    });
  });

  it("keeps independent schedules per location", () => {
    users.upsertLocation(1, "LOC1", "Home");
    users.upsertLocation(1, "LOC2", "Office");

    expect(users.setNotifyTime(1, "Office", "07:00")).toBe(true);

    const schedules = users
      .listLocations(1)
      .map((b) => [b.locationCode, b.notifyTime]);
    expect(schedules).toEqual([
      ["LOC1", "18:00"],
      ["LOC2", "07:00"],
    ]);
  });

  it("reports unknown locations as false, not as an error", () => {
    users.createSubscriber(1);

    expect(users.setNotifyTime(1, "nowhere", "06:00")).toBe(false);
    expect(users.setNotifyOffset(1, "nowhere", 0)).toBe(false);
    expect(users.deleteLocation(1, "nowhere")).toBe(false);
    expect(users.findLocation(1, 999)).toBeNull();
    expect(users.listLocations(2)).toEqual([]);
  });

  it("rejects malformed schedule input", () => {
    users.upsertLocation(1, "LOC1");

    expect(() => users.setNotifyTime(1, "LOC1", "06:30")).toThrow(
      ValidationFailure
    );
    expect(() => users.setNotifyTime(1, "LOC1", "24:00")).toThrow(
      ValidationFailure
    );
    expect(() => users.upsertLocation(1, "not a code!")).toThrow(
      ValidationFailure
    );
  });

  it("treats subscriptions as a set", () => {
    const id = users.upsertLocation(1, "LOC1");

    users.addSubscription(id, { kind: "bio" });
    users.addSubscription(id, { kind: "bio" });
    users.addSubscription(id, { kind: "rest" });
    expect(users.listSubscriptions(id)).toEqual([
      { kind: "bio" },
      { kind: "rest" },
    ]);

    expect(users.removeSubscription(id, { kind: "bio" })).toBe(true);
    expect(users.removeSubscription(id, { kind: "bio" })).toBe(false);
    expect(users.listSubscriptions(id)).toEqual([{ kind: "rest" }]);
  });

  it("adds the default subscriptions", () => {
    const id = users.upsertLocation(1, "LOC1");

    users.addDefaultSubscriptions(id);

    expect(users.listSubscriptions(id)).toEqual([
      { kind: "bio" },
      { kind: "rest" },
      { kind: "paper" },
      { kind: "yellow" },
    ]);
  });

  it("deletes a location by alias or code with its subscriptions", () => {
    const home = users.upsertLocation(1, "LOC1", "Home");
    const office = users.upsertLocation(1, "LOC2");
    users.addSubscription(home, { kind: "bio" });
    users.addSubscription(office, { kind: "rest" });

    expect(users.deleteLocation(1, "Home")).toBe(true);
    expect(users.deleteLocation(1, "LOC2")).toBe(true);

    expect(users.listLocations(1)).toEqual([]);
    expect(users.listSubscriptions(home)).toEqual([]);
    expect(users.listSubscriptions(office)).toEqual([]);
  });

  it("cascades a subscriber deletion to locations and subscriptions", () => {
    const id = users.upsertLocation(1, "LOC1");
    users.addDefaultSubscriptions(id);

    users.deleteSubscriber(1);

    expect(users.listLocations(1)).toEqual([]);
    expect(users.listSubscriptions(id)).toEqual([]);
    const row = db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM subscriptions")
      .get();
    expect(row?.n).toBe(0);
  });

  it("lists each watched location code once", () => {
    users.upsertLocation(1, "LOC2");
    users.upsertLocation(2, "LOC1");
    users.upsertLocation(3, "LOC2");

    expect(users.distinctLocationCodes()).toEqual(["LOC1", "LOC2"]);
  });
});

describe("isValidLocationCode", () => {
  it("accepts short alphanumeric codes only", () => {
    expect(isValidLocationCode("54367")).toBe(true);
    expect(isValidLocationCode("ABC123")).toBe(true);
    expect(isValidLocationCode("")).toBe(false);
    expect(isValidLocationCode("123456789012345678901")).toBe(false);
    expect(isValidLocationCode("12; DROP")).toBe(false);
  });
});
