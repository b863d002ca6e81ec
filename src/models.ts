// src/models.ts
import type { WasteType } from "./wasteTypes";

/** Telegram chat id of the subscriber. */
export type SubscriberId = number;

/** 0 = remind on the pickup day, 1 = remind the day before. */
export type NotifyOffset = 0 | 1;

export interface Subscriber {
  id: SubscriberId;
  createdAt: string;
}

export interface LocationBinding {
  id: number;
  subscriberId: SubscriberId;
  locationCode: string; // Standort-ID of the city feed
  alias: string | null;
  notifyTime: string; // "HH:00"
  notifyOffset: NotifyOffset;
}

export interface PickupEvent {
  date: string; // YYYY-MM-DD
  wasteType: WasteType;
}

export interface StoredPickupEvent extends PickupEvent {
  locationCode: string;
}

export interface NotificationTask {
  subscriberId: SubscriberId;
  wasteType: WasteType;
  locationCode: string;
  locationLabel: string;
  offset: NotifyOffset;
}

export function locationLabel(
  binding: Pick<LocationBinding, "alias" | "locationCode">
): string {
  return binding.alias ?? binding.locationCode;
}

export function toNotifyOffset(value: number): NotifyOffset | null {
  if (value === 0 || value === 1) return value;
  return null;
}
