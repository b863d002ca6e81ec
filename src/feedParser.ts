// src/feedParser.ts
import ICAL from "ical.js";

import { isValidDate } from "./clock";
import { ParseFailure } from "./errors";
import type { PickupEvent } from "./models";
import { normalizeWasteTypes } from "./wasteTypes";

// jCal shapes produced by ICAL.parse:
//   component = [name, properties, subcomponents]
//   property  = [name, parameters, valueType, ...values]
type JCalProperty = [string, unknown, string, ...unknown[]];
type JCalComponent = [string, JCalProperty[], JCalComponent[]];

function isJCalProperty(value: unknown): value is JCalProperty {
  return (
    Array.isArray(value) &&
    value.length >= 3 &&
    typeof value[0] === "string" &&
    typeof value[2] === "string"
  );
}

function isJCalComponent(value: unknown): value is JCalComponent {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === "string" &&
    Array.isArray(value[1]) &&
    value[1].every(isJCalProperty) &&
    Array.isArray(value[2]) &&
    value[2].every(isJCalComponent)
  );
}

function parseDocument(raw: string): JCalComponent[] {
  let parsed: unknown;
  try {
    parsed = ICAL.parse(raw);
  } catch (err) {
    throw new ParseFailure("Unparsable", undefined, { cause: err });
  }

  // A single top-level component comes back unwrapped
  if (isJCalComponent(parsed)) return [parsed];
  if (Array.isArray(parsed) && parsed.every(isJCalComponent)) return parsed;
  throw new ParseFailure("Unparsable");
}

function collectEvents(component: JCalComponent, out: JCalComponent[]): void {
  if (component[0] === "vevent") {
    out.push(component);
    return;
  }
  for (const child of component[2]) collectEvents(child, out);
}

function firstValue(event: JCalComponent, name: string): string | undefined {
  const prop = event[1].find((p) => p[0] === name);
  if (!prop) return undefined;
  const value = prop[3];
  return typeof value === "string" ? value : undefined;
}

// YYYYMMDD, optionally followed by a time part
const RAW_DATE = /^\d{8}(T.*)?$/;

function propertyValue(line: string): string {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') quoted = !quoted;
    else if (ch === ":" && !quoted) return line.slice(i + 1);
  }
  return "";
}

/**
 * The DTSTART text of every VEVENT as written in the feed, in document
 * order. ical.js reads only the first eight digits of a date, so trailing
 * junk has to be caught on the raw text.
 */
function rawStartValues(raw: string): Array<string | undefined> {
  const starts: Array<string | undefined> = [];
  const open: string[] = [];
  const lines = raw.replace(/\r?\n[ \t]/g, "").split(/\r?\n/);

  for (const line of lines) {
    const name = (line.split(/[;:]/, 1)[0] ?? "").toUpperCase();
    if (name === "BEGIN") {
      const component = propertyValue(line).trim().toUpperCase();
      open.push(component);
      if (component === "VEVENT") starts.push(undefined);
    } else if (name === "END") {
      open.pop();
    } else if (
      name === "DTSTART" &&
      open[open.length - 1] === "VEVENT" &&
      starts[starts.length - 1] === undefined
    ) {
      starts[starts.length - 1] = propertyValue(line).trim();
    }
  }
  return starts;
}

/**
 * ical.js hands DTSTART back as "YYYY-MM-DD" or "YYYY-MM-DDThh:mm:ss".
 * Only the date matters; `raw` is the untouched feed text when known.
 */
function readStartDate(event: JCalComponent, raw: string | undefined): string {
  const value = firstValue(event, "dtstart");
  if (value === undefined) throw new ParseFailure("MissingDate");

  let date = value.split("T")[0] ?? "";
  if (raw !== undefined) {
    if (!RAW_DATE.test(raw)) throw new ParseFailure("InvalidDate", raw);
    date = `${raw.slice(0, 4)}-${raw.slice(4, 6)}-${raw.slice(6, 8)}`;
  }
  if (!isValidDate(date)) throw new ParseFailure("InvalidDate", raw ?? value);
  return date;
}

function readSummary(event: JCalComponent): string {
  const summary = firstValue(event, "summary");
  if (summary === undefined || summary.trim() === "") {
    throw new ParseFailure("MissingSummary");
  }
  return summary;
}

/**
 * Turns an iCalendar document into one pickup event per (date, waste type).
 * A VEVENT whose SUMMARY lists several comma separated types yields several
 * events on the same date.
 */
export function parseFeed(raw: string): PickupEvent[] {
  const vevents: JCalComponent[] = [];
  for (const component of parseDocument(raw)) {
    collectEvents(component, vevents);
  }
  const rawStarts = rawStartValues(raw);

  const events: PickupEvent[] = [];
  for (const [index, vevent] of vevents.entries()) {
    const date = readStartDate(vevent, rawStarts[index]);
    const summary = readSummary(vevent);
    for (const wasteType of normalizeWasteTypes(summary)) {
      events.push({ date, wasteType });
    }
  }
  return events;
}
