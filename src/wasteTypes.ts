// src/wasteTypes.ts

export type KnownWasteKind =
  | "bio"
  | "rest"
  | "paper"
  | "yellow"
  | "christmasTree";

/**
 * Waste categories announced by the city feed. Anything the synonym table
 * does not recognize is kept as `other` with its original label.
 */
export type WasteType =
  | { kind: KnownWasteKind }
  | { kind: "other"; label: string };

const KNOWN_LABELS: Record<KnownWasteKind, string> = {
  bio: "Bio",
  rest: "Rest",
  paper: "Papier",
  yellow: "Gelb",
  christmasTree: "Weihnachtsbaum",
};

const SYNONYMS: ReadonlyArray<readonly [KnownWasteKind, readonly string[]]> = [
  ["bio", ["Bio", "Biotonne", "Bioabfall"]],
  ["rest", ["Rest", "Restmüll", "Restabfall"]],
  ["paper", ["Papier", "Pappe", "Blaue Tonne"]],
  ["yellow", ["Gelb", "Gelbe Tonne", "Gelber Sack"]],
  ["christmasTree", ["Weihnachtsbaum", "Weihnachtsbäume"]],
];

function foldLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

const SYNONYM_LOOKUP = new Map<string, KnownWasteKind>();
for (const [kind, synonyms] of SYNONYMS) {
  for (const synonym of synonyms) {
    SYNONYM_LOOKUP.set(foldLabel(synonym), kind);
  }
}

/** Types offered for subscription; `other` labels are feed-only. */
export const SUPPORTED_WASTE_TYPES: readonly WasteType[] = [
  { kind: "bio" },
  { kind: "rest" },
  { kind: "paper" },
  { kind: "yellow" },
  { kind: "christmasTree" },
];

export const DEFAULT_SUBSCRIPTIONS: readonly WasteType[] = [
  { kind: "bio" },
  { kind: "rest" },
  { kind: "paper" },
  { kind: "yellow" },
];

export function canonicalizeWasteType(label: string): WasteType {
  const kind = SYNONYM_LOOKUP.get(foldLabel(label));
  if (kind) return { kind };
  return { kind: "other", label: label.trim() };
}

/** Splits a comma separated SUMMARY into waste types, dropping empty ones. */
export function normalizeWasteTypes(summary: string): WasteType[] {
  return summary
    .split(",")
    .map((fragment) => fragment.trim())
    .filter((fragment) => fragment.length > 0)
    .map(canonicalizeWasteType);
}

/** Label used for storage and in notification text. */
export function wasteTypeLabel(type: WasteType): string {
  return type.kind === "other" ? type.label : KNOWN_LABELS[type.kind];
}
