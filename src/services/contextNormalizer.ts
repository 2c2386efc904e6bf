/**
 * Context Normalizer
 *
 * Canonicalises the free-form locality and attribute flags that arrive with a request.
 * Never throws: anything malformed degrades to the defaults (locality "default",
 * attribute false). Locality keys are not checked against the guideline store here.
 */

import {
  DEFAULT_LOCALITY,
  isAttributeKey,
  type AttributeKey,
  type ContextAttributes,
  type Locality,
} from "../domain/disposal";

export interface NormalizedContext {
  locality: Locality;
  attributes: ContextAttributes;
}

/**
 * Legacy flag names still sent by older clients.
 */
const ATTRIBUTE_ALIASES: ReadonlyMap<string, AttributeKey> = new Map<string, AttributeKey>([
  ["paper_cup", "paper_cup_or_carton"],
  ["carton", "paper_cup_or_carton"],
]);

const TRUE_STRINGS = new Set(["true", "1", "yes", "y", "on"]);

export function normalizeLocality(raw: string | null | undefined): Locality {
  if (typeof raw !== "string") return DEFAULT_LOCALITY;

  let key = raw.trim().toLowerCase();
  // "Austin, TX" -> "austin"
  const comma = key.indexOf(",");
  if (comma >= 0) {
    key = key.slice(0, comma);
  }
  key = key.trim().replace(/\s+/g, " ");

  return key.length > 0 ? key : DEFAULT_LOCALITY;
}

export function coerceFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) && value !== 0;
  if (typeof value === "string") return TRUE_STRINGS.has(value.trim().toLowerCase());
  return false;
}

export const NO_ATTRIBUTES: ContextAttributes = Object.freeze({
  soft_bag: false,
  foam: false,
  paper_cup_or_carton: false,
  greasy_or_wet: false,
  hazard: false,
});

export function normalizeAttributes(raw: unknown): ContextAttributes {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return NO_ATTRIBUTES;
  }

  const attributes: Record<AttributeKey, boolean> = { ...NO_ATTRIBUTES };
  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const key = rawKey.trim().toLowerCase();
    const canonical = isAttributeKey(key) ? key : ATTRIBUTE_ALIASES.get(key);
    if (!canonical) continue;

    // Aliases OR together with the canonical key
    attributes[canonical] = attributes[canonical] || coerceFlag(rawValue);
  }

  return Object.freeze(attributes);
}

export function normalize(rawLocality: string | null | undefined, rawAttrs: unknown): NormalizedContext {
  return {
    locality: normalizeLocality(rawLocality),
    attributes: normalizeAttributes(rawAttrs),
  };
}

/**
 * Display form of a locality key for explanations: "san francisco" -> "San Francisco".
 */
export function localityDisplayName(locality: Locality): string {
  if (locality === DEFAULT_LOCALITY || locality.length === 0) return "Default";
  return locality
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
