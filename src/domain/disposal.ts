/**
 * Disposal domain types
 *
 * A verdict is the merge of three signals:
 * - the classifier's ranked material predictions
 * - the guideline rules of the user's locality
 * - contextual attributes the user ticked ("greasy or wet", "foam", ...)
 *
 * Precedence when they disagree: abstention > hazard override > locality rule > default mapping.
 */

export const DISPOSAL_ACTIONS = ["Recyclable", "Compost", "Landfill", "Other"] as const;

export type DisposalAction = (typeof DISPOSAL_ACTIONS)[number];

export interface ClassifierPrediction {
  /** Material category as named by the classifier, e.g. "Plastic#1", "Cardboard" */
  label: string;

  /** Probability in [0, 1] */
  probability: number;
}

/**
 * Attribute keys, in the order rules are conventionally prioritised.
 */
export const ATTRIBUTE_KEYS = [
  "soft_bag",
  "foam",
  "paper_cup_or_carton",
  "greasy_or_wet",
  "hazard",
] as const;

export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

export const ATTRIBUTE_LABELS: Readonly<Record<AttributeKey, string>> = {
  soft_bag: "Soft bag / plastic wrap",
  foam: "Foam / Styrofoam",
  paper_cup_or_carton: "Paper cup or carton",
  greasy_or_wet: "Greasy or wet",
  hazard: "Hazardous item",
};

/** Every key present; absent input keys are false. */
export type ContextAttributes = Readonly<Record<AttributeKey, boolean>>;

export const DEFAULT_LOCALITY = "default";

/** Canonical locality key: trimmed, lower-cased, "default" when unset. */
export type Locality = string;

export type RuleCondition =
  | { kind: "always" }
  | { kind: "attribute"; attribute: AttributeKey; value: boolean }
  | { kind: "all"; conditions: readonly RuleCondition[] };

export interface GuidelineRule {
  /** Canonical material key the rule is filed under */
  material: string;
  locality: Locality;
  action: DisposalAction;
  condition: RuleCondition;
  /** Higher runs first; ties keep declaration order */
  priority: number;
  /** Extra handling text cited in the verdict, e.g. "take to a store drop-off bin" */
  instruction?: string;
}

/** Which precedence stage produced the verdict */
export type VerdictSource = "abstention" | "hazard-override" | "locality-rule" | "default-mapping";

export interface Verdict {
  /** Top prediction label exactly as the classifier returned it */
  material: string;
  action: DisposalAction;
  /** Top prediction probability, never adjusted by rules */
  confidence: number;
  why: string;
  tip: string | null;
  abstained: boolean;
  locality: Locality;
  source: VerdictSource;
  specialHandling: boolean;
}

export const ABSTENTION_REASON = "low model confidence";

export function isAttributeKey(value: string): value is AttributeKey {
  return (ATTRIBUTE_KEYS as readonly string[]).includes(value);
}

/**
 * Canonical form used to match material labels across classifier, guidelines and tips.
 */
export function materialKey(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}
