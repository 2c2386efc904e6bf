/**
 * Consensus Resolver
 *
 * Merges the classifier ranking, locality guideline rules and normalized context
 * into one verdict. Pure and synchronous; every shared table is injected.
 *
 * Decision order (first stage that yields wins):
 * 1. Abstention: top probability below minConfidence → Other, abstained
 * 2. Hazard override: hazard attribute → Landfill with special handling
 * 3. Locality rule: first matching rule for (material, locality), by priority
 * 4. Default mapping: generic material → action table
 *
 * Hazard never overrides abstention: an unreliable label is not acted on.
 */

import {
  ABSTENTION_REASON,
  ATTRIBUTE_LABELS,
  type ClassifierPrediction,
  type ContextAttributes,
  type DisposalAction,
  type GuidelineRule,
  type Locality,
  type RuleCondition,
  type Verdict,
  type VerdictSource,
} from "../domain/disposal";
import { conditionMatches, type GuidelineStore } from "./guidelines/guidelineStore";
import type { DefaultActionTable } from "./guidelines/defaultActions";
import { localityDisplayName } from "./contextNormalizer";

/** Top-1 probability below this abstains */
export const DEFAULT_MIN_CONFIDENCE = 0.75;

export interface ResolverOptions {
  guidelines: GuidelineStore;
  defaults: DefaultActionTable;
  minConfidence?: number;
}

interface StageInput {
  top: ClassifierPrediction;
  locality: Locality;
  attributes: ContextAttributes;
}

interface StageOutcome {
  action: DisposalAction;
  why: string;
  abstained?: boolean;
  specialHandling?: boolean;
}

interface ResolutionStage {
  source: VerdictSource;
  decide(input: StageInput): StageOutcome | null;
}

/**
 * Highest probability; the earliest entry wins ties. The list is not re-sorted.
 */
export function topPrediction(predictions: readonly ClassifierPrediction[]): ClassifierPrediction | null {
  let top: ClassifierPrediction | null = null;
  for (const prediction of predictions) {
    if (top === null || prediction.probability > top.probability) {
      top = prediction;
    }
  }
  return top;
}

function firstMatchingRule(rules: readonly GuidelineRule[], attributes: ContextAttributes): GuidelineRule | null {
  return rules.find((rule) => conditionMatches(rule.condition, attributes)) ?? null;
}

function citeCondition(condition: RuleCondition): string | null {
  switch (condition.kind) {
    case "always":
      return null;
    case "attribute":
      return condition.value
        ? ATTRIBUTE_LABELS[condition.attribute]
        : `not ${ATTRIBUTE_LABELS[condition.attribute]}`;
    case "all":
      return condition.conditions
        .map(citeCondition)
        .filter((part): part is string => part !== null)
        .join(" + ");
  }
}

/**
 * e.g. "Cardboard marked as 'Greasy or wet' → Compost (Austin)"
 *
 * Names the requested locality, also when the rule was inherited from "default".
 */
export function explainRule(material: string, rule: GuidelineRule, locality: Locality): string {
  const cited = citeCondition(rule.condition);
  const subject = cited ? `${material} marked as '${cited}'` : material;
  const outcome = rule.instruction ? `${rule.action}: ${rule.instruction}` : rule.action;
  return `${subject} → ${outcome} (${localityDisplayName(locality)})`;
}

export class ConsensusResolver {
  readonly minConfidence: number;
  private readonly stages: readonly ResolutionStage[];

  constructor(private readonly options: ResolverOptions) {
    const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
      throw new RangeError(`minConfidence must be within [0, 1], got ${minConfidence}`);
    }
    this.minConfidence = minConfidence;

    const stages: ResolutionStage[] = [
      { source: "abstention", decide: (input) => this.abstain(input) },
      { source: "hazard-override", decide: (input) => this.hazardOverride(input) },
      { source: "locality-rule", decide: (input) => this.localityRule(input) },
      { source: "default-mapping", decide: (input) => this.defaultMapping(input) },
    ];
    this.stages = Object.freeze(stages);
  }

  /** Stage names in precedence order */
  precedence(): VerdictSource[] {
    return this.stages.map((stage) => stage.source);
  }

  resolve(
    predictions: readonly ClassifierPrediction[],
    locality: Locality,
    attributes: ContextAttributes,
  ): Verdict {
    const top = topPrediction(predictions) ?? { label: "Unknown", probability: 0 };
    const input: StageInput = { top, locality, attributes };

    for (const stage of this.stages) {
      const outcome = stage.decide(input);
      if (outcome) {
        return {
          material: top.label,
          action: outcome.action,
          confidence: top.probability,
          why: outcome.why,
          tip: null,
          abstained: outcome.abstained ?? false,
          locality,
          source: stage.source,
          specialHandling: outcome.specialHandling ?? false,
        };
      }
    }

    // defaultMapping always yields; kept for the type checker
    throw new Error("No resolution stage produced an outcome");
  }

  private abstain({ top }: StageInput): StageOutcome | null {
    if (top.probability >= this.minConfidence) return null;
    return { action: "Other", why: ABSTENTION_REASON, abstained: true };
  }

  private hazardOverride({ top, locality, attributes }: StageInput): StageOutcome | null {
    if (!attributes.hazard) return null;
    return {
      action: "Landfill",
      why: `${top.label} marked as '${ATTRIBUTE_LABELS.hazard}' → Landfill, special handling required (${localityDisplayName(locality)})`,
      specialHandling: true,
    };
  }

  private localityRule({ top, locality, attributes }: StageInput): StageOutcome | null {
    const rules = this.options.guidelines.lookup(top.label, locality);
    const rule = firstMatchingRule(rules, attributes);
    if (!rule) return null;
    return { action: rule.action, why: explainRule(top.label, rule, locality) };
  }

  private defaultMapping({ top }: StageInput): StageOutcome {
    const action = this.options.defaults.actionFor(top.label);
    return { action, why: `${top.label} → ${action} (general guidance)` };
  }
}
