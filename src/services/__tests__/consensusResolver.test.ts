import path from "node:path";
import { describe, it, expect } from "vitest";
import { PROJECT_ROOT } from "../../config";
import type { ClassifierPrediction } from "../../domain/disposal";
import { ConsensusResolver, explainRule, topPrediction } from "../consensusResolver";
import { normalizeAttributes, NO_ATTRIBUTES } from "../contextNormalizer";
import { DefaultActionTable } from "../guidelines/defaultActions";
import { GuidelineStore } from "../guidelines/guidelineStore";

const guidelines = GuidelineStore.fromFile(path.join(PROJECT_ROOT, "data/guidelines.json"));
const defaults = DefaultActionTable.fromFile(path.join(PROJECT_ROOT, "data/default-actions.json"));

const resolver = new ConsensusResolver({ guidelines, defaults });

const only = (label: string, probability: number): ClassifierPrediction[] => [{ label, probability }];

describe("ConsensusResolver", () => {
  it("maps clean cardboard to recycling with the default rule", () => {
    const verdict = resolver.resolve(
      [
        { label: "Cardboard", probability: 0.92 },
        { label: "Paper", probability: 0.05 },
      ],
      "default",
      NO_ATTRIBUTES,
    );

    expect(verdict).toEqual({
      material: "Cardboard",
      action: "Recyclable",
      confidence: 0.92,
      why: "Cardboard → Recyclable (Default)",
      tip: null,
      abstained: false,
      locality: "default",
      source: "locality-rule",
      specialHandling: false,
    });
  });

  it("applies a locality rule matched through the material alias", () => {
    const verdict = resolver.resolve(only("Plastic#1", 0.88), "austin", normalizeAttributes({ greasy_or_wet: true }));

    expect(verdict.action).toBe("Landfill");
    expect(verdict.why).toBe("Plastic#1 marked as 'Greasy or wet' → Landfill (Austin)");
    expect(verdict.source).toBe("locality-rule");
  });

  it("composts greasy cardboard where organics are collected", () => {
    const verdict = resolver.resolve(only("Cardboard", 0.9), "austin", normalizeAttributes({ greasy_or_wet: true }));

    expect(verdict.action).toBe("Compost");
    expect(verdict.why).toBe("Cardboard marked as 'Greasy or wet' → Compost (Austin)");
  });

  it("landfills greasy cardboard elsewhere", () => {
    const verdict = resolver.resolve(only("Cardboard", 0.9), "chicago", normalizeAttributes({ greasy_or_wet: true }));

    expect(verdict.action).toBe("Landfill");
    expect(verdict.why).toBe("Cardboard marked as 'Greasy or wet' → Landfill (Chicago)");
  });

  it("abstains below the confidence threshold", () => {
    const verdict = resolver.resolve(
      [
        { label: "Glass", probability: 0.4 },
        { label: "Plastic", probability: 0.35 },
      ],
      "default",
      NO_ATTRIBUTES,
    );

    expect(verdict).toMatchObject({
      material: "Glass",
      action: "Other",
      confidence: 0.4,
      why: "low model confidence",
      abstained: true,
      source: "abstention",
    });
  });

  it("does not abstain at exactly the threshold", () => {
    const verdict = resolver.resolve(only("Glass", 0.75), "default", NO_ATTRIBUTES);

    expect(verdict.abstained).toBe(false);
    expect(verdict.action).toBe("Recyclable");
  });

  it("overrides to landfill with special handling for hazardous items", () => {
    const verdict = resolver.resolve(only("Battery", 0.9), "default", normalizeAttributes({ hazard: true }));

    expect(verdict).toMatchObject({
      material: "Battery",
      action: "Landfill",
      why: "Battery marked as 'Hazardous item' → Landfill, special handling required (Default)",
      abstained: false,
      source: "hazard-override",
      specialHandling: true,
    });
  });

  it("names the locality in the hazard explanation", () => {
    const verdict = resolver.resolve(only("Battery", 0.9), "seattle", normalizeAttributes({ hazard: true }));

    expect(verdict.why).toBe("Battery marked as 'Hazardous item' → Landfill, special handling required (Seattle)");
  });

  it("lets hazard beat a matching locality rule", () => {
    const verdict = resolver.resolve(
      only("Cardboard", 0.95),
      "austin",
      normalizeAttributes({ greasy_or_wet: true, hazard: true }),
    );

    expect(verdict.action).toBe("Landfill");
    expect(verdict.source).toBe("hazard-override");
  });

  it("abstains rather than acting on hazard when confidence is low", () => {
    const verdict = resolver.resolve(only("Battery", 0.5), "default", normalizeAttributes({ hazard: true }));

    expect(verdict.abstained).toBe(true);
    expect(verdict.action).toBe("Other");
    expect(verdict.specialHandling).toBe(false);
  });

  it("falls through to the default mapping when no rule exists", () => {
    const verdict = resolver.resolve(only("Battery", 0.9), "default", NO_ATTRIBUTES);

    expect(verdict.action).toBe("Other");
    expect(verdict.why).toBe("Battery → Other (general guidance)");
    expect(verdict.source).toBe("default-mapping");
  });

  it("uses the first rule by priority when several match", () => {
    const verdict = resolver.resolve(
      only("Plastic", 0.9),
      "default",
      normalizeAttributes({ soft_bag: true, foam: true }),
    );

    expect(verdict.action).toBe("Other");
    expect(verdict.why).toBe(
      "Plastic marked as 'Soft bag / plastic wrap' → Other: take to a store drop-off bin for plastic film (Default)",
    );
  });

  it("applies default rules to an unknown city but names the city", () => {
    const attributes = normalizeAttributes({ greasy_or_wet: true });
    const unknown = resolver.resolve(only("Cardboard", 0.9), "atlantis", attributes);
    const fallback = resolver.resolve(only("Cardboard", 0.9), "default", attributes);

    expect(unknown.action).toBe(fallback.action);
    expect(unknown.source).toBe("locality-rule");
    expect(unknown.locality).toBe("atlantis");
    expect(unknown.why).toBe("Cardboard marked as 'Greasy or wet' → Landfill (Atlantis)");
  });

  it("names a known city whose rule comes from the default locality", () => {
    const store = GuidelineStore.fromDocument({
      version: 1,
      localities: {
        default: { rules: { Glass: [{ action: "Recyclable" }] } },
        springfield: { rules: { Paper: [{ action: "Compost" }] } },
      },
    });
    const narrow = new ConsensusResolver({ guidelines: store, defaults });

    const verdict = narrow.resolve(only("Glass", 0.9), "springfield", NO_ATTRIBUTES);

    expect(verdict.why).toBe("Glass → Recyclable (Springfield)");
  });

  it("falls through to the default mapping when no rule condition matches", () => {
    const store = GuidelineStore.fromDocument({
      version: 1,
      localities: {
        default: { rules: { Glass: [{ when: { foam: true }, action: "Landfill" }] } },
      },
    });
    const narrow = new ConsensusResolver({ guidelines: store, defaults });

    const verdict = narrow.resolve(only("Glass", 0.9), "default", NO_ATTRIBUTES);

    expect(verdict.action).toBe("Recyclable");
    expect(verdict.why).toBe("Glass → Recyclable (general guidance)");
  });

  it("reads the top prediction even from an unsorted list", () => {
    const verdict = resolver.resolve(
      [
        { label: "Paper", probability: 0.1 },
        { label: "Metal", probability: 0.85 },
        { label: "Glass", probability: 0.05 },
      ],
      "default",
      NO_ATTRIBUTES,
    );

    expect(verdict.material).toBe("Metal");
  });

  it("abstains on an empty prediction list", () => {
    const verdict = resolver.resolve([], "default", NO_ATTRIBUTES);

    expect(verdict.material).toBe("Unknown");
    expect(verdict.confidence).toBe(0);
    expect(verdict.abstained).toBe(true);
  });

  it("returns the same verdict for the same inputs", () => {
    const attributes = normalizeAttributes({ paper_cup_or_carton: true });
    const first = resolver.resolve(only("Paper", 0.8), "boston", attributes);
    const second = resolver.resolve(only("Paper", 0.8), "boston", attributes);

    expect(second).toEqual(first);
    expect(first.why).toBe("Paper marked as 'Paper cup or carton' → Landfill (Boston)");
  });

  it("honours a custom threshold", () => {
    const lenient = new ConsensusResolver({ guidelines, defaults, minConfidence: 0.3 });

    expect(lenient.resolve(only("Glass", 0.4), "default", NO_ATTRIBUTES).abstained).toBe(false);
  });

  it("rejects thresholds outside [0, 1]", () => {
    expect(() => new ConsensusResolver({ guidelines, defaults, minConfidence: 1.5 })).toThrow(RangeError);
    expect(() => new ConsensusResolver({ guidelines, defaults, minConfidence: -0.1 })).toThrow(RangeError);
  });

  it("reports its precedence order", () => {
    expect(resolver.precedence()).toEqual(["abstention", "hazard-override", "locality-rule", "default-mapping"]);
  });
});

describe("topPrediction", () => {
  it("keeps the earliest entry on ties", () => {
    const top = topPrediction([
      { label: "Glass", probability: 0.5 },
      { label: "Metal", probability: 0.5 },
    ]);

    expect(top?.label).toBe("Glass");
  });

  it("returns null for an empty list", () => {
    expect(topPrediction([])).toBeNull();
  });
});

describe("explainRule", () => {
  it("omits the condition for unconditional rules", () => {
    const [always] = guidelines.lookup("Glass", "san francisco");

    expect(explainRule("Glass", always, "san francisco")).toBe("Glass → Recyclable (San Francisco)");
  });

  it("cites the requested locality rather than the rule's", () => {
    const [rule] = guidelines.lookup("Cardboard", "default");

    expect(rule.locality).toBe("default");
    expect(explainRule("Cardboard", rule, "los angeles")).toBe(
      "Cardboard marked as 'Greasy or wet' → Landfill (Los Angeles)",
    );
  });
});
