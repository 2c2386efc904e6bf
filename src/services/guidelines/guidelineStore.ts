/**
 * Guideline Store
 *
 * Read-only index of locality disposal rules, built once at start-up and frozen.
 *
 * Document shape (data/guidelines.json):
 * - profiles: named rule sets, material -> rules
 * - localities: each extends one profile, optionally replacing a material's rules
 * - aliases: classifier labels that share another material's rules ("Plastic#1" -> "Plastic")
 *
 * Lookup order for (material, locality):
 * 1. rules filed under that locality
 * 2. rules filed under "default"
 * 3. the same two steps for the label's alias, if it has one
 * 4. empty list (no local override; not an error)
 */

import fs from "node:fs";
import { z } from "zod";
import {
  ATTRIBUTE_KEYS,
  DEFAULT_LOCALITY,
  DISPOSAL_ACTIONS,
  materialKey,
  type ContextAttributes,
  type GuidelineRule,
  type Locality,
  type RuleCondition,
} from "../../domain/disposal";
import { GuidelineLoadError } from "../../domain/errors";
import { normalizeLocality } from "../contextNormalizer";

const ruleSchema = z.object({
  when: z.record(z.enum(ATTRIBUTE_KEYS), z.boolean()).optional(),
  action: z.enum(DISPOSAL_ACTIONS),
  priority: z.number().int().default(0),
  instruction: z.string().min(1).optional(),
});

const materialRulesSchema = z.record(z.string().min(1), z.array(ruleSchema).min(1));

export const guidelineDocumentSchema = z.object({
  version: z.literal(1),
  aliases: z.record(z.string().min(1), z.string().min(1)).default({}),
  profiles: z.record(z.string().min(1), materialRulesSchema).default({}),
  localities: z.record(
    z.string(),
    z.object({
      extends: z.string().min(1).optional(),
      rules: materialRulesSchema.default({}),
    }),
  ),
});

export type GuidelineDocument = z.input<typeof guidelineDocumentSchema>;
type RuleEntry = z.infer<typeof ruleSchema>;

type MaterialIndex = ReadonlyMap<string, readonly GuidelineRule[]>;

const EMPTY_RULES: readonly GuidelineRule[] = Object.freeze([]);

function toCondition(when: RuleEntry["when"]): RuleCondition {
  const clauses: RuleCondition[] = [];
  // Iterate in canonical key order so equal documents compile to equal conditions
  for (const attribute of ATTRIBUTE_KEYS) {
    const value = when?.[attribute];
    if (value !== undefined) {
      clauses.push({ kind: "attribute", attribute, value });
    }
  }

  if (clauses.length === 0) return { kind: "always" };
  if (clauses.length === 1) return clauses[0];
  return { kind: "all", conditions: clauses };
}

function compileRules(material: string, locality: Locality, entries: RuleEntry[]): readonly GuidelineRule[] {
  const rules = entries.map((entry, order) => ({
    order,
    rule: Object.freeze<GuidelineRule>({
      material,
      locality,
      action: entry.action,
      condition: Object.freeze(toCondition(entry.when)),
      priority: entry.priority,
      ...(entry.instruction !== undefined && { instruction: entry.instruction }),
    }),
  }));

  // Highest priority first; declaration order breaks ties
  rules.sort((a, b) => b.rule.priority - a.rule.priority || a.order - b.order);
  return Object.freeze(rules.map(({ rule }) => rule));
}

export class GuidelineStore {
  private constructor(
    private readonly index: ReadonlyMap<Locality, MaterialIndex>,
    private readonly aliases: ReadonlyMap<string, string>,
  ) {}

  static fromDocument(raw: unknown): GuidelineStore {
    const parsed = guidelineDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GuidelineLoadError(`Invalid guideline document: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    const { profiles, localities, aliases } = parsed.data;
    const index = new Map<Locality, MaterialIndex>();

    for (const [rawLocality, spec] of Object.entries(localities)) {
      const locality = normalizeLocality(rawLocality);
      if (index.has(locality)) {
        throw new GuidelineLoadError(`Duplicate locality after normalisation: "${rawLocality}"`);
      }

      let inherited: Record<string, RuleEntry[]> = {};
      if (spec.extends !== undefined) {
        if (!Object.hasOwn(profiles, spec.extends)) {
          throw new GuidelineLoadError(`Locality "${rawLocality}" extends unknown profile "${spec.extends}"`);
        }
        inherited = profiles[spec.extends];
      }

      const materials = new Map<string, readonly GuidelineRule[]>();
      for (const [material, entries] of Object.entries({ ...inherited, ...spec.rules })) {
        materials.set(materialKey(material), compileRules(material, locality, entries));
      }
      index.set(locality, materials);
    }

    if (!index.has(DEFAULT_LOCALITY)) {
      throw new GuidelineLoadError(`Guideline document must define a "${DEFAULT_LOCALITY}" locality`);
    }

    const aliasIndex = new Map<string, string>();
    for (const [from, to] of Object.entries(aliases)) {
      aliasIndex.set(materialKey(from), materialKey(to));
    }

    return new GuidelineStore(index, aliasIndex);
  }

  static fromFile(filePath: string): GuidelineStore {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new GuidelineLoadError(`Failed to read guidelines from ${filePath}`, { cause: error });
    }
    return GuidelineStore.fromDocument(raw);
  }

  /**
   * Ordered rules for a classifier label in a locality; highest priority first.
   */
  lookup(materialLabel: string, locality: Locality): readonly GuidelineRule[] {
    const key = materialKey(materialLabel);
    const direct = this.rulesFor(key, locality);
    if (direct.length > 0) return direct;

    const alias = this.aliases.get(key);
    return alias !== undefined && alias !== key ? this.rulesFor(alias, locality) : EMPTY_RULES;
  }

  localities(): Locality[] {
    return [...this.index.keys()].sort();
  }

  hasLocality(locality: Locality): boolean {
    return this.index.has(locality);
  }

  private rulesFor(key: string, locality: Locality): readonly GuidelineRule[] {
    const local = this.index.get(locality)?.get(key);
    if (local && local.length > 0) return local;
    return this.index.get(DEFAULT_LOCALITY)?.get(key) ?? EMPTY_RULES;
  }
}

/**
 * True when every clause of the condition holds for the given attributes.
 */
export function conditionMatches(condition: RuleCondition, attributes: ContextAttributes): boolean {
  switch (condition.kind) {
    case "always":
      return true;
    case "attribute":
      return attributes[condition.attribute] === condition.value;
    case "all":
      return condition.conditions.every((clause) => conditionMatches(clause, attributes));
  }
}

/**
 * Human-readable form of a rule condition, used in rule listings.
 */
export function describeCondition(condition: RuleCondition): string {
  switch (condition.kind) {
    case "always":
      return "always";
    case "attribute":
      return condition.value ? condition.attribute : `not ${condition.attribute}`;
    case "all":
      return condition.conditions.map(describeCondition).join(" and ");
  }
}
