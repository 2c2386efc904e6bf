import fs from "node:fs";
import { z } from "zod";
import { DISPOSAL_ACTIONS, materialKey, type DisposalAction } from "../domain/disposal";
import { TipTableLoadError } from "../domain/errors";

const WILDCARD = "*";

const tipTableSchema = z.object({
  version: z.literal(1),
  abstained: z.string().min(1).nullable().default(null),
  tips: z.array(
    z.object({
      material: z.string().min(1),
      action: z.union([z.enum(DISPOSAL_ACTIONS), z.literal(WILDCARD)]),
      tip: z.string().min(1),
    }),
  ),
});

export type TipTableDocument = z.input<typeof tipTableSchema>;

const tableKey = (material: string, action: string) => `${material}\u0000${action}`;

/**
 * Static (material, action) → tip lookup.
 *
 * Lookup order: exact pair, material with any action, any material with the action.
 * Resin-coded labels ("Plastic#1") fall back to their base material ("Plastic").
 * Returns null when nothing is registered; callers render the verdict without a tip.
 */
export class TipGenerator {
  private constructor(
    private readonly tips: ReadonlyMap<string, string>,
    private readonly abstained: string | null,
  ) {}

  static fromDocument(raw: unknown): TipGenerator {
    const parsed = tipTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TipTableLoadError(`Invalid tip table: ${parsed.error.message}`, { cause: parsed.error });
    }

    const tips = new Map<string, string>();
    for (const entry of parsed.data.tips) {
      const material = entry.material === WILDCARD ? WILDCARD : materialKey(entry.material);
      const key = tableKey(material, entry.action);
      // First registration wins
      if (!tips.has(key)) {
        tips.set(key, entry.tip);
      }
    }
    return new TipGenerator(tips, parsed.data.abstained);
  }

  static fromFile(filePath: string): TipGenerator {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new TipTableLoadError(`Failed to read tips from ${filePath}`, { cause: error });
    }
    return TipGenerator.fromDocument(raw);
  }

  tipFor(material: string, action: DisposalAction): string | null {
    const key = materialKey(material);
    const candidates = [key];
    const hash = key.indexOf("#");
    if (hash > 0) {
      candidates.push(key.slice(0, hash).trim());
    }

    for (const candidate of candidates) {
      const tip = this.tips.get(tableKey(candidate, action)) ?? this.tips.get(tableKey(candidate, WILDCARD));
      if (tip !== undefined) return tip;
    }
    return this.tips.get(tableKey(WILDCARD, action)) ?? null;
  }

  abstentionTip(): string | null {
    return this.abstained;
  }
}
