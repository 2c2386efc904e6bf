import fs from "node:fs";
import { z } from "zod";
import { DISPOSAL_ACTIONS, materialKey, type DisposalAction } from "../../domain/disposal";
import { GuidelineLoadError } from "../../domain/errors";

const defaultActionsSchema = z.object({
  version: z.literal(1),
  fallback: z.enum(DISPOSAL_ACTIONS).default("Other"),
  materials: z.record(z.string().min(1), z.enum(DISPOSAL_ACTIONS)),
});

export type DefaultActionDocument = z.input<typeof defaultActionsSchema>;

/**
 * Generic material -> action table used when no locality rule matches.
 * Labels it does not know map to the fallback action.
 */
export class DefaultActionTable {
  private constructor(
    private readonly actions: ReadonlyMap<string, DisposalAction>,
    readonly fallback: DisposalAction,
  ) {}

  static fromDocument(raw: unknown): DefaultActionTable {
    const parsed = defaultActionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GuidelineLoadError(`Invalid default action table: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    const actions = new Map<string, DisposalAction>();
    for (const [material, action] of Object.entries(parsed.data.materials)) {
      actions.set(materialKey(material), action);
    }
    return new DefaultActionTable(actions, parsed.data.fallback);
  }

  static fromFile(filePath: string): DefaultActionTable {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new GuidelineLoadError(`Failed to read default actions from ${filePath}`, { cause: error });
    }
    return DefaultActionTable.fromDocument(raw);
  }

  actionFor(materialLabel: string): DisposalAction {
    return this.actions.get(materialKey(materialLabel)) ?? this.fallback;
  }
}
