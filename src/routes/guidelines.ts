/**
 * Guideline Routes
 *
 * Read-only views of the loaded guideline table, for the locality picker and
 * for checking which rules a (material, locality) pair resolves to.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { DEFAULT_LOCALITY } from "../domain/disposal";
import { localityDisplayName, normalizeLocality } from "../services/contextNormalizer";
import { describeCondition } from "../services/guidelines/guidelineStore";

export function registerGuidelineRoutes(app: Express, ctx: AppContext): void {
  const { guidelines, defaults } = ctx;

  /**
   * GET /api/guidelines/localities
   */
  app.get("/api/guidelines/localities", (_req: Request, res: Response) => {
    const localities = guidelines.localities();
    res.json({
      localities,
      options: localities.map((key) => ({ key, name: localityDisplayName(key) })),
    });
  });

  /**
   * GET /api/guidelines/:locality/:material
   * Rules in evaluation order; `fallback` is the default-mapping action used when none match.
   */
  app.get("/api/guidelines/:locality/:material", (req: Request, res: Response) => {
    const locality = normalizeLocality(req.params.locality);
    const { material } = req.params;
    const rules = guidelines.lookup(material, locality);

    res.json({
      locality,
      knownLocality: guidelines.hasLocality(locality),
      effectiveLocality: rules.length > 0 ? rules[0].locality : DEFAULT_LOCALITY,
      material,
      rules: rules.map((rule) => ({
        material: rule.material,
        locality: rule.locality,
        when: describeCondition(rule.condition),
        action: rule.action,
        priority: rule.priority,
        ...(rule.instruction !== undefined && { instruction: rule.instruction }),
      })),
      fallback: defaults.actionFor(material),
    });
  });
}
