import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { OracleHealth } from "../services/classifier/classifierOracle";

export function registerHealthRoutes(app: Express, ctx: AppContext): void {
  const { classifier, guidelines, resolver, logger } = ctx;

  const checkClassifier = async (): Promise<OracleHealth> => {
    try {
      return await classifier.health();
    } catch (error) {
      logger.warn({ err: error }, "Classifier health check threw");
      return {
        status: "unavailable",
        oracle: classifier.getOracleName(),
        details: { reason: error instanceof Error ? error.message : String(error) },
      };
    }
  };

  /**
   * GET /health
   * "ok" while the classifier is reachable; "degraded" otherwise (the service
   * still answers, but every classification will fail with 502).
   */
  app.get("/health", async (_req: Request, res: Response) => {
    const oracle = await checkClassifier();

    res.json({
      status: oracle.status === "healthy" ? "ok" : "degraded",
      shuttingDown: ctx.isShuttingDown(),
      classifier: {
        name: classifier.getOracleName(),
        status: oracle.status,
        ...(oracle.details && { details: oracle.details }),
      },
      guidelines: {
        localities: guidelines.localities().length,
      },
      minConfidence: resolver.minConfidence,
      precedence: resolver.precedence(),
    });
  });
}
