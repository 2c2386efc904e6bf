/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { registerClassifyRoutes } from "../routes/classify";
import { registerGuidelineRoutes } from "../routes/guidelines";
import { registerHealthRoutes } from "../routes/health";

function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    "type" in error &&
    typeof error.type === "string"
  );
}

/**
 * Create and configure the Express application.
 * Core middleware applied here; routes registered via feature modules.
 */
export function createApp(ctx: AppContext): Express {
  const { logger, config } = ctx;
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client IP
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(express.json({ limit: config.jsonBodyLimit }));

  // Keep /api/* dark to crawlers
  app.use("/api", (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Robots-Tag", "noindex, nofollow");
    next();
  });

  registerHealthRoutes(app, ctx);
  registerClassifyRoutes(app, ctx);
  registerGuidelineRoutes(app, ctx);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` });
  });

  // Express recognises error handlers by arity; keep all four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error)) {
      const tooLarge = error.type === "entity.too.large";
      res.status(error.status).json({
        error: tooLarge ? "IMAGE_TOO_LARGE" : "INVALID_REQUEST",
        message: error.message,
      });
      return;
    }

    logger.error({ err: error, path: req.path }, "Unhandled request error");
    res.status(500).json({
      error: "INTERNAL_ERROR",
      message: error instanceof Error ? error.message : String(error),
    });
  });

  return app;
}
