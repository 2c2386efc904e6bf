/**
 * Classification Routes
 *
 * POST /api/classify          JSON body with a data URL / base64 image
 * POST /api/classify/upload   multipart upload (field "image")
 *
 * Both answer 200 with a verdict, abstained or not. Image problems are 4xx,
 * classifier failures 502.
 */

import type { Express, NextFunction, Request, Response } from "express";
import multer from "multer";
import type { AppContext } from "../app/context";
import { ClassifierError, ImageRejectedError, type ImageRejectionReason } from "../domain/errors";
import { decodeDataUrl } from "../services/imageValidation";
import { toResponse } from "../services/disposalAdvisor";

const REJECTION_STATUS: Record<ImageRejectionReason, { status: number; error: string }> = {
  EMPTY: { status: 400, error: "INVALID_IMAGE" },
  UNDECODABLE: { status: 400, error: "INVALID_IMAGE" },
  TOO_LARGE: { status: 413, error: "IMAGE_TOO_LARGE" },
  DIMENSIONS_EXCEEDED: { status: 413, error: "IMAGE_TOO_LARGE" },
  UNSUPPORTED_FORMAT: { status: 415, error: "UNSUPPORTED_IMAGE" },
};

/**
 * Multipart text fields arrive as strings; attrs may be a JSON object string.
 */
export function parseAttrsField(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    // Malformed attrs degrade to "no attributes"
    return null;
  }
}

function readField(body: unknown, field: string): unknown {
  if (body === null || typeof body !== "object") return undefined;
  return Object.entries(body).find(([key]) => key === field)?.[1];
}

/** "locality" wins over the older "city" field */
function readLocality(body: unknown): string | null {
  const locality = readField(body, "locality");
  if (typeof locality === "string") return locality;
  const city = readField(body, "city");
  return typeof city === "string" ? city : null;
}

export function registerClassifyRoutes(app: Express, ctx: AppContext): void {
  const { logger, advisor, config } = ctx;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxImageBytes, files: 1 },
  });

  const handleAssessment = async (
    req: Request,
    res: Response,
    image: Buffer,
    attrs: unknown,
  ): Promise<void> => {
    if (ctx.isShuttingDown()) {
      res.status(503).json({ error: "SHUTTING_DOWN", message: "Server is shutting down" });
      return;
    }

    try {
      const { verdict } = await advisor.assess({
        image,
        locality: readLocality(req.body),
        attrs,
      });
      res.json(toResponse(verdict));
    } catch (error) {
      if (error instanceof ImageRejectedError) {
        const { status, error: code } = REJECTION_STATUS[error.reason];
        res.status(status).json({ error: code, message: error.message });
        return;
      }
      if (error instanceof ClassifierError) {
        logger.warn({ err: error, code: error.code }, "Classification failed");
        res.status(502).json({ error: "CLASSIFIER_UNAVAILABLE", message: "Couldn't analyze image" });
        return;
      }
      logger.error({ err: error }, "Unexpected error during classification");
      res.status(500).json({
        error: "INTERNAL_ERROR",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  /**
   * POST /api/classify
   * Body: { image_data: string, locality?: string, city?: string, attrs?: Record<string, boolean> }
   */
  app.post("/api/classify", async (req: Request, res: Response) => {
    const imageData = readField(req.body, "image_data");
    if (typeof imageData !== "string" || imageData.trim().length === 0) {
      return res.status(400).json({ error: "INVALID_IMAGE", message: "No image data provided." });
    }

    await handleAssessment(req, res, decodeDataUrl(imageData), readField(req.body, "attrs"));
  });

  /**
   * POST /api/classify/upload
   * multipart/form-data: image (file), locality|city (text), attrs (JSON text)
   */
  app.post(
    "/api/classify/upload",
    (req: Request, res: Response, next: NextFunction) => {
      upload.single("image")(req, res, (err?: unknown) => {
        if (err instanceof multer.MulterError) {
          const tooLarge = err.code === "LIMIT_FILE_SIZE";
          res.status(tooLarge ? 413 : 400).json({
            error: tooLarge ? "IMAGE_TOO_LARGE" : "INVALID_IMAGE",
            message: err.message,
          });
          return;
        }
        next(err);
      });
    },
    async (req: Request, res: Response) => {
      if (!req.file) {
        return res.status(400).json({ error: "INVALID_IMAGE", message: "No image file provided (field \"image\")." });
      }

      await handleAssessment(req, res, req.file.buffer, parseAttrsField(readField(req.body, "attrs")));
    },
  );
}
