/**
 * Image intake checks that run before the classifier is called.
 * Uses sharp metadata only; pixels are never decoded here.
 */

import sharp from "sharp";
import type { Logger } from "pino";
import { ImageRejectedError } from "../domain/errors";

export const ACCEPTED_FORMATS = ["jpeg", "png", "webp", "gif", "heif"] as const;

export type AcceptedFormat = (typeof ACCEPTED_FORMATS)[number];

export interface ImageLimits {
  maxBytes: number;
  maxDimension: number;
}

export interface ValidatedImage {
  data: Buffer;
  format: AcceptedFormat;
  width: number;
  height: number;
  bytes: number;
}

function isAcceptedFormat(format: string | undefined): format is AcceptedFormat {
  return format !== undefined && (ACCEPTED_FORMATS as readonly string[]).includes(format);
}

/**
 * Accepts a `data:<mime>;base64,` URL or bare base64 (as sent by the camera page).
 * Returns an empty buffer for input that decodes to nothing.
 */
export function decodeDataUrl(input: string): Buffer {
  const trimmed = input.trim();
  const comma = trimmed.indexOf(",");
  const encoded = trimmed.startsWith("data:") && comma >= 0 ? trimmed.slice(comma + 1) : trimmed;
  return Buffer.from(encoded, "base64");
}

export class ImageValidationService {
  constructor(
    private readonly limits: ImageLimits,
    private readonly logger: Logger,
  ) {}

  async validate(image: Buffer): Promise<ValidatedImage> {
    if (image.length === 0) {
      throw new ImageRejectedError("EMPTY", "No image data provided");
    }
    if (image.length > this.limits.maxBytes) {
      throw new ImageRejectedError(
        "TOO_LARGE",
        `Image is ${image.length} bytes; limit is ${this.limits.maxBytes}`,
      );
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(image).metadata();
    } catch (error) {
      this.logger.debug({ err: error, bytes: image.length }, "Image metadata read failed");
      throw new ImageRejectedError("UNDECODABLE", "Image data could not be decoded", { cause: error });
    }

    if (!isAcceptedFormat(metadata.format)) {
      throw new ImageRejectedError(
        "UNSUPPORTED_FORMAT",
        `Unsupported image format: ${metadata.format ?? "unknown"} (accepted: ${ACCEPTED_FORMATS.join(", ")})`,
      );
    }

    const { width, height } = metadata;
    if (!width || !height) {
      throw new ImageRejectedError("UNDECODABLE", "Image has no dimensions");
    }
    if (width > this.limits.maxDimension || height > this.limits.maxDimension) {
      throw new ImageRejectedError(
        "DIMENSIONS_EXCEEDED",
        `Image too large: ${width}x${height} exceeds ${this.limits.maxDimension}px limit`,
      );
    }

    return { data: image, format: metadata.format, width, height, bytes: image.length };
  }
}
