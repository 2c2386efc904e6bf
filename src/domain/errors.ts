export type ClassifierErrorCode = "EMPTY_IMAGE" | "ORACLE_FAILED" | "NO_PREDICTION";

/**
 * The classifier oracle could not produce a usable prediction.
 * Not retried by the adapter; callers decide whether to retry or report.
 */
export class ClassifierError extends Error {
  readonly code: ClassifierErrorCode;

  constructor(code: ClassifierErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ClassifierError";
    this.code = code;
  }
}

export type ImageRejectionReason =
  | "EMPTY"
  | "TOO_LARGE"
  | "UNSUPPORTED_FORMAT"
  | "UNDECODABLE"
  | "DIMENSIONS_EXCEEDED";

export class ImageRejectedError extends Error {
  readonly reason: ImageRejectionReason;

  constructor(reason: ImageRejectionReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ImageRejectedError";
    this.reason = reason;
  }
}

export class GuidelineLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GuidelineLoadError";
  }
}

export class TipTableLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TipTableLoadError";
  }
}
