import type { ClassifierPrediction } from "../../domain/disposal";

export interface OracleHealth {
  status: "healthy" | "degraded" | "unavailable";
  oracle: string;
  details?: Record<string, unknown>;
}

/**
 * Opaque image classifier capability.
 * Implementations: HttpClassifierOracle (remote inference server), StaticClassifierOracle (fixed ranking)
 */
export interface ClassifierOracle {
  /**
   * Run one inference on the raw image bytes.
   * May return predictions in any order; the adapter ranks them.
   * Implementations must be reentrant: concurrent calls share no visible state.
   */
  predict(image: Buffer): Promise<ClassifierPrediction[]>;

  /**
   * Reachability and model status, surfaced via `/health`.
   */
  health(): Promise<OracleHealth>;

  /**
   * Human-readable identifier for logging/diagnostics.
   */
  getName(): string;
}
