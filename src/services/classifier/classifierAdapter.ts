import type { Logger } from "pino";
import type { RuntimeConfig } from "../../config";
import type { ClassifierPrediction } from "../../domain/disposal";
import { ClassifierError } from "../../domain/errors";
import type { ClassifierOracle, OracleHealth } from "./classifierOracle";
import { HttpClassifierOracle } from "./httpClassifierOracle";
import { StaticClassifierOracle } from "./staticClassifierOracle";

export interface ClassifierAdapterOptions {
  /** Keep at most this many predictions after ranking */
  topK?: number;
}

function isUsable(prediction: ClassifierPrediction): boolean {
  return (
    typeof prediction.label === "string" &&
    prediction.label.trim().length > 0 &&
    Number.isFinite(prediction.probability) &&
    prediction.probability >= 0 &&
    prediction.probability <= 1
  );
}

/**
 * Ranks oracle output: drops unusable entries, sorts by probability descending.
 * Array.prototype.sort is stable, so equal probabilities keep oracle order.
 */
export function rankPredictions(predictions: readonly ClassifierPrediction[], topK?: number): ClassifierPrediction[] {
  const ranked = predictions.filter(isUsable).sort((a, b) => b.probability - a.probability);
  return topK !== undefined ? ranked.slice(0, topK) : ranked;
}

/**
 * Selects the oracle implementation from CLASSIFIER_DRIVER.
 */
export function createOracle(config: RuntimeConfig, logger: Logger): ClassifierOracle {
  switch (config.classifierDriver) {
    case "http":
      return new HttpClassifierOracle(
        {
          baseUrl: config.classifierUrl,
          timeoutMs: config.classifierTimeoutMs,
          apiKey: config.classifierApiKey,
          classNames: config.classifierClassNames,
        },
        logger,
      );
    case "static":
      return new StaticClassifierOracle(config.classifierStaticPredictions);
  }
}

/**
 * Wraps the classifier oracle behind `classify(image)`.
 * One call is one inference: no retries, no caching.
 */
export class ClassifierAdapter {
  constructor(
    private readonly oracle: ClassifierOracle,
    private readonly logger: Logger,
    private readonly options: ClassifierAdapterOptions = {},
  ) {
    logger.info({ oracle: oracle.getName(), topK: options.topK }, "Classifier oracle initialized");
  }

  static fromConfig(config: RuntimeConfig, logger: Logger): ClassifierAdapter {
    return new ClassifierAdapter(createOracle(config, logger), logger, { topK: config.classifierTopK });
  }

  getOracleName(): string {
    return this.oracle.getName();
  }

  /**
   * Ranked predictions for the image, highest probability first, at least one entry.
   * @throws ClassifierError when the oracle fails or yields nothing usable
   */
  async classify(image: Buffer): Promise<ClassifierPrediction[]> {
    if (image.length === 0) {
      throw new ClassifierError("EMPTY_IMAGE", "Image is empty");
    }

    let raw: ClassifierPrediction[];
    try {
      raw = await this.oracle.predict(image);
    } catch (error) {
      this.logger.error({ err: error, oracle: this.oracle.getName() }, "Classifier oracle failed");
      throw new ClassifierError(
        "ORACLE_FAILED",
        error instanceof Error ? error.message : "Classifier oracle failed",
        { cause: error },
      );
    }

    const ranked = rankPredictions(raw, this.options.topK);
    if (ranked.length === 0) {
      this.logger.warn({ oracle: this.oracle.getName(), received: raw.length }, "Classifier returned no usable prediction");
      throw new ClassifierError("NO_PREDICTION", "Classifier returned no usable prediction");
    }

    this.logger.debug(
      { top: ranked[0].label, probability: ranked[0].probability, count: ranked.length },
      "Image classified",
    );
    return ranked;
  }

  async health(): Promise<OracleHealth> {
    return this.oracle.health();
  }
}
