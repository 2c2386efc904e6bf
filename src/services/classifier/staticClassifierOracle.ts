import type { ClassifierPrediction } from "../../domain/disposal";
import type { ClassifierOracle, OracleHealth } from "./classifierOracle";

/**
 * Returns the same ranking for every image. For local development without an
 * inference server (CLASSIFIER_DRIVER=static) and for tests.
 */
export class StaticClassifierOracle implements ClassifierOracle {
  private readonly predictions: readonly ClassifierPrediction[];

  constructor(predictions: readonly ClassifierPrediction[]) {
    this.predictions = Object.freeze(predictions.map((prediction) => Object.freeze({ ...prediction })));
  }

  getName(): string {
    return "static";
  }

  async predict(_image: Buffer): Promise<ClassifierPrediction[]> {
    return this.predictions.map((prediction) => ({ ...prediction }));
  }

  async health(): Promise<OracleHealth> {
    return {
      status: "healthy",
      oracle: this.getName(),
      details: { labels: this.predictions.map((prediction) => prediction.label) },
    };
  }
}
