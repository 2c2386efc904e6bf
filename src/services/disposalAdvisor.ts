/**
 * DisposalAdvisor: one request, end to end.
 *
 * validate image → classify → normalize context → resolve → attach tip
 *
 * Only the classifier call awaits external I/O. Persisting the verdict is left
 * to the caller.
 */

import type { Logger } from "pino";
import type { ClassifierPrediction, Verdict } from "../domain/disposal";
import type { ClassifierAdapter } from "./classifier/classifierAdapter";
import type { ConsensusResolver } from "./consensusResolver";
import { normalize } from "./contextNormalizer";
import type { ImageValidationService } from "./imageValidation";
import type { TipGenerator } from "./tipGenerator";

export interface AssessmentRequest {
  image: Buffer;
  locality?: string | null;
  attrs?: unknown;
}

export interface Assessment {
  verdict: Verdict;
  predictions: ClassifierPrediction[];
}

export interface VerdictResponse {
  material: string;
  action: Verdict["action"];
  confidence: number;
  confidence_text: string;
  why: string;
  tip: string | null;
  abstained: boolean;
  locality: string;
  source: Verdict["source"];
  special_handling: boolean;
}

export function confidenceText(confidence: number, abstained: boolean): string {
  const percent = (confidence * 100).toFixed(1);
  return abstained ? `${percent} % (low)` : `${percent} % Confidence Score`;
}

export function toResponse(verdict: Verdict): VerdictResponse {
  return {
    material: verdict.material,
    action: verdict.action,
    confidence: verdict.confidence,
    confidence_text: confidenceText(verdict.confidence, verdict.abstained),
    why: verdict.why,
    tip: verdict.tip,
    abstained: verdict.abstained,
    locality: verdict.locality,
    source: verdict.source,
    special_handling: verdict.specialHandling,
  };
}

export class DisposalAdvisor {
  constructor(
    private readonly imageValidation: ImageValidationService,
    private readonly classifier: ClassifierAdapter,
    private readonly resolver: ConsensusResolver,
    private readonly tips: TipGenerator,
    private readonly logger: Logger,
  ) {}

  /**
   * @throws ImageRejectedError before the classifier is called
   * @throws ClassifierError when no prediction could be produced
   */
  async assess(request: AssessmentRequest): Promise<Assessment> {
    const image = await this.imageValidation.validate(request.image);
    const predictions = await this.classifier.classify(image.data);
    const { locality, attributes } = normalize(request.locality, request.attrs);

    const resolved = this.resolver.resolve(predictions, locality, attributes);
    const verdict: Verdict = {
      ...resolved,
      tip: resolved.abstained ? this.tips.abstentionTip() : this.tips.tipFor(resolved.material, resolved.action),
    };

    this.logger.info(
      {
        label: verdict.material,
        action: verdict.action,
        confidence: verdict.confidence,
        locality: verdict.locality,
        source: verdict.source,
        abstained: verdict.abstained,
      },
      "Disposal verdict",
    );

    return { verdict, predictions };
  }
}
