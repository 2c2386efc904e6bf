import axios, { type AxiosInstance, AxiosError } from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import type { ClassifierPrediction } from "../../domain/disposal";
import type { ClassifierOracle, OracleHealth } from "./classifierOracle";

export interface HttpClassifierOptions {
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
  /** Labels for a bare probability vector, index-aligned with the model's output layer */
  classNames: readonly string[];
}

/**
 * The inference server answers either with labelled predictions or with the
 * raw softmax vector of its output layer.
 */
const predictResponseSchema = z.union([
  z.object({
    predictions: z.array(z.object({ label: z.string(), probability: z.number() })),
  }),
  z.object({
    probabilities: z.array(z.number()),
  }),
]);

const healthResponseSchema = z
  .object({
    status: z.string(),
    device: z.string().optional(),
    classes: z.array(z.string()).optional(),
  })
  .passthrough();

export type PredictResponse = z.infer<typeof predictResponseSchema>;

export function labelPredictions(
  response: PredictResponse,
  classNames: readonly string[],
): ClassifierPrediction[] {
  if ("predictions" in response) {
    return response.predictions.map(({ label, probability }) => ({ label, probability }));
  }
  return response.probabilities.map((probability, index) => ({
    label: classNames[index] ?? `Class_${index}`,
    probability,
  }));
}

function describeAxiosError(error: AxiosError): string {
  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return "Classifier request timed out";
  }
  if (error.response) {
    return `Classifier responded with HTTP ${error.response.status}`;
  }
  return `Classifier unreachable: ${error.message}`;
}

/**
 * Remote inference server client.
 * POST /predict with the raw image bytes; GET /health for model status.
 * No retries: a failed call surfaces to the adapter as-is.
 */
export class HttpClassifierOracle implements ClassifierOracle {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: HttpClassifierOptions,
    private readonly logger: Logger,
  ) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        Accept: "application/json",
        ...(options.apiKey ? { "X-API-Key": options.apiKey } : {}),
      },
      maxBodyLength: Infinity,
    });
  }

  getName(): string {
    return "http";
  }

  async predict(image: Buffer): Promise<ClassifierPrediction[]> {
    let data: unknown;
    try {
      const response = await this.client.post<unknown>("/predict", image, {
        headers: { "Content-Type": "application/octet-stream" },
      });
      data = response.data;
    } catch (error) {
      if (error instanceof AxiosError) {
        throw new Error(describeAxiosError(error), { cause: error });
      }
      throw error;
    }

    const parsed = predictResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Classifier returned an unexpected payload");
      throw new Error("Classifier returned an unexpected payload", { cause: parsed.error });
    }

    return labelPredictions(parsed.data, this.options.classNames);
  }

  async health(): Promise<OracleHealth> {
    try {
      const { data } = await this.client.get<unknown>("/health", {
        timeout: Math.min(this.options.timeoutMs, 2000), // Fast health check
      });
      const parsed = healthResponseSchema.safeParse(data);
      if (!parsed.success) {
        return { status: "degraded", oracle: this.getName(), details: { reason: "unexpected health payload" } };
      }

      return {
        status: parsed.data.status === "ok" || parsed.data.status === "healthy" ? "healthy" : "degraded",
        oracle: this.getName(),
        details: {
          ...(parsed.data.device !== undefined && { device: parsed.data.device }),
          ...(parsed.data.classes !== undefined && { classes: parsed.data.classes }),
        },
      };
    } catch (error) {
      const reason = error instanceof AxiosError ? describeAxiosError(error) : String(error);
      this.logger.warn({ reason }, "Classifier health check failed");
      return { status: "unavailable", oracle: this.getName(), details: { reason } };
    }
  }
}
