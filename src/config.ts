import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Load .env from the project root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const PROJECT_ROOT = path.resolve(__dirname, "..");

if (process.env.NODE_ENV !== "test") {
  loadEnv({ path: path.join(PROJECT_ROOT, ".env") });
}

const csvList = (defaultValue: string[]) =>
  z.preprocess((value) => {
    if (typeof value !== "string") return value;
    const items = value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return items.length > 0 ? items : undefined;
  }, z.array(z.string()).default(defaultValue));

/**
 * "Label:probability" pairs, e.g. `Cardboard:0.92,Paper:0.05`.
 */
const predictionList = z.preprocess(
  (value) => {
    if (typeof value !== "string") return value;
    return value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => {
        const separator = entry.lastIndexOf(":");
        if (separator <= 0) return { label: entry, probability: Number.NaN };
        return {
          label: entry.slice(0, separator).trim(),
          probability: Number(entry.slice(separator + 1)),
        };
      });
  },
  z
    .array(z.object({ label: z.string().min(1), probability: z.number().min(0).max(1) }))
    .min(1)
    .default([{ label: "Trash", probability: 1 }]),
);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  BIND_HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CLASSIFIER_DRIVER: z.enum(["http", "static"]).default("http"),
  CLASSIFIER_URL: z.string().url().default("http://127.0.0.1:5001"),
  CLASSIFIER_API_KEY: z.string().optional(),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CLASSIFIER_CLASS_NAMES: csvList(["Cardboard", "Glass", "Metal", "Paper", "Plastic", "Trash"]),
  CLASSIFIER_TOP_K: z.coerce.number().int().positive().default(5),
  CLASSIFIER_STATIC_PREDICTIONS: predictionList,
  // Below this top-1 probability the resolver abstains
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.75),
  GUIDELINES_PATH: z.string().default("data/guidelines.json"),
  DEFAULT_ACTIONS_PATH: z.string().default("data/default-actions.json"),
  TIPS_PATH: z.string().default("data/tips.json"),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(8 * 1024 * 1024),
  MAX_IMAGE_DIMENSION: z.coerce.number().int().positive().default(8192),
  JSON_BODY_LIMIT: z.string().default("12mb"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
});

export type RuntimeConfig = ReturnType<typeof toRuntimeConfig>;

const resolveDataPath = (value: string) =>
  path.isAbsolute(value) ? value : path.resolve(PROJECT_ROOT, value);

function toRuntimeConfig(parsed: z.infer<typeof envSchema>) {
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    bindHost: parsed.BIND_HOST,
    logLevel: parsed.LOG_LEVEL,
    classifierDriver: parsed.CLASSIFIER_DRIVER,
    classifierUrl: parsed.CLASSIFIER_URL.replace(/\/+$/, ""),
    classifierApiKey: parsed.CLASSIFIER_API_KEY ?? "",
    classifierTimeoutMs: parsed.CLASSIFIER_TIMEOUT_MS,
    classifierClassNames: parsed.CLASSIFIER_CLASS_NAMES,
    classifierTopK: parsed.CLASSIFIER_TOP_K,
    classifierStaticPredictions: parsed.CLASSIFIER_STATIC_PREDICTIONS,
    minConfidence: parsed.MIN_CONFIDENCE,
    guidelinesPath: resolveDataPath(parsed.GUIDELINES_PATH),
    defaultActionsPath: resolveDataPath(parsed.DEFAULT_ACTIONS_PATH),
    tipsPath: resolveDataPath(parsed.TIPS_PATH),
    maxImageBytes: parsed.MAX_IMAGE_BYTES,
    maxImageDimension: parsed.MAX_IMAGE_DIMENSION,
    jsonBodyLimit: parsed.JSON_BODY_LIMIT,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}

/**
 * Parse an environment map into a typed runtime config.
 * Throws a ZodError when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return toRuntimeConfig(envSchema.parse(env));
}

export const runtimeConfig = loadConfig();
