/**
 * AppContext: composition root.
 *
 * Loads the read-only tables (guidelines, default actions, tips) once, freezes
 * them, and wires them into the services. Everything is constructed before
 * the HTTP server accepts its first request.
 */

import type { Logger } from "pino";
import { runtimeConfig, type RuntimeConfig } from "../config";
import { createLogger } from "../utils/logger";
import { ClassifierAdapter } from "../services/classifier/classifierAdapter";
import type { ClassifierOracle } from "../services/classifier/classifierOracle";
import { GuidelineStore } from "../services/guidelines/guidelineStore";
import { DefaultActionTable } from "../services/guidelines/defaultActions";
import { ConsensusResolver } from "../services/consensusResolver";
import { TipGenerator } from "../services/tipGenerator";
import { ImageValidationService } from "../services/imageValidation";
import { DisposalAdvisor } from "../services/disposalAdvisor";

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  classifier: ClassifierAdapter;
  guidelines: GuidelineStore;
  defaults: DefaultActionTable;
  resolver: ConsensusResolver;
  tips: TipGenerator;
  imageValidation: ImageValidationService;
  advisor: DisposalAdvisor;
  isShuttingDown(): boolean;
  setShuttingDown(value: boolean): void;
}

export interface ContextOverrides {
  /** Replaces the configured oracle (tests, alternative model hosts) */
  oracle?: ClassifierOracle;
  logger?: Logger;
}

export function createContext(
  config: RuntimeConfig = runtimeConfig,
  overrides: ContextOverrides = {},
): AppContext {
  const logger = overrides.logger ?? createLogger("app");

  const guidelines = GuidelineStore.fromFile(config.guidelinesPath);
  const defaults = DefaultActionTable.fromFile(config.defaultActionsPath);
  const tips = TipGenerator.fromFile(config.tipsPath);
  logger.info(
    { guidelines: config.guidelinesPath, localities: guidelines.localities().length },
    "Disposal tables loaded",
  );

  const classifierLogger = logger.child({ component: "classifier" });
  const classifier = overrides.oracle
    ? new ClassifierAdapter(overrides.oracle, classifierLogger, { topK: config.classifierTopK })
    : ClassifierAdapter.fromConfig(config, classifierLogger);

  const resolver = new ConsensusResolver({
    guidelines,
    defaults,
    minConfidence: config.minConfidence,
  });

  const imageValidation = new ImageValidationService(
    { maxBytes: config.maxImageBytes, maxDimension: config.maxImageDimension },
    logger.child({ component: "image-validation" }),
  );

  const advisor = new DisposalAdvisor(
    imageValidation,
    classifier,
    resolver,
    tips,
    logger.child({ component: "advisor" }),
  );

  let shuttingDown = false;

  return {
    config,
    logger,
    classifier,
    guidelines,
    defaults,
    resolver,
    tips,
    imageValidation,
    advisor,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
  };
}

export { runtimeConfig };
