import type { Logger } from "../logging";
import { NOOP_LOGGER } from "../logging";
import { DEFAULT_MODEL_IDS } from "./code-assist";

export type AvailableModel = {
  name: string;
  baseModelId: string;
  displayName: string;
  supportedGenerationMethods: readonly string[];
};

export type ModelSourceCounts = {
  fixed: number;
  env: number;
};

export type ModelCatalog = {
  models: readonly AvailableModel[];
  sources: ModelSourceCounts;
};

const SUPPORTED_METHODS = ["generateContent", "streamGenerateContent", "countTokens"] as const;

export function createModelCatalog(
  options: {
    fixedModelIds?: readonly string[];
    additionalModelIds?: readonly string[];
    logger?: Logger;
  } = {}
): ModelCatalog {
  const fixedModelIds = options.fixedModelIds ?? DEFAULT_MODEL_IDS;
  const logger = options.logger ?? NOOP_LOGGER;
  const additional = (options.additionalModelIds ?? []).filter(
    (id) => !fixedModelIds.includes(id)
  );

  const models = [...fixedModelIds, ...additional].map(toModel);
  const sources = { fixed: fixedModelIds.length, env: additional.length };
  logger.info("model_catalog_loaded", sources);
  return { models, sources };
}

function toModel(id: string): AvailableModel {
  return {
    name: `models/${id}`,
    baseModelId: id,
    displayName: id,
    supportedGenerationMethods: SUPPORTED_METHODS,
  };
}
