import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG } from "./defaults";
import { assertSchemaComplete } from "./documentSchema";
import type { AppConfig, ConfigOverrides } from "./types";

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides | null;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    ...overrides,
    classifier: {
      ...base.classifier,
      ...(overrides.classifier ?? {}),
      vocabulary: {
        ...base.classifier.vocabulary,
        ...(overrides.classifier?.vocabulary ?? {}),
      },
      modelLabelAliases: {
        ...base.classifier.modelLabelAliases,
        ...(overrides.classifier?.modelLabelAliases ?? {}),
      },
    },
    retry: { ...base.retry, ...(overrides.retry ?? {}) },
    extraction: {
      ...base.extraction,
      ...(overrides.extraction ?? {}),
      identifierPatterns: {
        ...base.extraction.identifierPatterns,
        ...(overrides.extraction?.identifierPatterns ?? {}),
      },
    },
    validation: { ...base.validation, ...(overrides.validation ?? {}) },
    requiredFields: { ...base.requiredFields, ...(overrides.requiredFields ?? {}) },
    model: { ...base.model, ...(overrides.model ?? {}) },
    outputDirs: { ...base.outputDirs, ...(overrides.outputDirs ?? {}) },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));

  const config: AppConfig = {
    ...merged,
    classifier: {
      ...merged.classifier,
      modelThreshold: toFloat(env.MODEL_THRESHOLD, merged.classifier.modelThreshold),
      ruleThreshold: toFloat(env.RULE_THRESHOLD, merged.classifier.ruleThreshold),
    },
    retry: {
      maxAttempts: toInt(env.MAX_ATTEMPTS, merged.retry.maxAttempts),
      baseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retry.baseDelayMs),
      maxDelayMs: toInt(env.RETRY_MAX_DELAY_MS, merged.retry.maxDelayMs),
    },
    validation: {
      confidenceFloor: toFloat(env.CONFIDENCE_FLOOR, merged.validation.confidenceFloor),
    },
    modelTimeoutMs: toInt(env.MODEL_TIMEOUT_MS, merged.modelTimeoutMs),
    workerConcurrency: toInt(env.WORKER_CONCURRENCY, merged.workerConcurrency),
    model: {
      mode: env.MODEL_MODE === "none" || env.MODEL_MODE === "http" ? env.MODEL_MODE : merged.model.mode,
      httpBaseUrl: env.MODEL_HTTP_BASE_URL ?? merged.model.httpBaseUrl,
      httpToken: env.MODEL_HTTP_TOKEN ?? merged.model.httpToken,
    },
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };

  assertSchemaComplete(config.requiredFields);
  return config;
}

export { DEFAULT_CONFIG };
