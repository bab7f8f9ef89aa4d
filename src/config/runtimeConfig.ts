import { ConfigurationError } from "../domain/errors.js";

export type GeneratorKind = "template" | "prompted";

export interface RuntimeConfig {
  generator: GeneratorKind;
  gatewayApiKey?: string;
  gatewayModel: string;
  temperature: number;
  maxOutputTokens: number;
  requestTimeoutMs: number;
  exportPath: string;
  outputDirectory: string;
  verboseLogs: boolean;
}

type Environment = Record<string, string | undefined>;

const DEFAULT_MODEL = "openai/gpt-4o";

export function loadRuntimeConfig(env: Environment = process.env): RuntimeConfig {
  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  return {
    generator: resolveGenerator(env, gatewayApiKey),
    gatewayApiKey,
    gatewayModel: readString(env, "AI_GATEWAY_MODEL", DEFAULT_MODEL),
    temperature: readNumber(env, "LABGEN_TEMPERATURE", 0.7, 0, 1),
    maxOutputTokens: readNumber(env, "LABGEN_MAX_OUTPUT_TOKENS", 4096, 256),
    requestTimeoutMs: readNumber(env, "LABGEN_REQUEST_TIMEOUT_MS", 90000, 1000),
    exportPath: readString(env, "LABGEN_EXPORT_PATH", "data/knowledge_export.json"),
    outputDirectory: readString(env, "LABGEN_OUTPUT_DIR", "batch_output"),
    verboseLogs: readBoolean(env, "LABGEN_VERBOSE_LOGS", true)
  };
}

/** Run once every override is applied, so a flag can still switch away from `prompted`. */
export function assertGeneratorReady(config: RuntimeConfig): RuntimeConfig {
  if (config.generator === "prompted" && !config.gatewayApiKey) {
    throw new ConfigurationError(
      "AI_GATEWAY_API_KEY is required for the prompted generator. Set LABGEN_GENERATOR=template to run without API calls."
    );
  }
  return config;
}

export function parseGeneratorKind(raw: string, apiKey: string | undefined): GeneratorKind {
  const value = raw.trim().toLowerCase();

  if (value === "template") {
    return "template";
  }
  if (value === "prompted") {
    return "prompted";
  }
  if (value === "auto") {
    return apiKey ? "prompted" : "template";
  }

  throw new ConfigurationError(`Generator must be one of template, prompted or auto. Received: ${raw}`);
}

function resolveGenerator(env: Environment, apiKey: string | undefined): GeneratorKind {
  return parseGeneratorKind(readString(env, "LABGEN_GENERATOR", "auto"), apiKey);
}

function readString(env: Environment, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

function readNumber(env: Environment, name: string, fallback: number, min: number, max = Infinity): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    const range = Number.isFinite(max) ? `between ${min} and ${max}` : `greater than or equal to ${min}`;
    throw new ConfigurationError(`${name} must be a number ${range}. Received: ${raw}`);
  }

  return parsed;
}

function readBoolean(env: Environment, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }

  throw new ConfigurationError(`${name} must be a boolean (true/false). Received: ${raw}`);
}
