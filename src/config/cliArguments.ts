import { parseArgs } from "node:util";

import { ConfigurationError } from "../domain/errors.js";
import { assertGeneratorReady, parseGeneratorKind, RuntimeConfig } from "./runtimeConfig.js";

export type RunMode = "single" | "batch";

export interface CliArguments {
  mode: RunMode;
  concept?: string;
  exportPath?: string;
  outputDirectory?: string;
  personalize?: string;
  limit?: number;
  generator?: string;
  model?: string;
  temperature?: number;
  help: boolean;
}

export const USAGE = [
  "Usage: concept-lab-generator [options]",
  "",
  "  --mode <single|batch>     Generate one concept or the whole export (default: batch)",
  "  --concept <name>          Concept to generate in single mode (case-insensitive)",
  "  --export-path <file>      Knowledge export JSON file",
  "  --output-dir <dir>        Directory that receives the generated labs",
  "  --personalize <context>   Theme for the labs, e.g. gaming, music, sports",
  "  --limit <n>               Only process the first n concepts",
  "  --generator <kind>        template, prompted or auto",
  "  --model <id>              Gateway model identifier for the prompted generator",
  "  --temperature <0-1>       Sampling temperature for the prompted generator",
  "  -h, --help                Show this message"
].join("\n");

export function parseCliArguments(argv: string[]): CliArguments {
  const { values } = parseArgs({
    args: argv,
    options: {
      mode: { type: "string" },
      concept: { type: "string" },
      "export-path": { type: "string" },
      "output-dir": { type: "string" },
      personalize: { type: "string" },
      limit: { type: "string" },
      generator: { type: "string" },
      model: { type: "string" },
      temperature: { type: "string" },
      help: { type: "boolean", short: "h" }
    },
    strict: true,
    allowPositionals: false
  });

  const mode = values.mode ?? "batch";
  if (mode !== "single" && mode !== "batch") {
    throw new ConfigurationError(`--mode must be single or batch. Received: ${mode}`);
  }
  if (mode === "single" && !values.concept?.trim() && !values.help) {
    throw new ConfigurationError("--concept is required in single mode.");
  }

  return {
    mode,
    concept: values.concept?.trim(),
    exportPath: values["export-path"],
    outputDirectory: values["output-dir"],
    personalize: values.personalize?.trim() || undefined,
    limit: values.limit !== undefined ? parseInteger("--limit", values.limit, 1) : undefined,
    generator: values.generator,
    model: values.model,
    temperature: values.temperature !== undefined ? parseTemperature(values.temperature) : undefined,
    help: values.help ?? false
  };
}

export function applyCliOverrides(config: RuntimeConfig, args: CliArguments): RuntimeConfig {
  return assertGeneratorReady({
    ...config,
    generator: args.generator ? parseGeneratorKind(args.generator, config.gatewayApiKey) : config.generator,
    gatewayModel: args.model ?? config.gatewayModel,
    temperature: args.temperature ?? config.temperature,
    exportPath: args.exportPath ?? config.exportPath,
    outputDirectory: args.outputDirectory ?? config.outputDirectory
  });
}

function parseInteger(flag: string, raw: string, min: number): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${flag} must be an integer greater than or equal to ${min}. Received: ${raw}`);
  }
  return parsed;
}

function parseTemperature(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(`--temperature must be a number between 0 and 1. Received: ${raw}`);
  }
  return parsed;
}
