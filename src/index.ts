#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";

import { GatewayTextGenerationService } from "./agents/runtime/textGenerationService.js";
import { applyCliOverrides, parseCliArguments, USAGE } from "./config/cliArguments.js";
import { loadRuntimeConfig, RuntimeConfig } from "./config/runtimeConfig.js";
import { ConceptNotFoundError } from "./domain/errors.js";
import { loadConceptsFromExport } from "./layers/input/conceptSourceReader.js";
import { LabGenerator } from "./layers/lab/labGenerator.js";
import { PromptedLabGenerator } from "./layers/lab/promptedLabGenerator.js";
import { TemplateLabGenerator } from "./layers/lab/templateLabGenerator.js";
import { LabIngestionService } from "./layers/orchestration/labIngestionService.js";
import { LabOutputStore } from "./layers/storage/labOutputStore.js";

function createGenerator(config: RuntimeConfig): LabGenerator {
  if (config.generator === "template") {
    return new TemplateLabGenerator();
  }

  const service = new GatewayTextGenerationService({
    apiKey: config.gatewayApiKey,
    model: config.gatewayModel,
    maxOutputTokens: config.maxOutputTokens,
    requestTimeoutMs: config.requestTimeoutMs,
    verboseLogs: config.verboseLogs
  });

  return new PromptedLabGenerator(service, {
    temperature: config.temperature,
    requestTimeoutMs: config.requestTimeoutMs,
    verboseLogs: config.verboseLogs
  });
}

async function main(): Promise<void> {
  const args = parseCliArguments(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const runtimeConfig = applyCliOverrides(loadRuntimeConfig(), args);
  const exportPath = path.resolve(process.cwd(), runtimeConfig.exportPath);
  const outputDirectory = path.resolve(process.cwd(), runtimeConfig.outputDirectory);

  const generator = createGenerator(runtimeConfig);
  const ingestion = new LabIngestionService({
    generator,
    storageLayer: new LabOutputStore(outputDirectory),
    verboseLogs: runtimeConfig.verboseLogs
  });

  console.log(
    `[bootstrap] Lab generation in ${args.mode} mode with the ${generator.name} generator` +
      (runtimeConfig.generator === "prompted" ? ` (${runtimeConfig.gatewayModel})` : "")
  );
  if (args.personalize) {
    console.log(`[bootstrap] Personalization context: ${args.personalize}`);
  }

  const concepts = await loadConceptsFromExport(exportPath);
  console.log(`[bootstrap] Loaded ${concepts.length} concepts from ${exportPath}`);

  if (args.mode === "single") {
    const conceptName = args.concept ?? "";
    try {
      const outcome = await ingestion.generateFromExport(concepts, conceptName, args.personalize);
      console.log(outcome.result.succeeded ? "Lab generated." : `Fallback lab used: ${outcome.result.errorMessage}`);
      if (outcome.savedFiles) {
        console.log(`  Full lab: ${outcome.savedFiles.fullLabFile}`);
        console.log(`  Lab content: ${outcome.savedFiles.simplifiedFile}`);
      }
    } catch (error) {
      if (error instanceof ConceptNotFoundError) {
        console.error(error.message);
        process.exitCode = 1;
        return;
      }
      throw error;
    }
    return;
  }

  const batch = await ingestion.generateBatch(concepts, {
    personalizationContext: args.personalize,
    limit: args.limit
  });

  console.log("Batch lab generation summary:");
  console.log(`  Total concepts: ${batch.totalConcepts}`);
  console.log(`  Successful: ${batch.successful}`);
  console.log(`  Failed: ${batch.failed}`);
  console.log(`  Processing time: ${(batch.processingTimeMs / 1000).toFixed(2)}s`);
  console.log(`  Summary report: ${batch.summaryPath}`);
  console.log(`  Output directory: ${outputDirectory}`);
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`Lab generation failed: ${error.message}`);
  } else {
    console.error("Lab generation failed due to an unknown error.");
  }

  process.exitCode = 1;
});
