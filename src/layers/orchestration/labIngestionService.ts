import { ConceptNotFoundError, formatError } from "../../domain/errors.js";
import { ConceptRecord, GenerationResult, LabGenerationRequest, SavedLabFiles } from "../../domain/models.js";
import { findConceptByName } from "../input/conceptSourceReader.js";
import { buildFailedGeneration, LabGenerator } from "../lab/labGenerator.js";
import { LabOutputStore } from "../storage/labOutputStore.js";

export interface LabIngestionDependencies {
  generator: LabGenerator;
  storageLayer: LabOutputStore;
  verboseLogs?: boolean;
}

export interface SingleLabOutcome {
  result: GenerationResult;
  savedFiles?: SavedLabFiles;
}

export interface BatchOptions {
  personalizationContext?: string;
  /** Only the first `limit` concepts are processed. */
  limit?: number;
}

export interface BatchOutcome {
  totalConcepts: number;
  successful: number;
  failed: number;
  processingTimeMs: number;
  summaryPath: string;
  results: GenerationResult[];
}

export class LabIngestionService {
  constructor(private readonly dependencies: LabIngestionDependencies) {}

  async generateSingleLab(concept: ConceptRecord, personalizationContext?: string): Promise<SingleLabOutcome> {
    const request: LabGenerationRequest = {
      conceptName: concept.name,
      conceptDefinition: concept.definition,
      topic: concept.topic,
      personalizationContext
    };
    const generated = await this.generate(request);

    try {
      const savedFiles = await this.dependencies.storageLayer.persistResult(generated);

      if (generated.succeeded) {
        this.log(`Generated "${generated.lab.title}" -> ${savedFiles.conceptDirectory}`);
      } else {
        this.warn(`Fallback lab saved for ${concept.name}: ${generated.errorMessage}`);
      }

      return { result: generated, savedFiles };
    } catch (error) {
      this.warn(`Could not save the lab for ${concept.name}: ${formatError(error)}`);
      return { result: buildFailedGeneration(request, generated.metadata.generatorUsed, error) };
    }
  }

  async generateFromExport(
    concepts: ConceptRecord[],
    conceptName: string,
    personalizationContext?: string
  ): Promise<SingleLabOutcome> {
    const concept = findConceptByName(concepts, conceptName);
    if (!concept) {
      throw new ConceptNotFoundError(conceptName);
    }

    return this.generateSingleLab(concept, personalizationContext);
  }

  async generateBatch(concepts: ConceptRecord[], options: BatchOptions = {}): Promise<BatchOutcome> {
    const startedAtMs = Date.now();
    const selected = options.limit !== undefined ? concepts.slice(0, Math.max(0, options.limit)) : concepts;
    const results: GenerationResult[] = [];

    if (options.limit !== undefined) {
      this.log(`Limited to the first ${selected.length} of ${concepts.length} concepts`);
    }
    this.log(`Starting lab generation for ${selected.length} concepts with the ${this.dependencies.generator.name} generator`);

    for (const [index, concept] of selected.entries()) {
      if (this.dependencies.verboseLogs) {
        this.log(`Processing ${index + 1}/${selected.length}: ${concept.name}`);
      }

      const outcome = await this.generateSingleLab(concept, options.personalizationContext);
      results.push(outcome.result);
    }

    const summaryPath = await this.dependencies.storageLayer.persistSummary(results);
    const successful = results.filter((result) => result.succeeded).length;
    const processingTimeMs = Date.now() - startedAtMs;

    this.log(
      `Finished ${results.length} concepts in ${processingTimeMs}ms: ${successful} succeeded, ${results.length - successful} failed. Summary: ${summaryPath}`
    );

    return {
      totalConcepts: selected.length,
      successful,
      failed: results.length - successful,
      processingTimeMs,
      summaryPath,
      results
    };
  }

  private async generate(request: LabGenerationRequest): Promise<GenerationResult> {
    const { generator } = this.dependencies;
    try {
      return await generator.generate(request);
    } catch (error) {
      this.warn(`The ${generator.name} generator crashed on ${request.conceptName}: ${formatError(error)}`);
      return buildFailedGeneration(request, generator.name, error);
    }
  }

  private log(message: string): void {
    console.log(`[ingestion] ${message}`);
  }

  private warn(message: string): void {
    console.warn(`[ingestion] ${message}`);
  }
}
