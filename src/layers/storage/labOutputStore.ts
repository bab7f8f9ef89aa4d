import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { parseLab } from "../../domain/labSchema.js";
import {
  FullLabArtifact,
  GenerationResult,
  GenerationSummaryReport,
  Lab,
  LabSummaryEntry,
  SavedLabFiles
} from "../../domain/models.js";
import { sanitizeFileName } from "../../utils/text.js";

export const SIMPLIFIED_LAB_FILENAME = "lab_content.json";
export const SUMMARY_REPORT_FILENAME = "generation_summary.json";

export function toFullLabArtifact(result: GenerationResult): FullLabArtifact {
  const artifact: FullLabArtifact = {
    lab: result.lab,
    metadata: result.metadata,
    success: result.succeeded
  };

  if (!result.succeeded) {
    artifact.error = result.errorMessage;
  }

  return artifact;
}

export function buildSummaryReport(results: GenerationResult[]): GenerationSummaryReport {
  const successful = results.filter((result) => result.succeeded).length;

  return {
    totalLabs: results.length,
    successful,
    failed: results.length - successful,
    labs: results.map((result) => {
      const entry: LabSummaryEntry = {
        concept: result.metadata.conceptName,
        topic: result.metadata.sourceTopic,
        title: result.lab.title,
        difficulty: result.lab.difficulty,
        estimatedTime: result.lab.estimatedMinutes,
        numSections: result.lab.sections.length,
        success: result.succeeded
      };

      if (!result.succeeded) {
        entry.error = result.errorMessage;
      }

      return entry;
    })
  };
}

export class LabOutputStore {
  constructor(private readonly outputDirectory: string) {}

  get directoryPath(): string {
    return this.outputDirectory;
  }

  async persistResult(result: GenerationResult): Promise<SavedLabFiles> {
    const folderName = sanitizeFileName(result.metadata.conceptName);
    if (!folderName) {
      throw new Error(`Concept name "${result.metadata.conceptName}" leaves no usable directory name.`);
    }

    const conceptDirectory = path.join(this.outputDirectory, folderName);
    await mkdir(conceptDirectory, { recursive: true });

    const fullLabFile = await this.writeJson(
      path.join(conceptDirectory, `${folderName}_lab.json`),
      toFullLabArtifact(result)
    );
    const simplifiedFile = await this.writeJson(path.join(conceptDirectory, SIMPLIFIED_LAB_FILENAME), result.lab);

    return {
      conceptDirectory,
      fullLabFile,
      simplifiedFile
    };
  }

  async persistSummary(results: GenerationResult[]): Promise<string> {
    await mkdir(this.outputDirectory, { recursive: true });
    return this.writeJson(path.join(this.outputDirectory, SUMMARY_REPORT_FILENAME), buildSummaryReport(results));
  }

  async loadSimplifiedLab(filePath: string): Promise<Lab> {
    const raw = await readFile(filePath, "utf8");
    return parseLab(JSON.parse(raw));
  }

  private async writeJson(filePath: string, value: unknown): Promise<string> {
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}
