import type { Difficulty, Lab } from "./labSchema.js";

export type {
  Difficulty,
  Exercise,
  ExerciseKind,
  Lab,
  ScaffoldingLevel,
  Section,
  TestCase
} from "./labSchema.js";

export interface ConceptRecord {
  name: string;
  definition: string;
  topic: string;
}

export interface LabGenerationRequest {
  conceptName: string;
  conceptDefinition: string;
  topic: string;
  personalizationContext?: string;
}

export interface GenerationMetadata {
  conceptName: string;
  conceptDefinition: string;
  sourceTopic: string;
  generatorUsed: string;
  personalizationApplied: boolean;
}

export interface SucceededGeneration {
  succeeded: true;
  lab: Lab;
  metadata: GenerationMetadata;
}

export interface FailedGeneration {
  succeeded: false;
  lab: Lab;
  metadata: GenerationMetadata;
  errorMessage: string;
}

export type GenerationResult = SucceededGeneration | FailedGeneration;

export interface FullLabArtifact {
  lab: Lab;
  metadata: GenerationMetadata;
  success: boolean;
  error?: string;
}

export interface SavedLabFiles {
  conceptDirectory: string;
  fullLabFile: string;
  simplifiedFile: string;
}

export interface LabSummaryEntry {
  concept: string;
  topic: string;
  title: string;
  difficulty: Difficulty;
  estimatedTime: number;
  numSections: number;
  success: boolean;
  error?: string;
}

export interface GenerationSummaryReport {
  totalLabs: number;
  successful: number;
  failed: number;
  labs: LabSummaryEntry[];
}
