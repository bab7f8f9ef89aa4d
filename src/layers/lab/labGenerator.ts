import { formatError } from "../../domain/errors.js";
import { createExercise, createLab, createSection } from "../../domain/labSchema.js";
import {
  FailedGeneration,
  GenerationMetadata,
  GenerationResult,
  Lab,
  LabGenerationRequest
} from "../../domain/models.js";

/**
 * A strategy that turns one concept into a lab. Implementations resolve every expected failure
 * into a `succeeded: false` result carrying the fallback lab; the promise only rejects on
 * programming faults.
 */
export interface LabGenerator {
  readonly name: string;
  generate(request: LabGenerationRequest): Promise<GenerationResult>;
}

export const FALLBACK_PREREQUISITES = ["Basic programming knowledge"];
export const DEFAULT_TECHNOLOGIES = ["Python", "Jupyter Notebook"];

const UNNAMED_CONCEPT = "Unnamed concept";

export function buildFallbackLab(conceptName: string, topic: string): Lab {
  const concept = conceptName.trim() || UNNAMED_CONCEPT;

  return createLab({
    title: `Introduction to ${concept}`,
    topic,
    difficulty: "medium",
    estimatedMinutes: 45,
    sections: [
      createSection({
        conceptName: concept,
        title: `Exploring ${concept}`,
        difficulty: "medium",
        scaffoldingLevel: "medium",
        exercises: [
          createExercise({
            kind: "guided",
            hintCount: 3,
            description: `Learn the basics of ${concept}`,
            starterCode: "# Implement your solution here\n",
            solution: "# Solution will be provided",
            testCases: []
          })
        ],
        learningObjectives: [`Understand ${concept}`],
        background: `This lab introduces ${concept}`
      })
    ],
    prerequisites: [...FALLBACK_PREREQUISITES],
    technologies: [...DEFAULT_TECHNOLOGIES]
  });
}

/** The trimmed personalization context, or undefined when none (or only whitespace) was given. */
export function personalizationOf(request: LabGenerationRequest): string | undefined {
  return request.personalizationContext?.trim() || undefined;
}

export function buildMetadata(
  request: LabGenerationRequest,
  generatorUsed: string,
  personalizationApplied: boolean
): GenerationMetadata {
  return {
    conceptName: request.conceptName,
    conceptDefinition: request.conceptDefinition,
    sourceTopic: request.topic,
    generatorUsed,
    personalizationApplied
  };
}

export function buildFailedGeneration(
  request: LabGenerationRequest,
  generatorUsed: string,
  error: unknown
): FailedGeneration {
  return {
    succeeded: false,
    lab: buildFallbackLab(request.conceptName, request.topic),
    metadata: buildMetadata(request, generatorUsed, false),
    errorMessage: formatError(error)
  };
}
