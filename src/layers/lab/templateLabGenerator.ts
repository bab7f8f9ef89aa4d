import { createExercise, createLab, createSection, isDifficulty } from "../../domain/labSchema.js";
import { Difficulty, Exercise, GenerationResult, LabGenerationRequest } from "../../domain/models.js";
import { formatError } from "../../domain/errors.js";
import { titleCase } from "../../utils/text.js";
import {
  buildFailedGeneration,
  buildMetadata,
  DEFAULT_TECHNOLOGIES,
  LabGenerator,
  personalizationOf
} from "./labGenerator.js";

export const TEMPLATE_GENERATOR_ID = "template";

/** Checked in order; the first keyword found wins. */
export const DIFFICULTY_KEYWORDS: ReadonlyArray<readonly [keyword: string, difficulty: Difficulty]> = [
  ["database", "medium"],
  ["algorithm", "hard"],
  ["system", "hard"],
  ["data", "easy"],
  ["processing", "medium"],
  ["analysis", "medium"],
  ["storage", "easy"],
  ["framework", "medium"],
  ["model", "hard"],
  ["technique", "medium"]
];

const BASE_MINUTES: Record<Difficulty, number> = {
  easy: 30,
  medium: 45,
  hard: 60
};
const DEFAULT_BASE_MINUTES = 45;
const MINUTES_PER_EXTRA_SECTION = 15;

export const DEFAULT_TEMPLATE_PREREQUISITES = ["Basic programming knowledge", "Understanding of databases"];

/**
 * Keyword table against the concept name first, then against the definition, then length of
 * the definition (> 200 hard, > 100 medium, otherwise easy).
 *
 * The scan is text-major on purpose: a keyword in the name outranks an earlier table keyword
 * that only appears in the definition, unlike a keyword-major scan over both strings.
 */
export function classifyDifficulty(conceptName: string, definition: string): Difficulty {
  for (const text of [conceptName.toLowerCase(), definition.toLowerCase()]) {
    const match = DIFFICULTY_KEYWORDS.find(([keyword]) => text.includes(keyword));
    if (match) {
      return match[1];
    }
  }

  if (definition.length > 200) {
    return "hard";
  }
  if (definition.length > 100) {
    return "medium";
  }
  return "easy";
}

export function estimateMinutes(difficulty: string, sectionCount: number): number {
  const base = isDifficulty(difficulty) ? BASE_MINUTES[difficulty] : DEFAULT_BASE_MINUTES;
  return base + (sectionCount - 1) * MINUTES_PER_EXTRA_SECTION;
}

export function buildTemplateExercises(conceptName: string, difficulty: Difficulty): Exercise[] {
  const exercises = [
    createExercise({
      kind: "guided",
      hintCount: difficulty === "easy" ? 3 : 2,
      description: `Implement a basic example demonstrating ${conceptName}`,
      starterCode: `# Implement ${conceptName}\n# Your code here\n`,
      solution: `# Solution for ${conceptName}\n# Implementation details\n`,
      testCases: [{ input: "test_input", expected: "expected_output" }]
    })
  ];

  if (difficulty !== "easy") {
    exercises.push(
      createExercise({
        kind: "challenge",
        hintCount: 1,
        description: `Apply ${conceptName} to solve a real-world problem`,
        starterCode: `# Challenge: Advanced ${conceptName}\n`,
        solution: "# Advanced solution\n",
        testCases: []
      })
    );
  }

  return exercises;
}

export function buildLabTitle(conceptName: string, personalizationContext?: string): string {
  const context = personalizationContext?.trim();
  return context ? `Hands-On Lab: ${conceptName} in ${titleCase(context)}` : `Hands-On Lab: ${conceptName}`;
}

export interface TemplateLabGeneratorOptions {
  prerequisites?: string[];
  technologies?: string[];
}

export class TemplateLabGenerator implements LabGenerator {
  readonly name = TEMPLATE_GENERATOR_ID;
  private readonly prerequisites: string[];
  private readonly technologies: string[];

  constructor(options: TemplateLabGeneratorOptions = {}) {
    this.prerequisites = options.prerequisites ?? DEFAULT_TEMPLATE_PREREQUISITES;
    this.technologies = options.technologies ?? DEFAULT_TECHNOLOGIES;
  }

  async generate(request: LabGenerationRequest): Promise<GenerationResult> {
    try {
      return this.buildLab(request);
    } catch (error) {
      console.warn(`[generator:template] Falling back for ${request.conceptName || "(unnamed)"}: ${formatError(error)}`);
      return buildFailedGeneration(request, TEMPLATE_GENERATOR_ID, error);
    }
  }

  private buildLab(request: LabGenerationRequest): GenerationResult {
    const { conceptName, conceptDefinition, topic } = request;
    const personalization = personalizationOf(request);
    const difficulty = classifyDifficulty(conceptName, conceptDefinition);

    const section = createSection({
      conceptName,
      title: `Exploring ${conceptName}`,
      difficulty,
      scaffoldingLevel: "medium",
      exercises: buildTemplateExercises(conceptName, difficulty),
      learningObjectives: [
        `Understand the fundamentals of ${conceptName}`,
        `Apply ${conceptName} in practical scenarios`,
        `Implement solutions using ${conceptName}`
      ],
      background: conceptDefinition
    });
    const sections = [section];

    const lab = createLab({
      title: buildLabTitle(conceptName, personalization),
      topic,
      difficulty,
      estimatedMinutes: estimateMinutes(difficulty, sections.length),
      sections,
      prerequisites: [...this.prerequisites],
      technologies: [...this.technologies],
      ...(personalization ? { personalizationContext: personalization } : {})
    });

    return {
      succeeded: true,
      lab,
      metadata: buildMetadata(request, TEMPLATE_GENERATOR_ID, personalization !== undefined)
    };
  }
}
