import { z } from "zod";

import { LabValidationError } from "./errors.js";

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;
export const SCAFFOLDING_LEVELS = ["low", "medium", "high"] as const;
export const EXERCISE_KINDS = ["guided", "challenge", "exploration"] as const;

export const MIN_ESTIMATED_MINUTES = 15;
export const MAX_ESTIMATED_MINUTES = 180;
export const MAX_HINT_COUNT = 5;

export const DifficultySchema = z.enum(DIFFICULTIES);
export const ScaffoldingLevelSchema = z.enum(SCAFFOLDING_LEVELS);
export const ExerciseKindSchema = z.enum(EXERCISE_KINDS);

export const TestCaseSchema = z.object({
  input: z.string(),
  expected: z.string()
});

export const ExerciseSchema = z.object({
  kind: ExerciseKindSchema,
  hintCount: z.number().int().min(0).max(MAX_HINT_COUNT),
  description: z.string().optional(),
  starterCode: z.string().optional(),
  solution: z.string().optional(),
  testCases: z.array(TestCaseSchema).default([])
});

export const SectionSchema = z.object({
  conceptName: z.string().trim().min(1, "conceptName must not be empty"),
  title: z.string(),
  difficulty: DifficultySchema,
  scaffoldingLevel: ScaffoldingLevelSchema,
  exercises: z.array(ExerciseSchema).min(1, "a section needs at least one exercise"),
  learningObjectives: z.array(z.string()).optional(),
  background: z.string().optional()
});

export const LabSchema = z.object({
  title: z.string(),
  topic: z.string(),
  difficulty: DifficultySchema,
  estimatedMinutes: z.number().int().min(MIN_ESTIMATED_MINUTES).max(MAX_ESTIMATED_MINUTES),
  sections: z.array(SectionSchema).min(1, "a lab needs at least one section"),
  prerequisites: z.array(z.string()).optional(),
  technologies: z.array(z.string()).optional(),
  personalizationContext: z.string().optional()
});

export type Difficulty = z.infer<typeof DifficultySchema>;
export type ScaffoldingLevel = z.infer<typeof ScaffoldingLevelSchema>;
export type ExerciseKind = z.infer<typeof ExerciseKindSchema>;
export type TestCase = z.infer<typeof TestCaseSchema>;
export type Exercise = z.infer<typeof ExerciseSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type Lab = z.infer<typeof LabSchema>;

export type ExerciseInput = z.input<typeof ExerciseSchema>;
export type SectionInput = z.input<typeof SectionSchema>;
export type LabInput = z.input<typeof LabSchema>;

export function createExercise(input: ExerciseInput): Exercise {
  return validate("exercise", ExerciseSchema, input);
}

export function createSection(input: SectionInput): Section {
  return validate("section", SectionSchema, input);
}

export function createLab(input: LabInput): Lab {
  return validate("lab", LabSchema, input);
}

/**
 * Validates an untrusted value (a model reply, a file read back from disk) into a Lab.
 * Unknown keys are dropped.
 */
export function parseLab(value: unknown): Lab {
  return validate("lab", LabSchema, value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DifficultySchema.safeParse(value).success;
}

function validate<T extends z.ZodTypeAny>(entity: string, schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new LabValidationError(entity, result.error.issues.map(formatIssue));
  }
  return result.data;
}

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${location}: ${issue.message}`;
}
