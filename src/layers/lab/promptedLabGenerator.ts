import { TextGenerationService } from "../../agents/runtime/textGenerationService.js";
import { ConfigurationError, formatError } from "../../domain/errors.js";
import { MAX_ESTIMATED_MINUTES, MAX_HINT_COUNT, MIN_ESTIMATED_MINUTES, parseLab } from "../../domain/labSchema.js";
import { GenerationResult, Lab, LabGenerationRequest } from "../../domain/models.js";
import { withTimeout } from "../../utils/async.js";
import { isJsonObject, parseJsonFromModelText } from "../../utils/json.js";
import { normalizeWhitespace } from "../../utils/text.js";
import { buildFailedGeneration, buildMetadata, LabGenerator, personalizationOf } from "./labGenerator.js";

export const DEFAULT_PROMPTED_TEMPERATURE = 0.7;
export const DEFAULT_PROMPTED_TIMEOUT_MS = 90_000;

const LAB_OUTPUT_SCHEMA = [
  "{",
  '  "title": string,',
  '  "topic": string,',
  '  "difficulty": "easy|medium|hard",',
  `  "estimatedMinutes": number (${MIN_ESTIMATED_MINUTES}-${MAX_ESTIMATED_MINUTES}),`,
  '  "sections": [',
  "    {",
  '      "conceptName": string,',
  '      "title": string,',
  '      "difficulty": "easy|medium|hard",',
  '      "scaffoldingLevel": "low|medium|high",',
  '      "exercises": [',
  "        {",
  '          "kind": "guided|challenge|exploration",',
  `          "hintCount": number (0-${MAX_HINT_COUNT}),`,
  '          "description": string,',
  '          "starterCode": string,',
  '          "solution": string,',
  '          "testCases": [{ "input": string, "expected": string }]',
  "        }",
  "      ],",
  '      "learningObjectives": string[],',
  '      "background": string',
  "    }",
  "  ],",
  '  "prerequisites": string[],',
  '  "technologies": string[],',
  '  "personalizationContext": string | null',
  "}"
].join("\n");

export interface PromptedLabGeneratorOptions {
  temperature?: number;
  requestTimeoutMs?: number;
  verboseLogs?: boolean;
}

export class PromptedLabGenerator implements LabGenerator {
  readonly name = "prompted";
  private readonly temperature: number;
  private readonly requestTimeoutMs: number;
  private readonly verboseLogs: boolean;

  constructor(
    private readonly service: TextGenerationService,
    options: PromptedLabGeneratorOptions = {}
  ) {
    const temperature = options.temperature ?? DEFAULT_PROMPTED_TEMPERATURE;
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
      throw new ConfigurationError(`Temperature must be between 0 and 1. Received: ${temperature}`);
    }

    this.temperature = temperature;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_PROMPTED_TIMEOUT_MS;
    this.verboseLogs = options.verboseLogs ?? false;
  }

  async generate(request: LabGenerationRequest): Promise<GenerationResult> {
    const startedAtMs = Date.now();
    const personalization = personalizationOf(request);

    try {
      const prompt = buildLabPrompt(request);
      const rawText = await withTimeout(
        this.service.generate(prompt, { temperature: this.temperature }),
        this.requestTimeoutMs,
        `Lab generation for ${request.conceptName}`
      );
      const lab = this.parseLabReply(rawText, request.topic, personalization);

      if (this.verboseLogs) {
        console.log(
          `[generator:prompted] ${request.conceptName} via ${this.service.modelId} in ${Date.now() - startedAtMs}ms`
        );
      }

      return {
        succeeded: true,
        lab,
        metadata: buildMetadata(request, this.service.modelId, personalization !== undefined)
      };
    } catch (error) {
      console.warn(`[generator:prompted] Falling back for ${request.conceptName}: ${formatError(error)}`);
      return buildFailedGeneration(request, this.service.modelId, error);
    }
  }

  private parseLabReply(rawText: string, topic: string, personalization: string | undefined): Lab {
    const root = parseJsonFromModelText(rawText);
    if (!isJsonObject(root)) {
      throw new Error("Model response was not a JSON object.");
    }

    const { personalizationContext: _modelContext, ...labFields } = root;
    return parseLab({
      ...labFields,
      topic: typeof labFields.topic === "string" && labFields.topic.trim() ? labFields.topic : topic,
      ...(personalization ? { personalizationContext: personalization } : {})
    });
  }
}

export function buildLabPrompt(request: LabGenerationRequest): string {
  const personalization = personalizationOf(request);
  const lines = [
    "Generate a hands-on coding lab for the following concept.",
    "",
    `Concept: ${request.conceptName}`,
    `Definition: ${normalizeWhitespace(request.conceptDefinition) || "(no definition provided)"}`,
    `Topic: ${request.topic}`
  ];

  if (personalization) {
    lines.push(
      "",
      `Personalization context: ${personalization}`,
      `Theme every example, dataset and scenario in the lab around "${personalization}" so it feels relatable to the learner.`
    );
  }

  lines.push(
    "",
    "Lab requirements:",
    "- An engaging title that captures the essence of the concept.",
    "- Overall difficulty: easy, medium or hard, based on the concept's complexity.",
    `- A realistic estimated completion time between ${MIN_ESTIMATED_MINUTES} and ${MAX_ESTIMATED_MINUTES} minutes.`,
    "- 1 to 3 sections, each exploring one aspect of the concept with its own difficulty and scaffolding level.",
    `- 1 to 3 exercises per section: guided (step-by-step), challenge (minimal guidance) or exploration (open-ended), each with 0 to ${MAX_HINT_COUNT} hints, a description, starter code, a reference solution and test cases.`,
    "- Prerequisites and technologies used.",
    "",
    "Return ONLY valid JSON matching this exact structure:",
    LAB_OUTPUT_SCHEMA
  );

  return lines.join("\n");
}
