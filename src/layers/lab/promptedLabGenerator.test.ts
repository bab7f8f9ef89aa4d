import { TextGenerationOptions, TextGenerationService } from "../../agents/runtime/textGenerationService.js";
import { ConfigurationError } from "../../domain/errors.js";
import { parseLab } from "../../domain/labSchema.js";
import { GenerationResult, LabGenerationRequest } from "../../domain/models.js";
import { buildFallbackLab } from "./labGenerator.js";
import { buildLabPrompt, PromptedLabGenerator } from "./promptedLabGenerator.js";

type Responder = (prompt: string) => Promise<string>;

class FakeTextGenerationService implements TextGenerationService {
  readonly modelId = "fake/lab-model";
  readonly calls: Array<{ prompt: string; options?: TextGenerationOptions }> = [];

  constructor(private readonly respond: Responder) {}

  generate(prompt: string, options?: TextGenerationOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.respond(prompt);
  }
}

const request: LabGenerationRequest = {
  conceptName: "NoSQL Database",
  conceptDefinition: "non-relational databases based on distributed file systems",
  topic: "Introduction to NoSQL Databases",
  personalizationContext: "gaming"
};

const modelLab = {
  title: "Leaderboards Without Tables",
  topic: "Introduction to NoSQL Databases",
  difficulty: "medium",
  estimatedMinutes: 75,
  sections: [
    {
      conceptName: "NoSQL Database",
      title: "Storing Player Profiles",
      difficulty: "easy",
      scaffoldingLevel: "high",
      exercises: [
        {
          kind: "guided",
          hintCount: 3,
          description: "Insert player documents",
          starterCode: "players = []\n",
          solution: "players.append({'name': 'Ada'})\n",
          testCases: [{ input: "len(players)", expected: "1" }]
        }
      ],
      learningObjectives: ["Model a player document"],
      background: "Document stores keep related fields together."
    },
    {
      conceptName: "NoSQL Database",
      title: "Querying Leaderboards",
      difficulty: "medium",
      scaffoldingLevel: "low",
      exercises: [{ kind: "exploration", hintCount: 0, description: "Rank players by score" }]
    }
  ],
  prerequisites: ["Python basics"],
  technologies: ["Python", "MongoDB"],
  personalizationContext: null
};

function replyWith(value: unknown): Responder {
  return async () => JSON.stringify(value);
}

function expectFallback(result: GenerationResult, message: string | RegExp): void {
  expect(result.succeeded).toBe(false);
  if (result.succeeded) {
    return;
  }

  if (typeof message === "string") {
    expect(result.errorMessage).toBe(message);
  } else {
    expect(result.errorMessage).toMatch(message);
  }
  expect(result.lab).toEqual(buildFallbackLab(request.conceptName, request.topic));
  expect(() => parseLab(result.lab)).not.toThrow();
  expect(result.metadata.generatorUsed).toBe("fake/lab-model");
  expect(result.metadata.personalizationApplied).toBe(false);
}

describe("PromptedLabGenerator", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("buildLabPrompt", () => {
    it("embeds the concept and the personalization instruction", () => {
      const prompt = buildLabPrompt(request);

      expect(prompt).toContain("Concept: NoSQL Database");
      expect(prompt).toContain("Definition: non-relational databases based on distributed file systems");
      expect(prompt).toContain("Topic: Introduction to NoSQL Databases");
      expect(prompt).toContain("Personalization context: gaming");
      expect(prompt).toContain('Theme every example, dataset and scenario in the lab around "gaming"');
    });

    it("embeds the target JSON shape", () => {
      const prompt = buildLabPrompt(request);

      expect(prompt).toContain('"estimatedMinutes": number (15-180),');
      expect(prompt).toContain('"scaffoldingLevel": "low|medium|high",');
      expect(prompt).toContain('"kind": "guided|challenge|exploration",');
      expect(prompt).toContain('"hintCount": number (0-5),');
    });

    it("omits personalization when none is requested", () => {
      const prompt = buildLabPrompt({ ...request, personalizationContext: undefined });
      expect(prompt).not.toContain("Personalization context");
    });
  });

  describe("generate", () => {
    it("parses a valid reply into a lab", async () => {
      const service = new FakeTextGenerationService(replyWith(modelLab));
      const generator = new PromptedLabGenerator(service, { temperature: 0.3 });

      const result = await generator.generate(request);

      expect(result.succeeded).toBe(true);
      expect(result.lab.title).toBe("Leaderboards Without Tables");
      expect(result.lab.estimatedMinutes).toBe(75);
      expect(result.lab.sections.map((section) => section.title)).toEqual([
        "Storing Player Profiles",
        "Querying Leaderboards"
      ]);
      expect(result.lab.sections[1].exercises[0]).toEqual({
        kind: "exploration",
        hintCount: 0,
        description: "Rank players by score",
        testCases: []
      });
      expect(result.lab.personalizationContext).toBe("gaming");
      expect(result.metadata).toEqual({
        conceptName: "NoSQL Database",
        conceptDefinition: "non-relational databases based on distributed file systems",
        sourceTopic: "Introduction to NoSQL Databases",
        generatorUsed: "fake/lab-model",
        personalizationApplied: true
      });
      expect(service.calls).toHaveLength(1);
      expect(service.calls[0].options).toEqual({ temperature: 0.3 });
      expect(service.calls[0].prompt).toBe(buildLabPrompt(request));
    });

    it("accepts a reply wrapped in a fenced block and fills a missing topic", async () => {
      const { topic: _topic, ...withoutTopic } = modelLab;
      const service = new FakeTextGenerationService(
        async () => `Here is your lab:\n\`\`\`json\n${JSON.stringify(withoutTopic)}\n\`\`\``
      );

      const result = await new PromptedLabGenerator(service).generate({
        ...request,
        topic: "Document Stores",
        personalizationContext: undefined
      });

      expect(result.succeeded).toBe(true);
      expect(result.lab.topic).toBe("Document Stores");
      expect(result.lab).not.toHaveProperty("personalizationContext");
      expect(result.metadata.personalizationApplied).toBe(false);
    });

    it("falls back when the service fails", async () => {
      const service = new FakeTextGenerationService(async () => {
        throw new Error("gateway unavailable");
      });

      expectFallback(await new PromptedLabGenerator(service).generate(request), "gateway unavailable");
    });

    it("falls back on an empty reply", async () => {
      const service = new FakeTextGenerationService(async () => "");
      expectFallback(await new PromptedLabGenerator(service).generate(request), "Model returned an empty response.");
    });

    it("falls back on malformed JSON", async () => {
      const service = new FakeTextGenerationService(async () => "{ title: 'not quite json' ");
      expectFallback(
        await new PromptedLabGenerator(service).generate(request),
        "Model response did not contain valid JSON."
      );
    });

    it("falls back when the reply is not an object", async () => {
      const service = new FakeTextGenerationService(replyWith([modelLab]));
      expectFallback(await new PromptedLabGenerator(service).generate(request), "Model response was not a JSON object.");
    });

    it("falls back when a value is out of range", async () => {
      const invalid = {
        ...modelLab,
        sections: [{ ...modelLab.sections[0], exercises: [{ kind: "guided", hintCount: 9 }] }]
      };
      const service = new FakeTextGenerationService(replyWith(invalid));

      expectFallback(
        await new PromptedLabGenerator(service).generate(request),
        /^Invalid lab: sections\.0\.exercises\.0\.hintCount: /
      );
    });

    it("falls back when a required field is missing", async () => {
      const { sections: _sections, ...withoutSections } = modelLab;
      const service = new FakeTextGenerationService(replyWith(withoutSections));

      expectFallback(await new PromptedLabGenerator(service).generate(request), /^Invalid lab: sections: /);
    });

    it("falls back when the service does not answer in time", async () => {
      const service = new FakeTextGenerationService(() => new Promise<string>(() => undefined));
      const generator = new PromptedLabGenerator(service, { requestTimeoutMs: 20 });

      expectFallback(await generator.generate(request), "Lab generation for NoSQL Database timed out after 20ms.");
    });
  });

  it("rejects a temperature outside 0-1", () => {
    const service = new FakeTextGenerationService(replyWith(modelLab));

    expect(() => new PromptedLabGenerator(service, { temperature: 1.2 })).toThrow(ConfigurationError);
    expect(() => new PromptedLabGenerator(service, { temperature: -0.1 })).toThrow(ConfigurationError);
  });
});
