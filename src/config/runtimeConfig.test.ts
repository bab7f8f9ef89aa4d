import { ConfigurationError } from "../domain/errors.js";
import { assertGeneratorReady, loadRuntimeConfig, parseGeneratorKind } from "./runtimeConfig.js";

describe("loadRuntimeConfig", () => {
  it("falls back to the template generator and defaults without a key", () => {
    expect(loadRuntimeConfig({})).toEqual({
      generator: "template",
      gatewayApiKey: undefined,
      gatewayModel: "openai/gpt-4o",
      temperature: 0.7,
      maxOutputTokens: 4096,
      requestTimeoutMs: 90000,
      exportPath: "data/knowledge_export.json",
      outputDirectory: "batch_output",
      verboseLogs: true
    });
  });

  it("picks the prompted generator when a key is present", () => {
    const config = loadRuntimeConfig({ AI_GATEWAY_API_KEY: " test-secret ", AI_GATEWAY_MODEL: "openai/gpt-4o-mini" });

    expect(config.generator).toBe("prompted");
    expect(config.gatewayApiKey).toBe("test-secret");
    expect(config.gatewayModel).toBe("openai/gpt-4o-mini");
  });

  it("honours an explicit template choice even with a key", () => {
    const config = loadRuntimeConfig({ AI_GATEWAY_API_KEY: "test-secret", LABGEN_GENERATOR: "template" });
    expect(config.generator).toBe("template");
  });

  it("leaves the key check to assertGeneratorReady", () => {
    const config = loadRuntimeConfig({ LABGEN_GENERATOR: "prompted" });

    expect(config.generator).toBe("prompted");
    expect(() => assertGeneratorReady(config)).toThrow(
      "AI_GATEWAY_API_KEY is required for the prompted generator. Set LABGEN_GENERATOR=template to run without API calls."
    );
  });

  it("validates numeric ranges", () => {
    expect(() => loadRuntimeConfig({ LABGEN_TEMPERATURE: "1.5" })).toThrow(
      "LABGEN_TEMPERATURE must be a number between 0 and 1. Received: 1.5"
    );
    expect(() => loadRuntimeConfig({ LABGEN_REQUEST_TIMEOUT_MS: "10" })).toThrow(
      "LABGEN_REQUEST_TIMEOUT_MS must be a number greater than or equal to 1000. Received: 10"
    );
    expect(loadRuntimeConfig({ LABGEN_TEMPERATURE: "0" }).temperature).toBe(0);
  });

  it("reads booleans", () => {
    expect(loadRuntimeConfig({ LABGEN_VERBOSE_LOGS: "off" }).verboseLogs).toBe(false);
    expect(() => loadRuntimeConfig({ LABGEN_VERBOSE_LOGS: "maybe" })).toThrow(ConfigurationError);
  });
});

describe("parseGeneratorKind", () => {
  it("resolves auto from the key", () => {
    expect(parseGeneratorKind("AUTO", "test-secret")).toBe("prompted");
    expect(parseGeneratorKind("auto", undefined)).toBe("template");
  });

  it("rejects unknown generators", () => {
    expect(() => parseGeneratorKind("markov", undefined)).toThrow(
      "Generator must be one of template, prompted or auto. Received: markov"
    );
  });
});
