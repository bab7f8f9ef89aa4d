export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SourceNotFoundError extends Error {
  constructor(
    readonly sourcePath: string,
    reason: string
  ) {
    super(`Concept export could not be loaded from ${sourcePath}: ${reason}`);
    this.name = "SourceNotFoundError";
  }
}

export class ConceptNotFoundError extends Error {
  constructor(readonly conceptName: string) {
    super(`Concept "${conceptName}" was not found in the loaded export.`);
    this.name = "ConceptNotFoundError";
  }
}

export class LabValidationError extends Error {
  constructor(
    readonly entity: string,
    readonly issues: string[]
  ) {
    super(`Invalid ${entity}: ${issues.join("; ")}`);
    this.name = "LabValidationError";
  }
}

export function formatError(value: unknown): string {
  if (value instanceof Error && value.message) {
    return value.message;
  }
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return "Unknown runtime error.";
}
