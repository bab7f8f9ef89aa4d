import { readFile } from "node:fs/promises";

import { SourceNotFoundError, formatError } from "../../domain/errors.js";
import { ConceptRecord } from "../../domain/models.js";
import { asObject, asObjectArray } from "../../utils/json.js";

const UNKNOWN_TOPIC = "Unknown";

/**
 * Reads a knowledge export (`{ theories: [{ topic, concepts: [{ name, definition }] }] }`) and
 * flattens it into concept records in source order.
 */
export async function loadConceptsFromExport(exportPath: string): Promise<ConceptRecord[]> {
  let raw: string;
  try {
    raw = await readFile(exportPath, "utf8");
  } catch (error) {
    throw new SourceNotFoundError(exportPath, formatError(error));
  }

  let document: Record<string, unknown>;
  try {
    document = asObject(JSON.parse(raw));
  } catch (error) {
    throw new SourceNotFoundError(exportPath, `not a JSON object (${formatError(error)})`);
  }

  return flattenConceptExport(document);
}

/** Strings are copied as given; only a missing topic or definition gets a default. */
export function flattenConceptExport(document: Record<string, unknown>): ConceptRecord[] {
  const concepts: ConceptRecord[] = [];

  for (const theory of asObjectArray(document.theories)) {
    const topic = readRawString(theory.topic, UNKNOWN_TOPIC);

    for (const concept of asObjectArray(theory.concepts)) {
      const name = readRawString(concept.name, "");
      if (!name.trim()) {
        console.warn(`[input] Skipping a concept without a name under topic "${topic}".`);
        continue;
      }

      concepts.push({
        name,
        definition: readRawString(concept.definition, ""),
        topic
      });
    }
  }

  return concepts;
}

export function findConceptByName(concepts: ConceptRecord[], name: string): ConceptRecord | undefined {
  const target = name.trim().toLowerCase();
  return concepts.find((concept) => concept.name.trim().toLowerCase() === target);
}

function readRawString(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}
