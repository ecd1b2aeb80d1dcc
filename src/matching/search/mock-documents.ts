import { readFileSync } from "node:fs";
import path from "node:path";
import { isRecord } from "../../shared/utils/type-guards";
import { SeedDocuments } from "./in-memory-search.index";

export function loadMockDocuments(filePath: string): SeedDocuments {
  const resolved = path.resolve(process.cwd(), filePath);
  const parsed: unknown = JSON.parse(readFileSync(resolved, "utf8"));
  if (!isRecord(parsed)) {
    throw new Error(`Invalid mock documents file: ${resolved}`);
  }
  return {
    jobs: readCollection(parsed.jobs),
    candidates: readCollection(parsed.candidates),
  };
}

function readCollection(value: unknown): Record<string, Record<string, unknown>> {
  const output: Record<string, Record<string, unknown>> = {};
  if (!isRecord(value)) {
    return output;
  }
  for (const [id, source] of Object.entries(value)) {
    if (isRecord(source)) {
      output[id] = source;
    }
  }
  return output;
}
