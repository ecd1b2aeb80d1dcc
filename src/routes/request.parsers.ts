import { ValidationError } from "../shared/errors";
import { DocumentType, MatchFilter, ScoringStrategy } from "../shared/types/matching.types";
import { isRecord } from "../shared/utils/type-guards";

export interface DocumentRequest {
  id: string;
  docType: DocumentType;
}

export interface MatchRequest extends DocumentRequest {
  filters: Set<MatchFilter>;
  scoring: ScoringStrategy;
}

const FILTER_FIELDS: ReadonlyArray<[string, MatchFilter]> = [
  ["salary_match", "salary"],
  ["top_skill_match", "skill"],
  ["seniority_match", "seniority"],
];

export function parseDocumentRequest(raw: unknown): DocumentRequest {
  const source = isRecord(raw) ? raw : {};
  const errors: string[] = [];
  const id = readId(source.id, errors);
  const docType = readDocType(source.doc_type, errors);
  if (errors.length > 0 || id === null || docType === null) {
    throw new ValidationError("Validation error", errors);
  }
  return { id, docType };
}

export function parseMatchRequest(raw: unknown): MatchRequest {
  if (!isRecord(raw)) {
    throw new ValidationError("Validation error", ["body: must be a JSON object"]);
  }
  const errors: string[] = [];
  const id = readId(raw.id, errors);
  const docType = readDocType(raw.doc_type, errors);
  const filters = readFilters(raw.filters, errors);
  const scoring = readScoring(raw.scoring, errors);
  if (errors.length > 0 || id === null || docType === null || filters === null || scoring === null) {
    throw new ValidationError("Validation error", errors);
  }
  return { id, docType, filters, scoring };
}

function readId(value: unknown, errors: string[]): string | null {
  if (typeof value !== "string" || !value.trim()) {
    errors.push("id: is required");
    return null;
  }
  return value.trim();
}

function readDocType(value: unknown, errors: string[]): DocumentType | null {
  if (value === "job" || value === "candidate") {
    return value;
  }
  errors.push("doc_type: must be one of job, candidate");
  return null;
}

function readFilters(value: unknown, errors: string[]): Set<MatchFilter> | null {
  if (!isRecord(value)) {
    errors.push("filters: is required");
    return null;
  }
  const filters = new Set<MatchFilter>();
  let valid = true;
  for (const [field, filter] of FILTER_FIELDS) {
    const flag = value[field];
    if (flag === undefined) {
      continue;
    }
    if (typeof flag !== "boolean") {
      errors.push(`filters.${field}: must be a boolean`);
      valid = false;
      continue;
    }
    if (flag) {
      filters.add(filter);
    }
  }
  return valid ? filters : null;
}

function readScoring(value: unknown, errors: string[]): ScoringStrategy | null {
  if (value === undefined) {
    return "index";
  }
  if (value === "index" || value === "weighted") {
    return value;
  }
  errors.push("scoring: must be one of index, weighted");
  return null;
}
