/**
 * Search-side business rules: query validation, defaulting and policy, plus
 * post-processing of results.
 *
 * All functions are pure and idempotent: applying them to their own output
 * changes nothing.
 */
import {
  MATCH_QUALITY_THRESHOLDS,
  MAX_OFFSET,
  MAX_RESULT_SIZE,
  SENSITIVE_FIELDS,
  SORTABLE_FIELDS,
} from "@config/businessRules";
import type {
  Hit,
  SearchQuery,
  SearchResult,
  SortField,
} from "@domain/search/model";
import type { JsonObject } from "@domain/shared/json";
import { ValidationError } from "@typesLocal/AppError";

export type MatchQuality = "high" | "medium" | "low";

const DEFAULT_SORT: SortField = { field: "_score", direction: "desc" };

/**
 * Strips angle brackets, escapes bare double quotes and trims.
 *
 * A minimal clean-up of the text sent to the backend, not an injection
 * filter. Quotes that are already escaped are left alone.
 */
export function sanitizeQuery(text: string): string {
  return text
    .replace(/[<>]/g, "")
    .replace(/(?<!\\)"/g, '\\"')
    .trim();
}

export function isSortableField(field: string): boolean {
  return SORTABLE_FIELDS.has(field);
}

export function validateSearchQuery(query: SearchQuery): void {
  if (query.query.trim() === "") {
    throw new ValidationError("Search query cannot be empty");
  }

  if (query.pagination.limit < 0) {
    throw new ValidationError("Size must be non-negative");
  }

  if (query.pagination.offset < 0) {
    throw new ValidationError("From must be non-negative");
  }
}

export function applySearchBusinessRules(query: SearchQuery): SearchQuery {
  if (query.pagination.offset > MAX_OFFSET) {
    throw new ValidationError(`From offset cannot exceed ${MAX_OFFSET}`, {
      details: `from=${query.pagination.offset}`,
    });
  }

  const text = sanitizeQuery(query.query);
  if (text === "") {
    throw new ValidationError("Search query cannot be empty");
  }

  const sort = query.sort.length > 0 ? query.sort : [DEFAULT_SORT];

  for (const { field } of sort) {
    if (!isSortableField(field)) {
      throw new ValidationError(`Invalid sort field: ${field}`);
    }
  }

  return {
    ...query,
    query: text,
    pagination: {
      offset: query.pagination.offset,
      limit: Math.min(query.pagination.limit, MAX_RESULT_SIZE),
    },
    sort: sort.map((entry) => ({ ...entry })),
  };
}

export function matchQuality(score: number): MatchQuality {
  if (score >= MATCH_QUALITY_THRESHOLDS.high) {
    return "high";
  }

  if (score >= MATCH_QUALITY_THRESHOLDS.medium) {
    return "medium";
  }

  return "low";
}

export function stripSensitiveFields(fields: JsonObject): JsonObject {
  const stripped: JsonObject = { ...fields };

  for (const field of SENSITIVE_FIELDS) {
    delete stripped[field];
  }

  return stripped;
}

function postProcessHit(hit: Hit): Hit {
  return {
    ...hit,
    fields: {
      ...stripSensitiveFields(hit.fields),
      _match_quality: matchQuality(hit.score),
      _source_index: hit.collection,
    },
  };
}

export function postProcessSearchResults(result: SearchResult): SearchResult {
  return {
    ...result,
    hits: result.hits.map(postProcessHit),
  };
}
