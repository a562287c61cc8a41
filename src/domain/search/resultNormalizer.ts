/**
 * Reshapes a raw Elasticsearch search reply into a SearchResult.
 *
 * Field-level gaps fall back to defaults. Hit entries lacking any of
 * `_index`, `_id`, `_score` or `_source` are skipped silently; a `_score` of
 * null (field-sorted searches) reads as 0. Only a reply that is not a JSON
 * object at all is an error.
 */
import {
  createSearchResult,
  facetFieldsOf,
  type FacetBucket,
  type Hit,
  type SearchQuery,
  type SearchResult,
} from "@domain/search/model";
import { isJsonObject, type JsonObject } from "@domain/shared/json";
import { DomainError, ErrorCode } from "@typesLocal/AppError";

function numberAt(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  return typeof value === "number" ? value : undefined;
}

function readTotal(hits: JsonObject): number {
  const total = hits.total;

  if (typeof total === "number") {
    return total;
  }

  if (isJsonObject(total)) {
    return numberAt(total, "value") ?? 0;
  }

  return 0;
}

function readHit(entry: unknown): Hit | undefined {
  if (!isJsonObject(entry)) {
    return undefined;
  }

  const { _index, _id, _score, _source } = entry;

  if (typeof _index !== "string" || typeof _id !== "string") {
    return undefined;
  }

  if (typeof _score !== "number" && _score !== null) {
    return undefined;
  }

  if (!isJsonObject(_source)) {
    return undefined;
  }

  return {
    collection: _index,
    id: _id,
    score: _score ?? 0,
    fields: _source,
  };
}

function readFacets(
  query: SearchQuery,
  raw: JsonObject
): Record<string, FacetBucket[]> | undefined {
  const fields = facetFieldsOf(query);
  if (fields.length === 0) {
    return undefined;
  }

  const rawAggregations = raw.aggregations;
  const aggregations: JsonObject = isJsonObject(rawAggregations)
    ? rawAggregations
    : {};
  const facets: Record<string, FacetBucket[]> = {};

  for (const field of fields) {
    const aggregation = aggregations[field];
    const rawBuckets = isJsonObject(aggregation) ? aggregation.buckets : null;
    const buckets = Array.isArray(rawBuckets) ? rawBuckets : [];

    facets[field] = buckets.flatMap((bucket) => {
      if (!isJsonObject(bucket)) {
        return [];
      }

      const key = bucket.key_as_string ?? bucket.key;
      const count = numberAt(bucket, "doc_count");

      if (
        (typeof key !== "string" && typeof key !== "number") ||
        count === undefined
      ) {
        return [];
      }

      return [{ key: String(key), count }];
    });
  }

  return facets;
}

export function normalizeSearchResponse(
  query: SearchQuery,
  raw: unknown
): SearchResult {
  if (!isJsonObject(raw)) {
    throw new DomainError(
      ErrorCode.SEARCH_FAILED,
      "Failed to parse search response",
      { details: "Search response is not a JSON object" }
    );
  }

  const result = createSearchResult(query);

  const hits = raw.hits;

  if (isJsonObject(hits)) {
    result.total = readTotal(hits);
    result.maxScore = numberAt(hits, "max_score") ?? 0;

    const entries = hits.hits;

    if (Array.isArray(entries)) {
      for (const entry of entries) {
        const hit = readHit(entry);
        if (hit) {
          result.hits.push(hit);
        }
      }
    }
  }

  result.elapsedMs = numberAt(raw, "took") ?? 0;
  result.timedOut = raw.timed_out === true;

  const facets = readFacets(query, raw);
  if (facets) {
    result.facets = facets;
  }

  return result;
}

/** Pulls the per-query replies out of a multi-search response. */
export function extractMultiSearchResponses(raw: unknown): unknown[] {
  const responses = isJsonObject(raw) ? raw.responses : null;

  if (!Array.isArray(responses)) {
    throw new DomainError(
      ErrorCode.SEARCH_FAILED,
      "Failed to parse multi-search response",
      { details: "Multi-search response has no responses array" }
    );
  }

  return responses;
}
