/**
 * In-memory search request and result model.
 *
 * SearchQuery and SearchResult are transient: built per request, never
 * persisted. Helpers here are pure and return new values.
 */
import { DEFAULT_PAGE_SIZE } from "@config/businessRules";
import type { JsonObject } from "@domain/shared/json";

export type SortDirection = "asc" | "desc";

export interface SortField {
  field: string;
  direction: SortDirection;
}

export interface Pagination {
  offset: number;
  limit: number;
}

/**
 * Filter key overloaded to carry a comma-joined list of facet fields. It is
 * never sent as a term filter.
 */
export const FACETS_FILTER_KEY = "_facets";

export interface SearchQuery {
  query: string;
  /** Target index; empty means every index. */
  collection: string;
  filters: Record<string, string>;
  pagination: Pagination;
  sort: SortField[];
  /** Phrase-prefix match on this field instead of the all-fields match. */
  prefixField?: string;
}

export interface Hit {
  collection: string;
  id: string;
  score: number;
  fields: JsonObject;
}

export interface FacetBucket {
  key: string;
  count: number;
}

export interface SearchResult {
  query: SearchQuery;
  hits: Hit[];
  total: number;
  maxScore: number;
  elapsedMs: number;
  /** The backend aborted the search early (its `timed_out` flag). */
  timedOut: boolean;
  facets?: Record<string, FacetBucket[]>;
}

export function createSearchQuery(
  query: string,
  overrides: Partial<Omit<SearchQuery, "query">> = {}
): SearchQuery {
  return {
    query,
    collection: overrides.collection ?? "",
    filters: { ...(overrides.filters ?? {}) },
    pagination: overrides.pagination ?? { offset: 0, limit: DEFAULT_PAGE_SIZE },
    sort: [...(overrides.sort ?? [])],
    ...(overrides.prefixField !== undefined
      ? { prefixField: overrides.prefixField }
      : {}),
  };
}

export function createSearchResult(query: SearchQuery): SearchResult {
  return {
    query,
    hits: [],
    total: 0,
    maxScore: 0,
    elapsedMs: 0,
    timedOut: false,
  };
}

export function facetFieldsOf(query: SearchQuery): string[] {
  const marker = query.filters[FACETS_FILTER_KEY];
  if (!marker) {
    return [];
  }

  return marker
    .split(",")
    .map((field) => field.trim())
    .filter(Boolean);
}

export function hasResults(result: SearchResult): boolean {
  return result.hits.length > 0;
}

export function totalPages(result: SearchResult): number {
  const { limit } = result.query.pagination;
  if (limit === 0) {
    return 0;
  }

  return Math.ceil(result.total / limit);
}

export function currentPage(result: SearchResult): number {
  const { offset, limit } = result.query.pagination;
  if (limit === 0) {
    return 0;
  }

  return Math.floor(offset / limit) + 1;
}
