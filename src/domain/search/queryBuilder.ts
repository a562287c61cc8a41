/**
 * Translates a SearchQuery into an Elasticsearch search request body.
 *
 * The builder is total: anything invalid has already been rejected by the
 * business rules, so it never throws.
 */
import {
  FACETS_FILTER_KEY,
  facetFieldsOf,
  type SearchQuery,
  type SortDirection,
} from "@domain/search/model";

export type MultiMatchClause = {
  multi_match: { query: string; fields: string[] };
};

export type PhrasePrefixClause = {
  match_phrase_prefix: Record<string, { query: string }>;
};

export type TextClause = MultiMatchClause | PhrasePrefixClause;

export type TermClause = { term: Record<string, string> };

export type BoolClause = {
  bool: { must: TextClause; filter: TermClause[] };
};

export type QueryClause = TextClause | BoolClause;

export type SortClause = Record<string, { order: SortDirection }>;

export type TermsAggregation = { terms: { field: string } };

export type SearchRequestBody = {
  query: QueryClause;
  from: number;
  size: number;
  sort?: SortClause[];
  aggs?: Record<string, TermsAggregation>;
};

function buildTextClause(query: SearchQuery): TextClause {
  if (query.prefixField) {
    return {
      match_phrase_prefix: { [query.prefixField]: { query: query.query } },
    };
  }

  // Match across every field; no per-field relevance tuning.
  return { multi_match: { query: query.query, fields: ["*"] } };
}

function buildTermFilters(filters: Record<string, string>): TermClause[] {
  return Object.entries(filters)
    .filter(([field]) => field !== FACETS_FILTER_KEY)
    .map(([field, value]) => ({ term: { [field]: value } }));
}

export function buildSearchRequest(query: SearchQuery): SearchRequestBody {
  const text = buildTextClause(query);
  const filter = buildTermFilters(query.filters);

  const body: SearchRequestBody = {
    query: filter.length > 0 ? { bool: { must: text, filter } } : text,
    from: query.pagination.offset,
    size: query.pagination.limit,
  };

  if (query.sort.length > 0) {
    body.sort = query.sort.map(({ field, direction }) => ({
      [field]: { order: direction },
    }));
  }

  const facetFields = facetFieldsOf(query);
  if (facetFields.length > 0) {
    body.aggs = Object.fromEntries(
      facetFields.map((field) => [field, { terms: { field } }])
    );
  }

  return body;
}
