/**
 * Search use cases for the public search API.
 *
 * Maps request DTOs onto SearchService calls and reshapes each SearchResult
 * into the wire contract:
 * - `query` echoes the query after business rules (sanitized text, clamped size, default sort)
 * - `results` lists hits as { index, id, score, source }
 * - `max_score` only appears when there are results and it is non-zero
 *   (field-sorted searches report none), `timed_out` only when true
 *
 * The internal `_facets` filter marker is never echoed back.
 */
import type { RequestOptions } from "@domain/elasticsearch/ports";
import {
  FACETS_FILTER_KEY,
  hasResults,
  type FacetBucket,
  type SearchResult,
  type SortDirection,
  type SortField,
} from "@domain/search/model";
import type {
  AdvancedSearchParams,
  SearchService,
} from "@domain/search/SearchService";
import type { JsonObject } from "@domain/shared/json";

export interface SortFieldDto {
  field: string;
  order: SortDirection;
}

export interface SearchRequest {
  query: string;
  index?: string;
  from?: number;
  size?: number;
}

export interface AdvancedSearchRequest extends SearchRequest {
  filters?: Record<string, string>;
  sort?: SortFieldDto[];
}

export interface FacetedSearchRequest extends AdvancedSearchRequest {
  facets: string[];
}

export interface MultiSearchRequest {
  searches: AdvancedSearchRequest[];
}

export interface SuggestRequest {
  query: string;
  field: string;
  index?: string;
  size?: number;
}

export interface FieldSearchRequest {
  field: string;
  value: string;
  index?: string;
  from?: number;
  size?: number;
}

export interface SearchQueryDto {
  query: string;
  index?: string;
  filters?: Record<string, string>;
  from: number;
  size: number;
  sort?: SortFieldDto[];
}

export interface HitDto {
  index: string;
  id: string;
  score: number;
  source: JsonObject;
}

export interface SearchResponseDto {
  query: SearchQueryDto;
  results: HitDto[];
  total: number;
  max_score?: number;
  took: number;
  timed_out?: boolean;
  facets?: Record<string, FacetBucket[]>;
}

export interface MultiSearchResponseDto {
  responses: SearchResponseDto[];
}

function toSortFields(sort: SortFieldDto[] | undefined): SortField[] | undefined {
  return sort?.map(({ field, order }) => ({ field, direction: order }));
}

function toAdvancedParams(request: AdvancedSearchRequest): AdvancedSearchParams {
  return {
    query: request.query,
    index: request.index,
    from: request.from,
    size: request.size,
    filters: request.filters,
    sort: toSortFields(request.sort),
  };
}

export function toSearchResponse(result: SearchResult): SearchResponseDto {
  const { query } = result;

  const filters = Object.fromEntries(
    Object.entries(query.filters).filter(([field]) => field !== FACETS_FILTER_KEY)
  );

  const queryDto: SearchQueryDto = {
    query: query.query,
    from: query.pagination.offset,
    size: query.pagination.limit,
  };

  if (query.collection !== "") {
    queryDto.index = query.collection;
  }

  if (Object.keys(filters).length > 0) {
    queryDto.filters = filters;
  }

  if (query.sort.length > 0) {
    queryDto.sort = query.sort.map(({ field, direction }) => ({
      field,
      order: direction,
    }));
  }

  const response: SearchResponseDto = {
    query: queryDto,
    results: result.hits.map((hit) => ({
      index: hit.collection,
      id: hit.id,
      score: hit.score,
      source: hit.fields,
    })),
    total: result.total,
    took: result.elapsedMs,
  };

  if (hasResults(result) && result.maxScore !== 0) {
    response.max_score = result.maxScore;
  }

  if (result.timedOut) {
    response.timed_out = true;
  }

  if (result.facets) {
    response.facets = result.facets;
  }

  return response;
}

export class SearchUseCase {
  constructor(private readonly searchService: SearchService) {}

  async search(
    request: SearchRequest,
    options: RequestOptions = {}
  ): Promise<SearchResponseDto> {
    const result = await this.searchService.search(request, options);
    return toSearchResponse(result);
  }

  async advancedSearch(
    request: AdvancedSearchRequest,
    options: RequestOptions = {}
  ): Promise<SearchResponseDto> {
    const result = await this.searchService.advancedSearch(
      toAdvancedParams(request),
      options
    );
    return toSearchResponse(result);
  }

  async multiSearch(
    request: MultiSearchRequest,
    options: RequestOptions = {}
  ): Promise<MultiSearchResponseDto> {
    const results = await this.searchService.multiSearch(
      request.searches.map(toAdvancedParams),
      options
    );
    return { responses: results.map(toSearchResponse) };
  }

  async suggest(
    request: SuggestRequest,
    options: RequestOptions = {}
  ): Promise<SearchResponseDto> {
    const result = await this.searchService.suggest(request, options);
    return toSearchResponse(result);
  }

  async facetedSearch(
    request: FacetedSearchRequest,
    options: RequestOptions = {}
  ): Promise<SearchResponseDto> {
    const result = await this.searchService.facetedSearch(
      { ...toAdvancedParams(request), facets: request.facets },
      options
    );
    return toSearchResponse(result);
  }

  async searchByField(
    request: FieldSearchRequest,
    options: RequestOptions = {}
  ): Promise<SearchResponseDto> {
    const result = await this.searchService.searchByField(request, options);
    return toSearchResponse(result);
  }
}
