/**
 * Search orchestration over the Elasticsearch port.
 *
 * Every entry point runs the same pipeline: validate input → apply business
 * rules → build the request body → call the backend → normalize the reply →
 * post-process hits. Validation failures surface before any backend call.
 */
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_SUGGEST_SIZE,
} from "@config/businessRules";
import type {
  ElasticsearchRepository,
  RequestOptions,
} from "@domain/elasticsearch/ports";
import {
  createSearchQuery,
  FACETS_FILTER_KEY,
  type SearchQuery,
  type SearchResult,
  type SortField,
} from "@domain/search/model";
import { buildSearchRequest } from "@domain/search/queryBuilder";
import {
  extractMultiSearchResponses,
  normalizeSearchResponse,
} from "@domain/search/resultNormalizer";
import {
  applySearchBusinessRules,
  postProcessSearchResults,
  validateSearchQuery,
} from "@domain/search/searchRules";
import { isJsonObject } from "@domain/shared/json";
import { logEvent, type LoggerPort } from "@infrastructure/logging/Logger";
import {
  DomainError,
  ErrorCode,
  isAppError,
  ValidationError,
  wrapError,
} from "@typesLocal/AppError";

export interface SearchParams {
  query: string;
  index?: string;
  from?: number;
  size?: number;
}

export interface AdvancedSearchParams extends SearchParams {
  filters?: Record<string, string>;
  sort?: SortField[];
}

export interface FacetedSearchParams extends AdvancedSearchParams {
  facets: string[];
}

export interface SuggestParams {
  query: string;
  field: string;
  index?: string;
  size?: number;
}

export interface FieldSearchParams {
  field: string;
  value: string;
  index?: string;
  from?: number;
  size?: number;
}

function toSearchQuery(params: AdvancedSearchParams): SearchQuery {
  const filters: Record<string, string> = {};
  for (const [field, value] of Object.entries(params.filters ?? {})) {
    if (field !== "" && value !== "") {
      filters[field] = value;
    }
  }

  const size = params.size ?? 0;

  return createSearchQuery(params.query, {
    collection: params.index ?? "",
    filters,
    pagination: {
      offset: params.from ?? 0,
      limit: size === 0 ? DEFAULT_PAGE_SIZE : size,
    },
    sort: (params.sort ?? []).filter(({ field }) => field !== ""),
  });
}

export class SearchService {
  constructor(
    private readonly repository: ElasticsearchRepository,
    private readonly logger: LoggerPort
  ) {}

  async search(
    params: SearchParams,
    options: RequestOptions = {}
  ): Promise<SearchResult> {
    const query = toSearchQuery({
      query: params.query,
      index: params.index,
      from: params.from,
      size: params.size,
    });
    validateSearchQuery(query);

    return this.execute(query, "Search", options);
  }

  async advancedSearch(
    params: AdvancedSearchParams,
    options: RequestOptions = {}
  ): Promise<SearchResult> {
    const query = toSearchQuery(params);
    validateSearchQuery(query);

    return this.execute(query, "Advanced search", options);
  }

  async facetedSearch(
    params: FacetedSearchParams,
    options: RequestOptions = {}
  ): Promise<SearchResult> {
    const facets = params.facets.map((field) => field.trim()).filter(Boolean);
    if (facets.length === 0) {
      throw new ValidationError("Facet fields cannot be empty");
    }

    const query = toSearchQuery(params);
    validateSearchQuery(query);
    query.filters[FACETS_FILTER_KEY] = facets.join(",");

    return this.execute(query, "Faceted search", options);
  }

  async suggest(
    params: SuggestParams,
    options: RequestOptions = {}
  ): Promise<SearchResult> {
    if (params.field.trim() === "") {
      throw new ValidationError("Field for suggestion cannot be empty");
    }

    const size = params.size ?? 0;
    const query = createSearchQuery(params.query, {
      collection: params.index ?? "",
      pagination: {
        offset: 0,
        limit: size <= 0 ? DEFAULT_SUGGEST_SIZE : size,
      },
      prefixField: params.field,
    });
    validateSearchQuery(query);

    return this.execute(query, "Suggest search", options);
  }

  async searchByField(
    params: FieldSearchParams,
    options: RequestOptions = {}
  ): Promise<SearchResult> {
    if (params.field === "") {
      throw new ValidationError("Field cannot be empty");
    }

    if (params.value === "") {
      throw new ValidationError("Value cannot be empty");
    }

    return this.advancedSearch(
      {
        query: params.value,
        index: params.index,
        filters: { [params.field]: params.value },
        from: params.from,
        size: params.size,
      },
      options
    );
  }

  async multiSearch(
    searches: AdvancedSearchParams[],
    options: RequestOptions = {}
  ): Promise<SearchResult[]> {
    if (searches.length === 0) {
      throw new ValidationError("No search queries provided");
    }

    const queries = searches.map((params, i) => {
      try {
        const query = toSearchQuery(params);
        validateSearchQuery(query);
        return applySearchBusinessRules(query);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ValidationError(`Query ${i} validation failed: ${reason}`);
      }
    });

    let raw: unknown;
    try {
      raw = await this.repository.multiSearch(
        queries.map((query) => ({
          index: query.collection,
          body: buildSearchRequest(query),
        })),
        options
      );
    } catch (err: unknown) {
      throw this.failure(err, "Multi-search operation failed");
    }

    const responses = extractMultiSearchResponses(raw);

    const results = queries.map((query, i) => {
      const response = responses[i];

      if (isJsonObject(response) && response.error !== undefined) {
        throw new DomainError(
          ErrorCode.SEARCH_FAILED,
          `Query ${i} failed in multi-search`,
          { details: JSON.stringify(response.error) }
        );
      }

      return postProcessSearchResults(normalizeSearchResponse(query, response));
    });

    logEvent(this.logger, "MULTI_SEARCH_EXECUTED", {
      queries: queries.length,
      totals: results.map((result) => result.total),
    });

    return results;
  }

  private async execute(
    query: SearchQuery,
    operation: string,
    options: RequestOptions
  ): Promise<SearchResult> {
    const ruled = applySearchBusinessRules(query);
    const body = buildSearchRequest(ruled);

    let raw: unknown;
    try {
      raw = await this.repository.search(ruled.collection, body, options);
    } catch (err: unknown) {
      throw this.failure(err, `${operation} operation failed`);
    }

    const result = postProcessSearchResults(normalizeSearchResponse(ruled, raw));

    logEvent(this.logger, "SEARCH_EXECUTED", {
      operation,
      index: ruled.collection || "*",
      from: ruled.pagination.offset,
      size: ruled.pagination.limit,
      total: result.total,
      returned: result.hits.length,
      took: result.elapsedMs,
    });

    return result;
  }

  private failure(err: unknown, message: string) {
    this.logger.log("error", message, {
      code: isAppError(err) ? err.code : undefined,
      cause: err instanceof Error ? err.message : String(err),
    });

    return wrapError(err, ErrorCode.SEARCH_FAILED, message);
  }
}
