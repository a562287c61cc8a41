import type { SearchRequestBody } from "@domain/search/queryBuilder";
import type { JsonObject } from "@domain/shared/json";

/**
 * Domain port for the Elasticsearch backend.
 *
 * Search and multi-search hand back the raw reply so the result normalizer
 * owns its interpretation; document and bulk operations return typed values.
 * Every call accepts the caller's abort signal.
 */
export interface RequestOptions {
  signal?: AbortSignal;
}

export interface StoredDocument {
  index: string;
  id: string;
  source: JsonObject;
  version: number;
}

export interface WriteResult {
  id: string;
  version: number;
}

export type BulkOperation =
  | { action: "index"; index: string; id?: string; source: JsonObject }
  | { action: "delete"; index: string; id: string };

export interface BulkItemResult {
  action: string;
  index: string;
  id: string | null;
  status: number;
  ok: boolean;
  error?: string;
}

export interface BulkResult {
  took: number;
  errors: boolean;
  items: BulkItemResult[];
}

export interface MultiSearchRequest {
  index: string;
  body: SearchRequestBody;
}

export interface ClusterHealth {
  clusterName: string;
  status: string;
  numberOfNodes: number;
}

export interface ClusterInfo {
  clusterName: string;
  version: string;
  luceneVersion: string;
}

export interface ElasticsearchRepository {
  // Documents
  indexDocument(
    index: string,
    id: string | undefined,
    source: JsonObject,
    options?: RequestOptions
  ): Promise<WriteResult>;

  /** Resolves to null when the document does not exist. */
  getDocument(
    index: string,
    id: string,
    options?: RequestOptions
  ): Promise<StoredDocument | null>;

  updateDocument(
    index: string,
    id: string,
    source: JsonObject,
    options?: RequestOptions
  ): Promise<WriteResult>;

  /** Resolves to false when the document does not exist. */
  deleteDocument(
    index: string,
    id: string,
    options?: RequestOptions
  ): Promise<boolean>;

  // Search
  search(
    index: string,
    body: SearchRequestBody,
    options?: RequestOptions
  ): Promise<unknown>;

  multiSearch(
    requests: MultiSearchRequest[],
    options?: RequestOptions
  ): Promise<unknown>;

  // Bulk
  bulk(operations: BulkOperation[], options?: RequestOptions): Promise<BulkResult>;

  // Indices
  indexExists(index: string, options?: RequestOptions): Promise<boolean>;

  createIndex(
    index: string,
    mapping: JsonObject,
    options?: RequestOptions
  ): Promise<void>;

  /** Resolves to false when the index does not exist. */
  deleteIndex(index: string, options?: RequestOptions): Promise<boolean>;

  // Cluster
  health(options?: RequestOptions): Promise<ClusterHealth>;

  info(options?: RequestOptions): Promise<ClusterInfo>;
}
