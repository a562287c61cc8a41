/**
 * Elasticsearch adapter implementing the domain ElasticsearchRepository port.
 *
 * - Document writes use `refresh: true` so they are visible to the next search.
 * - Missing documents and indices resolve to null/false instead of throwing.
 * - Connection failures become InfrastructureError(ELASTICSEARCH_DOWN), timeouts
 *   and aborts InfrastructureError(TIMEOUT). The transport error is kept as the
 *   cause only; its message names the backend address. Other backend errors
 *   are rethrown as-is for the calling service to classify.
 */
import { errors, type Client } from "@elastic/elasticsearch";

import type {
  BulkItemResult,
  BulkOperation,
  BulkResult,
  ClusterHealth,
  ClusterInfo,
  ElasticsearchRepository as ElasticsearchRepositoryPort,
  MultiSearchRequest,
  RequestOptions,
  StoredDocument,
  WriteResult,
} from "@domain/elasticsearch/ports";
import type { SearchRequestBody } from "@domain/search/queryBuilder";
import { isJsonObject, type JsonObject } from "@domain/shared/json";
import { ErrorCode, InfrastructureError } from "@typesLocal/AppError";

function isNotFound(err: unknown): boolean {
  return err instanceof errors.ResponseError && err.meta.statusCode === 404;
}

function translate(err: unknown): unknown {
  if (
    err instanceof errors.ConnectionError ||
    err instanceof errors.NoLivingConnectionsError
  ) {
    return new InfrastructureError(
      ErrorCode.ELASTICSEARCH_DOWN,
      "Elasticsearch is unavailable",
      { cause: err }
    );
  }

  if (
    err instanceof errors.TimeoutError ||
    err instanceof errors.RequestAbortedError
  ) {
    return new InfrastructureError(
      ErrorCode.TIMEOUT,
      "Elasticsearch request timed out",
      { cause: err }
    );
  }

  return err;
}

function indexPath(index: string, endpoint: string): string {
  return index === ""
    ? `/${endpoint}`
    : `/${encodeURIComponent(index)}/${endpoint}`;
}

function toBulkBody(operations: BulkOperation[]): unknown[] {
  return operations.flatMap((op) => {
    if (op.action === "delete") {
      return [{ delete: { _index: op.index, _id: op.id } }];
    }

    return [
      { index: { _index: op.index, ...(op.id ? { _id: op.id } : {}) } },
      op.source,
    ];
  });
}

export class ElasticsearchRepository implements ElasticsearchRepositoryPort {
  constructor(private readonly client: Client) {}

  async indexDocument(
    index: string,
    id: string | undefined,
    source: JsonObject,
    options: RequestOptions = {}
  ): Promise<WriteResult> {
    try {
      const response = await this.client.index(
        { index, ...(id ? { id } : {}), document: source, refresh: true },
        { signal: options.signal }
      );

      return { id: response._id, version: response._version };
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async getDocument(
    index: string,
    id: string,
    options: RequestOptions = {}
  ): Promise<StoredDocument | null> {
    try {
      const response = await this.client.get<JsonObject>(
        { index, id },
        { signal: options.signal }
      );

      const source = response._source;
      if (!response.found || !isJsonObject(source)) {
        return null;
      }

      return {
        index: response._index,
        id: response._id,
        source,
        version: response._version ?? 1,
      };
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return null;
      }

      throw translate(err);
    }
  }

  async updateDocument(
    index: string,
    id: string,
    source: JsonObject,
    options: RequestOptions = {}
  ): Promise<WriteResult> {
    // Full replacement of the stored source, not a partial update.
    return this.indexDocument(index, id, source, options);
  }

  async deleteDocument(
    index: string,
    id: string,
    options: RequestOptions = {}
  ): Promise<boolean> {
    try {
      await this.client.delete(
        { index, id, refresh: true },
        { signal: options.signal }
      );
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return false;
      }

      throw translate(err);
    }
  }

  async search(
    index: string,
    body: SearchRequestBody,
    options: RequestOptions = {}
  ): Promise<unknown> {
    try {
      return await this.client.transport.request<unknown>(
        { method: "POST", path: indexPath(index, "_search"), body },
        { signal: options.signal }
      );
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async multiSearch(
    requests: MultiSearchRequest[],
    options: RequestOptions = {}
  ): Promise<unknown> {
    const bulkBody = requests.flatMap(({ index, body }) => [
      index === "" ? {} : { index },
      body,
    ]);

    try {
      return await this.client.transport.request<unknown>(
        { method: "POST", path: "/_msearch", bulkBody },
        { signal: options.signal }
      );
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async bulk(
    operations: BulkOperation[],
    options: RequestOptions = {}
  ): Promise<BulkResult> {
    try {
      const response = await this.client.bulk(
        { operations: toBulkBody(operations), refresh: true },
        { signal: options.signal }
      );

      const items = response.items.map((entry, i): BulkItemResult => {
        const [action, item] = Object.entries(entry)[0] ?? [];
        const requested = operations[i];

        if (!action || !item) {
          return {
            action: requested?.action ?? "unknown",
            index: requested?.index ?? "",
            id: null,
            status: 0,
            ok: false,
            error: "Missing bulk item response",
          };
        }

        const result: BulkItemResult = {
          action,
          index: item._index,
          id: item._id ?? null,
          status: item.status,
          ok: item.status >= 200 && item.status < 300,
        };

        if (item.error) {
          result.error = item.error.reason
            ? `${item.error.type}: ${item.error.reason}`
            : item.error.type;
        }

        return result;
      });

      return { took: response.took, errors: response.errors, items };
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async indexExists(index: string, options: RequestOptions = {}): Promise<boolean> {
    try {
      return await this.client.indices.exists({ index }, { signal: options.signal });
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async createIndex(
    index: string,
    mapping: JsonObject,
    options: RequestOptions = {}
  ): Promise<void> {
    try {
      await this.client.transport.request<unknown>(
        { method: "PUT", path: `/${encodeURIComponent(index)}`, body: mapping },
        { signal: options.signal }
      );
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async deleteIndex(index: string, options: RequestOptions = {}): Promise<boolean> {
    try {
      await this.client.indices.delete({ index }, { signal: options.signal });
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return false;
      }

      throw translate(err);
    }
  }

  async health(options: RequestOptions = {}): Promise<ClusterHealth> {
    try {
      const response = await this.client.cluster.health(
        { wait_for_status: "yellow", timeout: "5s" },
        { signal: options.signal }
      );

      return {
        clusterName: response.cluster_name,
        status: String(response.status),
        numberOfNodes: response.number_of_nodes,
      };
    } catch (err: unknown) {
      throw translate(err);
    }
  }

  async info(options: RequestOptions = {}): Promise<ClusterInfo> {
    try {
      const response = await this.client.info({}, { signal: options.signal });

      return {
        clusterName: response.cluster_name,
        version: response.version.number,
        luceneVersion: response.version.lucene_version,
      };
    } catch (err: unknown) {
      throw translate(err);
    }
  }
}
