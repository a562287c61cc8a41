/**
 * Index management relayed to the backend: existence check, create with an
 * optional mapping, delete. No mapping validation happens here.
 */
import type {
  ElasticsearchRepository,
  RequestOptions,
} from "@domain/elasticsearch/ports";
import type { JsonObject } from "@domain/shared/json";
import { logEvent, type LoggerPort } from "@infrastructure/logging/Logger";
import {
  ErrorCode,
  indexExists,
  indexNotFound,
  ValidationError,
  wrapError,
} from "@typesLocal/AppError";

export interface IndexExistsDto {
  index: string;
  exists: boolean;
}

export interface IndexCreatedDto {
  index: string;
  acknowledged: true;
}

function requireIndex(index: string): void {
  if (index.trim() === "") {
    throw new ValidationError("Index cannot be empty");
  }
}

export class IndexUseCase {
  constructor(
    private readonly repository: ElasticsearchRepository,
    private readonly logger: LoggerPort
  ) {}

  async exists(index: string, options: RequestOptions = {}): Promise<IndexExistsDto> {
    requireIndex(index);

    try {
      return { index, exists: await this.repository.indexExists(index, options) };
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.INTERNAL_ERROR, "Failed to check index existence");
    }
  }

  async create(
    index: string,
    mapping: JsonObject = {},
    options: RequestOptions = {}
  ): Promise<IndexCreatedDto> {
    requireIndex(index);

    let exists: boolean;
    try {
      exists = await this.repository.indexExists(index, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.INDEX_CREATE_FAILED, "Failed to create index");
    }

    if (exists) {
      throw indexExists(index);
    }

    try {
      await this.repository.createIndex(index, mapping, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.INDEX_CREATE_FAILED, "Failed to create index");
    }

    logEvent(this.logger, "INDEX_CREATED", { index });
    return { index, acknowledged: true };
  }

  async delete(index: string, options: RequestOptions = {}): Promise<void> {
    requireIndex(index);

    let deleted: boolean;
    try {
      deleted = await this.repository.deleteIndex(index, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.INDEX_DELETE_FAILED, "Failed to delete index");
    }

    if (!deleted) {
      throw indexNotFound(index);
    }

    logEvent(this.logger, "INDEX_DELETED", { index });
  }

  private failure(err: unknown, code: ErrorCode, message: string) {
    this.logger.log("error", message, {
      code,
      cause: err instanceof Error ? err.message : String(err),
    });
    return wrapError(err, code, message);
  }
}
