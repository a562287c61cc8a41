/**
 * Document lifecycle over the Elasticsearch port.
 *
 * nonexistent → created (version 1) → updated (version + 1 each time) → deleted.
 *
 * Known limitations, kept on purpose:
 * - createWithId checks for an existing document and then writes; the two
 *   steps are not atomic, so concurrent creators can both succeed.
 * - get reports every backend read failure, connection and timeout errors
 *   included, as DOCUMENT_NOT_FOUND. update and delete inherit this through
 *   their existence read.
 */
import {
  createDocument,
  replaceFields,
  withId,
  type Document,
} from "@domain/document/Document";
import {
  applyDocumentBusinessRules,
  validateDocument,
} from "@domain/document/documentRules";
import type {
  BulkOperation,
  BulkResult,
  ElasticsearchRepository,
  RequestOptions,
  StoredDocument,
} from "@domain/elasticsearch/ports";
import type { JsonObject } from "@domain/shared/json";
import { logEvent, type LoggerPort } from "@infrastructure/logging/Logger";
import {
  documentExists,
  documentNotFound,
  DomainError,
  ErrorCode,
  ValidationError,
  wrapError,
} from "@typesLocal/AppError";

export type Clock = () => Date;

export interface BulkIndexOutcome {
  documents: Document[];
  result: BulkResult;
}

function requireIndex(index: string): void {
  if (index === "") {
    throw new ValidationError("Index cannot be empty");
  }
}

function requireId(id: string): void {
  if (id === "") {
    throw new ValidationError("Document ID cannot be empty");
  }
}

function requireSource(source: JsonObject | null | undefined): void {
  if (!source || Object.keys(source).length === 0) {
    throw new ValidationError("Document source cannot be empty");
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function dateField(fields: JsonObject, field: string, fallback: Date): Date {
  const value = fields[field];
  if (typeof value !== "string") {
    return fallback;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}

export class DocumentService {
  constructor(
    private readonly repository: ElasticsearchRepository,
    private readonly logger: LoggerPort,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(
    index: string,
    source: JsonObject,
    options: RequestOptions = {}
  ): Promise<Document> {
    requireIndex(index);
    requireSource(source);

    const now = this.clock();
    const doc = applyDocumentBusinessRules(createDocument(index, source, now), now);

    let id: string;
    try {
      ({ id } = await this.repository.indexDocument(
        index,
        undefined,
        doc.fields,
        options
      ));
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_CREATE_FAILED, "Failed to create document");
    }

    logEvent(this.logger, "DOCUMENT_CREATED", { index, id });
    return withId(doc, id);
  }

  async createWithId(
    index: string,
    id: string,
    source: JsonObject,
    options: RequestOptions = {}
  ): Promise<Document> {
    requireIndex(index);
    requireId(id);
    requireSource(source);

    let existing: StoredDocument | null = null;
    try {
      existing = await this.repository.getDocument(index, id, options);
    } catch (err: unknown) {
      // A failed existence read counts as "absent"; the write below decides.
      this.logger.log("warn", "Existence check failed before create", {
        index,
        id,
        cause: errorMessage(err),
      });
    }

    if (existing) {
      throw documentExists(index, id);
    }

    const now = this.clock();
    const doc = applyDocumentBusinessRules(
      withId(createDocument(index, source, now), id),
      now
    );

    try {
      await this.repository.indexDocument(index, id, doc.fields, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_CREATE_FAILED, "Failed to create document");
    }

    logEvent(this.logger, "DOCUMENT_CREATED", { index, id });
    return doc;
  }

  async get(
    index: string,
    id: string,
    options: RequestOptions = {}
  ): Promise<Document> {
    requireIndex(index);
    requireId(id);

    let stored: StoredDocument | null;
    try {
      stored = await this.repository.getDocument(index, id, options);
    } catch (err: unknown) {
      this.logger.log("error", "Document not found", {
        code: ErrorCode.DOCUMENT_NOT_FOUND,
        cause: errorMessage(err),
      });
      throw new DomainError(ErrorCode.DOCUMENT_NOT_FOUND, "Document not found", {
        cause: err,
      });
    }

    if (!stored) {
      throw documentNotFound(index, id);
    }

    const now = this.clock();
    return {
      id: stored.id,
      collection: stored.index,
      fields: stored.source,
      version: stored.version,
      createdAt: dateField(stored.source, "created_at", now),
      modifiedAt: dateField(stored.source, "updated_at", now),
    };
  }

  async update(
    index: string,
    id: string,
    source: JsonObject,
    options: RequestOptions = {}
  ): Promise<Document> {
    requireIndex(index);
    requireId(id);
    requireSource(source);

    const existing = await this.get(index, id, options);

    const now = this.clock();
    const doc = applyDocumentBusinessRules(replaceFields(existing, source, now), now);

    try {
      await this.repository.updateDocument(index, id, doc.fields, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_UPDATE_FAILED, "Failed to update document");
    }

    logEvent(this.logger, "DOCUMENT_UPDATED", { index, id, version: doc.version });
    return doc;
  }

  async delete(
    index: string,
    id: string,
    options: RequestOptions = {}
  ): Promise<void> {
    requireIndex(index);
    requireId(id);

    await this.get(index, id, options);

    let deleted: boolean;
    try {
      deleted = await this.repository.deleteDocument(index, id, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_DELETE_FAILED, "Failed to delete document");
    }

    if (!deleted) {
      throw documentNotFound(index, id);
    }

    logEvent(this.logger, "DOCUMENT_DELETED", { index, id });
  }

  /**
   * Validates and applies business rules to every document before any network
   * call, then submits them in one bulk request. Per-item outcomes come back in
   * the result; generated IDs are copied onto the returned documents.
   */
  async bulkIndex(
    documents: Document[],
    options: RequestOptions = {}
  ): Promise<BulkIndexOutcome> {
    if (documents.length === 0) {
      throw new ValidationError("No documents provided for bulk indexing");
    }

    const now = this.clock();
    const ruled = documents.map((doc, i) => {
      try {
        validateDocument(doc);
      } catch (err: unknown) {
        throw new ValidationError(
          `Document ${i} validation failed: ${errorMessage(err)}`
        );
      }

      try {
        return applyDocumentBusinessRules(doc, now);
      } catch (err: unknown) {
        throw new ValidationError(
          `Document ${i} business rule validation failed: ${errorMessage(err)}`
        );
      }
    });

    const operations: BulkOperation[] = ruled.map((doc) => ({
      action: "index",
      index: doc.collection,
      ...(doc.id !== "" ? { id: doc.id } : {}),
      source: doc.fields,
    }));

    let result: BulkResult;
    try {
      result = await this.repository.bulk(operations, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_CREATE_FAILED, "Failed to bulk index documents");
    }

    const indexed = ruled.map((doc, i) => {
      const item = result.items[i];
      return doc.id === "" && item?.ok && item.id ? withId(doc, item.id) : doc;
    });

    logEvent(this.logger, "DOCUMENTS_BULK_INDEXED", {
      count: indexed.length,
      errors: result.errors,
      failed: result.items.filter((item) => !item.ok).length,
    });

    return { documents: indexed, result };
  }

  async bulkDelete(
    indices: string[],
    ids: string[],
    options: RequestOptions = {}
  ): Promise<BulkResult> {
    if (indices.length !== ids.length) {
      throw new ValidationError("Indices and IDs arrays must have the same length");
    }

    if (indices.length === 0) {
      throw new ValidationError("No documents provided for bulk deletion");
    }

    const operations: BulkOperation[] = indices.map((index, i) => {
      const id = ids[i] ?? "";
      if (index === "" || id === "") {
        throw new ValidationError(`Document ${i} needs both an index and an ID`);
      }

      return { action: "delete", index, id };
    });

    let result: BulkResult;
    try {
      result = await this.repository.bulk(operations, options);
    } catch (err: unknown) {
      throw this.failure(err, ErrorCode.DOCUMENT_DELETE_FAILED, "Failed to bulk delete documents");
    }

    logEvent(this.logger, "DOCUMENTS_BULK_DELETED", {
      count: operations.length,
      errors: result.errors,
      failed: result.items.filter((item) => !item.ok).length,
    });

    return result;
  }

  private failure(err: unknown, code: ErrorCode, message: string) {
    this.logger.log("error", message, { code, cause: errorMessage(err) });
    return wrapError(err, code, message);
  }
}
