/**
 * Document use cases for the public documents API.
 *
 * Converts request DTOs into Document entities for the DocumentService and
 * maps the results to { id, index, source, version, created, modified }.
 * A create request carrying an `id` goes through the existence-checked path.
 */
import {
  createDocument,
  withId,
  type Document,
} from "@domain/document/Document";
import type { DocumentService } from "@domain/document/DocumentService";
import type { BulkResult, RequestOptions } from "@domain/elasticsearch/ports";
import type { JsonObject } from "@domain/shared/json";

export interface CreateDocumentRequest {
  index: string;
  id?: string;
  source: JsonObject;
}

export interface UpdateDocumentRequest {
  source: JsonObject;
}

export interface BulkIndexRequest {
  documents: CreateDocumentRequest[];
}

export interface BulkDeleteRequest {
  indices: string[];
  ids: string[];
}

export interface DocumentDto {
  id: string;
  index: string;
  source: JsonObject;
  version: number;
  created: string;
  modified: string;
}

export type BulkResponseDto = BulkResult;

export function toDocumentDto(doc: Document): DocumentDto {
  return {
    id: doc.id,
    index: doc.collection,
    source: doc.fields,
    version: doc.version,
    created: doc.createdAt.toISOString(),
    modified: doc.modifiedAt.toISOString(),
  };
}

export class DocumentUseCase {
  constructor(private readonly documentService: DocumentService) {}

  async create(
    request: CreateDocumentRequest,
    options: RequestOptions = {}
  ): Promise<DocumentDto> {
    const doc = request.id
      ? await this.documentService.createWithId(
          request.index,
          request.id,
          request.source,
          options
        )
      : await this.documentService.create(request.index, request.source, options);

    return toDocumentDto(doc);
  }

  async get(
    index: string,
    id: string,
    options: RequestOptions = {}
  ): Promise<DocumentDto> {
    return toDocumentDto(await this.documentService.get(index, id, options));
  }

  async update(
    index: string,
    id: string,
    request: UpdateDocumentRequest,
    options: RequestOptions = {}
  ): Promise<DocumentDto> {
    const doc = await this.documentService.update(index, id, request.source, options);
    return toDocumentDto(doc);
  }

  async delete(index: string, id: string, options: RequestOptions = {}): Promise<void> {
    await this.documentService.delete(index, id, options);
  }

  async bulkIndex(
    request: BulkIndexRequest,
    options: RequestOptions = {}
  ): Promise<BulkResponseDto> {
    const documents = request.documents.map(({ index, id, source }) => {
      const doc = createDocument(index, source);
      return id ? withId(doc, id) : doc;
    });

    const { result } = await this.documentService.bulkIndex(documents, options);
    return result;
  }

  async bulkDelete(
    request: BulkDeleteRequest,
    options: RequestOptions = {}
  ): Promise<BulkResponseDto> {
    return this.documentService.bulkDelete(request.indices, request.ids, options);
  }
}
