/**
 * Document HTTP controller.
 *
 * Express handlers for /documents: create (201), read, full update,
 * delete (204), plus bulk index and bulk delete. Bodies and path params are
 * validated with the Zod schemas before reaching DocumentUseCase.
 */
import type { NextFunction, Request, Response } from "express";

import type { DocumentUseCase } from "@app/documents/DocumentUseCase";
import {
  BulkDeleteRequestSchema,
  BulkIndexRequestSchema,
  CreateDocumentRequestSchema,
  DocumentPathParamsSchema,
  UpdateDocumentRequestSchema,
} from "@interfaces/http/documents/schema";
import { parseRequest } from "@interfaces/http/validation";

export function createDocumentController(useCase: DocumentUseCase) {
  return {
    async create(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = parseRequest(CreateDocumentRequestSchema, req.body);
        const document = await useCase.create(body, { signal: res.locals.signal });

        res.status(201).json(document);
      } catch (err: unknown) {
        next(err);
      }
    },

    async get(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { index, id } = parseRequest(DocumentPathParamsSchema, req.params);
        const document = await useCase.get(index, id, { signal: res.locals.signal });

        res.json(document);
      } catch (err: unknown) {
        next(err);
      }
    },

    async update(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { index, id } = parseRequest(DocumentPathParamsSchema, req.params);
        const body = parseRequest(UpdateDocumentRequestSchema, req.body);
        const document = await useCase.update(index, id, body, {
          signal: res.locals.signal,
        });

        res.json(document);
      } catch (err: unknown) {
        next(err);
      }
    },

    async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { index, id } = parseRequest(DocumentPathParamsSchema, req.params);
        await useCase.delete(index, id, { signal: res.locals.signal });

        res.status(204).end();
      } catch (err: unknown) {
        next(err);
      }
    },

    async bulkIndex(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = parseRequest(BulkIndexRequestSchema, req.body);
        const result = await useCase.bulkIndex(body, { signal: res.locals.signal });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async bulkDelete(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = parseRequest(BulkDeleteRequestSchema, req.body);
        const result = await useCase.bulkDelete(body, { signal: res.locals.signal });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}

export type DocumentController = ReturnType<typeof createDocumentController>;
