/**
 * Index HTTP controller: existence check, create (201) and delete (204)
 * under /indices/:index.
 */
import type { NextFunction, Request, Response } from "express";

import type { IndexUseCase } from "@app/indices/IndexUseCase";
import { CreateIndexRequestSchema } from "@interfaces/http/indices/schema";
import { parseRequest } from "@interfaces/http/validation";

function indexParam(req: Request): string {
  return req.params.index ?? "";
}

export function createIndexController(useCase: IndexUseCase) {
  return {
    async exists(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const result = await useCase.exists(indexParam(req), {
          signal: res.locals.signal,
        });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async create(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        // A PUT without a body creates the index with default settings.
        const { mapping } = parseRequest(CreateIndexRequestSchema, req.body ?? {});
        const result = await useCase.create(indexParam(req), mapping, {
          signal: res.locals.signal,
        });

        res.status(201).json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        await useCase.delete(indexParam(req), { signal: res.locals.signal });

        res.status(204).end();
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}

export type IndexController = ReturnType<typeof createIndexController>;
