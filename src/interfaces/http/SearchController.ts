/**
 * Search HTTP controller.
 *
 * Express handlers for the /search endpoints:
 * - Validates query strings and bodies with the Zod schemas
 * - Delegates to SearchUseCase, passing the request's abort signal
 * - Writes the search response contract as-is
 *
 * Every failure is forwarded to the global error handler.
 */
import type { NextFunction, Request, Response } from "express";

import type { SearchUseCase } from "@app/search/SearchUseCase";
import {
  AdvancedSearchRequestSchema,
  FacetedSearchRequestSchema,
  FieldSearchQueryParamsSchema,
  MultiSearchRequestSchema,
  SearchQueryParamsSchema,
  SuggestQueryParamsSchema,
} from "@interfaces/http/search/schema";
import { parseRequest } from "@interfaces/http/validation";

export function createSearchController(useCase: SearchUseCase) {
  return {
    async search(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { q, index, from, size } = parseRequest(
          SearchQueryParamsSchema,
          req.query
        );

        const result = await useCase.search(
          { query: q, index, from, size },
          { signal: res.locals.signal }
        );

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async advancedSearch(
      req: Request,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const body = parseRequest(AdvancedSearchRequestSchema, req.body);
        const result = await useCase.advancedSearch(body, {
          signal: res.locals.signal,
        });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async multiSearch(
      req: Request,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const body = parseRequest(MultiSearchRequestSchema, req.body);
        const result = await useCase.multiSearch(body, {
          signal: res.locals.signal,
        });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async suggest(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { q, field, index, size } = parseRequest(
          SuggestQueryParamsSchema,
          req.query
        );

        const result = await useCase.suggest(
          { query: q, field, index, size },
          { signal: res.locals.signal }
        );

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async facetedSearch(
      req: Request,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const body = parseRequest(FacetedSearchRequestSchema, req.body);
        const result = await useCase.facetedSearch(body, {
          signal: res.locals.signal,
        });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },

    async searchByField(
      req: Request,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const params = parseRequest(FieldSearchQueryParamsSchema, req.query);
        const result = await useCase.searchByField(params, {
          signal: res.locals.signal,
        });

        res.json(result);
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}

export type SearchController = ReturnType<typeof createSearchController>;
