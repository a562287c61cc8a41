import { z } from "zod";

/**
 * Zod validation schemas for the search API.
 *
 * Defines request DTOs for every search endpoint:
 * - SearchQueryParamsSchema: GET /search query string
 * - AdvancedSearchRequestSchema: POST /search body
 * - MultiSearchRequestSchema, FacetedSearchRequestSchema: batched and aggregated searches
 * - SuggestQueryParamsSchema, FieldSearchQueryParamsSchema: GET helpers
 *
 * Shape checks only. Empty queries, bounds and sort fields are business rules
 * enforced by the search domain.
 */
const optionalInt = z.coerce.number().int().optional();

export const SortFieldSchema = z.object({
  field: z.string(),
  order: z.enum(["asc", "desc"]).default("desc"),
});

export const SearchQueryParamsSchema = z.object({
  q: z.string({ required_error: "Query parameter 'q' is required" }),
  index: z.string().optional(),
  from: optionalInt,
  size: optionalInt,
});

export const AdvancedSearchRequestSchema = z.object({
  query: z.string(),
  index: z.string().optional(),
  filters: z.record(z.string()).optional(),
  from: z.number().int().optional(),
  size: z.number().int().optional(),
  sort: z.array(SortFieldSchema).optional(),
});

export const MultiSearchRequestSchema = z.object({
  searches: z.array(AdvancedSearchRequestSchema),
});

export const FacetedSearchRequestSchema = AdvancedSearchRequestSchema.extend({
  facets: z.array(z.string()),
});

export const SuggestQueryParamsSchema = z.object({
  q: z.string({ required_error: "Query parameter 'q' is required" }),
  field: z.string().default(""),
  index: z.string().optional(),
  size: optionalInt,
});

export const FieldSearchQueryParamsSchema = z.object({
  field: z.string().default(""),
  value: z.string().default(""),
  index: z.string().optional(),
  from: optionalInt,
  size: optionalInt,
});
