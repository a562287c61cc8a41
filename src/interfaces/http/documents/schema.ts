import { z } from "zod";

import { JsonObjectSchema } from "@interfaces/http/json";

/**
 * Zod validation schemas for the documents API.
 *
 * - CreateDocumentRequestSchema: POST /documents, and each entry of a bulk index
 * - UpdateDocumentRequestSchema: PUT /documents/:index/:id (full source replacement)
 * - BulkDeleteRequestSchema: parallel `indices` / `ids` arrays
 */
export const CreateDocumentRequestSchema = z.object({
  index: z.string(),
  id: z.string().optional(),
  source: JsonObjectSchema,
});

export const UpdateDocumentRequestSchema = z.object({
  source: JsonObjectSchema,
});

export const BulkIndexRequestSchema = z.object({
  documents: z.array(CreateDocumentRequestSchema),
});

export const BulkDeleteRequestSchema = z.object({
  indices: z.array(z.string()),
  ids: z.array(z.string()),
});

export const DocumentPathParamsSchema = z.object({
  index: z.string().min(1, "Index and ID are required"),
  id: z.string().min(1, "Index and ID are required"),
});
