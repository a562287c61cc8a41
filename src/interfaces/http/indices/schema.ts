import { z } from "zod";

import { JsonObjectSchema } from "@interfaces/http/json";

/** PUT /indices/:index body. The mapping is relayed to the backend unchecked. */
export const CreateIndexRequestSchema = z.object({
  mapping: JsonObjectSchema.optional(),
});
