import { Router } from "express";

import type { DocumentController } from "@interfaces/http/DocumentController";

/**
 * Document CRUD and bulk endpoints.
 *
 *   POST   /documents               { index, id?, source } -> 201 document
 *   POST   /documents/_bulk         { documents: [...] }   -> bulk result
 *   POST   /documents/_bulk_delete  { indices, ids }       -> bulk result
 *   GET    /documents/:index/:id                           -> document
 *   PUT    /documents/:index/:id    { source }             -> document
 *   DELETE /documents/:index/:id                           -> 204
 */
export function createDocumentsRouter(controller: DocumentController): Router {
  const router = Router();

  router.post("/", controller.create);
  router.post("/_bulk", controller.bulkIndex);
  router.post("/_bulk_delete", controller.bulkDelete);
  router.get("/:index/:id", controller.get);
  router.put("/:index/:id", controller.update);
  router.delete("/:index/:id", controller.delete);

  return router;
}
