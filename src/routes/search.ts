import { Router } from "express";

import type { SearchController } from "@interfaces/http/SearchController";

/**
 * Search endpoints.
 *
 *   GET  /search?q=&index=&from=&size=
 *   POST /search            { query, index?, filters?, from?, size?, sort? }
 *   POST /search/_msearch   { searches: [...] } -> { responses: [...] }
 *   GET  /search/suggest?q=&field=&index=&size=
 *   POST /search/faceted    search body + { facets: [...] }
 *   GET  /search/by-field?field=&value=&index=&from=&size=
 */
export function createSearchRouter(controller: SearchController): Router {
  const router = Router();

  router.get("/", controller.search);
  router.post("/", controller.advancedSearch);
  router.post("/_msearch", controller.multiSearch);
  router.get("/suggest", controller.suggest);
  router.post("/faceted", controller.facetedSearch);
  router.get("/by-field", controller.searchByField);

  return router;
}
