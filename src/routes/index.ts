/**
 * Express route registration for the search gateway API.
 *
 * Centralized route configuration exposing all gateway capabilities:
 * - Health check reporting Elasticsearch availability
 * - Document CRUD and bulk operations
 * - Basic, advanced, multi, suggest, faceted and by-field search
 * - Thin index management relayed to Elasticsearch
 */
import type { Express } from "express";

import type { DocumentController } from "@interfaces/http/DocumentController";
import type { HealthController } from "@interfaces/http/HealthController";
import type { IndexController } from "@interfaces/http/IndexController";
import type { SearchController } from "@interfaces/http/SearchController";
import { createDocumentsRouter } from "@routes/documents";
import { createHealthRouter } from "@routes/health";
import { createIndicesRouter } from "@routes/indices";
import { createSearchRouter } from "@routes/search";

export interface Controllers {
  documents: DocumentController;
  search: SearchController;
  indices: IndexController;
  health: HealthController;
}

export function registerRoutes(app: Express, controllers: Controllers): void {
  app.use("/health", createHealthRouter(controllers.health));
  app.use("/documents", createDocumentsRouter(controllers.documents));
  app.use("/search", createSearchRouter(controllers.search));
  app.use("/indices", createIndicesRouter(controllers.indices));
}
