/**
 * Application entry point for the search gateway.
 *
 * Builds the Elasticsearch client once, wires repository → services → use
 * cases → controllers by constructor injection, mounts the Express app and
 * handles graceful shutdown on SIGINT/SIGTERM.
 */
import type { Server } from "http";

import { DocumentUseCase } from "@app/documents/DocumentUseCase";
import { HealthUseCase } from "@app/health/HealthUseCase";
import { IndexUseCase } from "@app/indices/IndexUseCase";
import { SearchUseCase } from "@app/search/SearchUseCase";
import { config } from "@config/index";
import { DocumentService } from "@domain/document/DocumentService";
import { SearchService } from "@domain/search/SearchService";
import { createElasticsearchClient } from "@infrastructure/elasticsearch/client";
import { ElasticsearchRepository } from "@infrastructure/elasticsearch/ElasticsearchRepository";
import { createLogger } from "@infrastructure/logging/Logger";
import { createApp } from "@interfaces/http/createApp";
import { createDocumentController } from "@interfaces/http/DocumentController";
import { createHealthController } from "@interfaces/http/HealthController";
import { createIndexController } from "@interfaces/http/IndexController";
import { createSearchController } from "@interfaces/http/SearchController";

const SHUTDOWN_TIMEOUT_MS = 10000;

const logger = createLogger({
  level: config.observability.logLevel,
  filePath: config.observability.logFile,
});

const client = createElasticsearchClient(config.elasticsearch);
const repository = new ElasticsearchRepository(client);

const searchUseCase = new SearchUseCase(new SearchService(repository, logger));
const documentUseCase = new DocumentUseCase(new DocumentService(repository, logger));
const indexUseCase = new IndexUseCase(repository, logger);
const healthUseCase = new HealthUseCase(repository, {
  service: config.service.name,
  version: config.service.version,
});

const app = createApp({
  http: config.http,
  logger,
  controllers: {
    search: createSearchController(searchUseCase),
    documents: createDocumentController(documentUseCase),
    indices: createIndexController(indexUseCase),
    health: createHealthController(healthUseCase),
  },
});

const server: Server = app.listen(config.port, () => {
  logger.log("info", "Server started", {
    url: `http://localhost:${config.port}`,
    env: config.env,
    elasticsearch: config.elasticsearch.node,
  });
});

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.log("info", "Shutting down", { signal });

  const forceExit = setTimeout(() => {
    logger.log("error", "Forced shutdown after timeout", {
      timeoutMs: SHUTDOWN_TIMEOUT_MS,
    });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  try {
    await closeServer();
    await client.close();
    logger.log("info", "Server stopped");
    process.exit(0);
  } catch (err: unknown) {
    logger.log("error", "Shutdown failed", {
      cause: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  logger.log("error", "Unhandled promise rejection", {
    cause: reason instanceof Error ? reason.message : String(reason),
  });
});
