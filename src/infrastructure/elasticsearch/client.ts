/**
 * Elasticsearch client factory.
 *
 * Builds the official client from the `elasticsearch` section of the app
 * config. Basic auth wins over an API key when both are set.
 */
import { Client, type ClientOptions } from "@elastic/elasticsearch";

import type { AppConfig } from "@config/index";

export type ElasticsearchSettings = AppConfig["elasticsearch"];

function authFrom(settings: ElasticsearchSettings): ClientOptions["auth"] {
  if (settings.username && settings.password) {
    return { username: settings.username, password: settings.password };
  }

  if (settings.apiKey) {
    return { apiKey: settings.apiKey };
  }

  return undefined;
}

export function createElasticsearchClient(settings: ElasticsearchSettings): Client {
  const auth = authFrom(settings);

  return new Client({
    node: settings.node,
    maxRetries: settings.maxRetries,
    requestTimeout: settings.requestTimeoutMs,
    ...(auth ? { auth } : {}),
  });
}
