import assert from "node:assert/strict";
import http from "node:http";
import test from "node:test";

import { loadConfig } from "@config/index";
import { createElasticsearchClient } from "@infrastructure/elasticsearch/client";
import { ElasticsearchRepository } from "@infrastructure/elasticsearch/ElasticsearchRepository";
import { InfrastructureError } from "@typesLocal/AppError";

interface ReceivedRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  headers: http.IncomingHttpHeaders;
  body: string;
}

interface FakeReply {
  status?: number;
  body?: unknown;
}

type Responder = (request: ReceivedRequest) => FakeReply | undefined;

/** Minimal Elasticsearch stand-in: records requests and answers through `responder`. */
async function startFakeElasticsearch(responder: Responder) {
  const requests: ReceivedRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const url = new URL(req.url ?? "/", "http://localhost");
      const request: ReceivedRequest = {
        method: req.method ?? "GET",
        pathname: url.pathname,
        query: url.searchParams,
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf-8"),
      };
      requests.push(request);

      const reply = responder(request);
      if (!reply) {
        // Never answer: lets the client time out.
        return;
      }

      res.statusCode = reply.status ?? 200;
      res.setHeader("x-elastic-product", "Elasticsearch");
      res.setHeader("content-type", "application/json");
      res.end(req.method === "HEAD" || reply.body === undefined ? undefined : JSON.stringify(reply.body));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  assert.ok(address && typeof address === "object", "fake server is not listening on a port");
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

function repositoryFor(url: string, env: Record<string, string> = {}) {
  const settings = loadConfig({
    ELASTICSEARCH_URL: url,
    ELASTICSEARCH_MAX_RETRIES: "0",
    ELASTICSEARCH_REQUEST_TIMEOUT_MS: "2000",
    ...env,
  }).elasticsearch;

  const client = createElasticsearchClient(settings);
  return { client, repository: new ElasticsearchRepository(client) };
}

function ndjson(body: string): unknown[] {
  return body
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

test("indexDocument writes with refresh and returns id and version", async (t) => {
  const es = await startFakeElasticsearch(() => ({
    status: 201,
    body: { _index: "products", _id: "p1", _version: 1, result: "created" },
  }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  const written = await repository.indexDocument("products", "p1", { name: "Laptop" });

  assert.deepEqual(written, { id: "p1", version: 1 });
  const [request] = es.requests;
  assert.equal(request?.method, "PUT");
  assert.equal(request?.pathname, "/products/_doc/p1");
  assert.equal(request?.query.get("refresh"), "true");
  assert.deepEqual(JSON.parse(request?.body ?? ""), { name: "Laptop" });
});

test("indexDocument without an id lets the backend generate one", async (t) => {
  const es = await startFakeElasticsearch(() => ({
    status: 201,
    body: { _index: "products", _id: "generated", _version: 1, result: "created" },
  }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  const written = await repository.indexDocument("products", undefined, { name: "Laptop" });

  assert.equal(written.id, "generated");
  assert.equal(es.requests[0]?.method, "POST");
  assert.equal(es.requests[0]?.pathname, "/products/_doc");
});

test("getDocument returns the stored source or null when missing", async (t) => {
  const es = await startFakeElasticsearch(({ pathname }) =>
    pathname.endsWith("/p1")
      ? {
          body: {
            _index: "products",
            _id: "p1",
            _version: 4,
            found: true,
            _source: { name: "Laptop" },
          },
        }
      : { status: 404, body: { _index: "products", _id: "nope", found: false } }
  );
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  assert.deepEqual(await repository.getDocument("products", "p1"), {
    index: "products",
    id: "p1",
    source: { name: "Laptop" },
    version: 4,
  });
  assert.equal(await repository.getDocument("products", "nope"), null);
});

test("deleteDocument returns false for a missing document", async (t) => {
  const es = await startFakeElasticsearch(({ pathname }) =>
    pathname.endsWith("/p1")
      ? { body: { _index: "products", _id: "p1", _version: 2, result: "deleted" } }
      : { status: 404, body: { _index: "products", _id: "nope", result: "not_found" } }
  );
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  assert.equal(await repository.deleteDocument("products", "p1"), true);
  assert.equal(await repository.deleteDocument("products", "nope"), false);
  assert.equal(es.requests[0]?.method, "DELETE");
  assert.equal(es.requests[0]?.query.get("refresh"), "true");
});

test("search posts the body and returns the raw reply", async (t) => {
  const reply = { took: 3, hits: { total: { value: 0 }, hits: [] } };
  const es = await startFakeElasticsearch(() => ({ body: reply }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  const body = {
    query: { multi_match: { query: "laptop", fields: ["*"] } },
    from: 0,
    size: 10,
  };

  assert.deepEqual(await repository.search("products", body), reply);
  assert.deepEqual(await repository.search("", body), reply);

  assert.equal(es.requests[0]?.method, "POST");
  assert.equal(es.requests[0]?.pathname, "/products/_search");
  assert.deepEqual(JSON.parse(es.requests[0]?.body ?? ""), body);
  assert.equal(es.requests[1]?.pathname, "/_search");
});

test("multiSearch sends header and body lines", async (t) => {
  const es = await startFakeElasticsearch(() => ({ body: { took: 1, responses: [] } }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  const body = { query: { multi_match: { query: "a", fields: ["*"] } }, from: 0, size: 10 };
  await repository.multiSearch([
    { index: "products", body },
    { index: "", body },
  ]);

  assert.equal(es.requests[0]?.pathname, "/_msearch");
  assert.deepEqual(ndjson(es.requests[0]?.body ?? ""), [{ index: "products" }, body, {}, body]);
});

test("bulk sends NDJSON operations and maps per-item results", async (t) => {
  const es = await startFakeElasticsearch(() => ({
    body: {
      took: 5,
      errors: true,
      items: [
        { index: { _index: "products", _id: "gen1", status: 201 } },
        {
          index: {
            _index: "products",
            _id: "bad",
            status: 400,
            error: { type: "mapper_parsing_exception", reason: "failed to parse" },
          },
        },
        { delete: { _index: "products", _id: "old", status: 404 } },
      ],
    },
  }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  const result = await repository.bulk([
    { action: "index", index: "products", source: { name: "A" } },
    { action: "index", index: "products", id: "bad", source: { price: "x" } },
    { action: "delete", index: "products", id: "old" },
  ]);

  assert.equal(es.requests[0]?.pathname, "/_bulk");
  assert.equal(es.requests[0]?.query.get("refresh"), "true");
  assert.deepEqual(ndjson(es.requests[0]?.body ?? ""), [
    { index: { _index: "products" } },
    { name: "A" },
    { index: { _index: "products", _id: "bad" } },
    { price: "x" },
    { delete: { _index: "products", _id: "old" } },
  ]);

  assert.deepEqual(result, {
    took: 5,
    errors: true,
    items: [
      { action: "index", index: "products", id: "gen1", status: 201, ok: true },
      {
        action: "index",
        index: "products",
        id: "bad",
        status: 400,
        ok: false,
        error: "mapper_parsing_exception: failed to parse",
      },
      { action: "delete", index: "products", id: "old", status: 404, ok: false },
    ],
  });
});

test("index management relays exists, create and delete", async (t) => {
  const es = await startFakeElasticsearch(({ method, pathname }) => {
    if (method === "HEAD") {
      return { status: pathname === "/products" ? 200 : 404 };
    }
    if (method === "PUT") {
      return { body: { acknowledged: true, index: "products" } };
    }
    return pathname === "/products"
      ? { body: { acknowledged: true } }
      : { status: 404, body: { error: { type: "index_not_found_exception" }, status: 404 } };
  });
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  assert.equal(await repository.indexExists("products"), true);
  assert.equal(await repository.indexExists("missing"), false);

  const mapping = { mappings: { properties: { name: { type: "text" } } } };
  await repository.createIndex("products", mapping);
  const create = es.requests.find((request) => request.method === "PUT");
  assert.equal(create?.pathname, "/products");
  assert.deepEqual(JSON.parse(create?.body ?? ""), mapping);

  assert.equal(await repository.deleteIndex("products"), true);
  assert.equal(await repository.deleteIndex("missing"), false);
});

test("health and info read cluster details", async (t) => {
  const es = await startFakeElasticsearch(({ pathname }) =>
    pathname === "/_cluster/health"
      ? { body: { cluster_name: "docker-cluster", status: "yellow", number_of_nodes: 1 } }
      : {
          body: {
            name: "node-1",
            cluster_name: "docker-cluster",
            cluster_uuid: "abc",
            version: { number: "8.15.0", lucene_version: "9.11.1" },
            tagline: "You Know, for Search",
          },
        }
  );
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  assert.deepEqual(await repository.health(), {
    clusterName: "docker-cluster",
    status: "yellow",
    numberOfNodes: 1,
  });
  assert.equal(es.requests[0]?.query.get("wait_for_status"), "yellow");

  assert.deepEqual(await repository.info(), {
    clusterName: "docker-cluster",
    version: "8.15.0",
    luceneVersion: "9.11.1",
  });
});

test("basic auth credentials are sent with every request", async (t) => {
  const es = await startFakeElasticsearch(() => ({
    body: { cluster_name: "c", status: "green", number_of_nodes: 1 },
  }));
  const { client, repository } = repositoryFor(es.url, {
    ELASTICSEARCH_USERNAME: "elastic",
    ELASTICSEARCH_PASSWORD: "test-secret",
  });
  t.after(async () => {
    await client.close();
    await es.close();
  });

  await repository.health();

  const expected = `Basic ${Buffer.from("elastic:test-secret").toString("base64")}`;
  assert.equal(es.requests[0]?.headers.authorization, expected);
});

test("backend error responses are rethrown unchanged", async (t) => {
  const es = await startFakeElasticsearch(() => ({
    status: 500,
    body: { error: { type: "search_phase_execution_exception" }, status: 500 },
  }));
  const { client, repository } = repositoryFor(es.url);
  t.after(async () => {
    await client.close();
    await es.close();
  });

  await assert.rejects(
    repository.search("products", { query: { multi_match: { query: "a", fields: ["*"] } }, from: 0, size: 10 }),
    { name: "ResponseError" }
  );
});

test("an unreachable cluster maps to ELASTICSEARCH_DOWN", async (t) => {
  const es = await startFakeElasticsearch(() => ({ body: {} }));
  const { url } = es;
  await es.close();

  const { client, repository } = repositoryFor(url);
  t.after(() => client.close());

  await assert.rejects(repository.getDocument("products", "p1"), (err: unknown) => {
    assert.ok(err instanceof InfrastructureError);
    assert.equal(err.code, "ELASTICSEARCH_DOWN");
    assert.equal(err.statusCode, 503);
    assert.equal(err.details, undefined);
    assert.ok(err.cause instanceof Error);
    return true;
  });
});

test("a request that outlives the client timeout maps to TIMEOUT", async (t) => {
  const es = await startFakeElasticsearch(() => undefined);
  const { client, repository } = repositoryFor(es.url, {
    ELASTICSEARCH_REQUEST_TIMEOUT_MS: "100",
  });
  t.after(async () => {
    await client.close();
    await es.close();
  });

  await assert.rejects(repository.info(), {
    name: "InfrastructureError",
    code: "TIMEOUT",
    statusCode: 408,
  });
});
