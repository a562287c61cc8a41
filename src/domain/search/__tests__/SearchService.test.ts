import assert from "node:assert/strict";
import test from "node:test";

import { InMemoryElasticsearchRepository } from "../../../__tests__/support/InMemoryElasticsearchRepository";
import { RecordingLogger } from "../../../__tests__/support/RecordingLogger";

import type { SearchRequestBody } from "@domain/search/queryBuilder";
import { SearchService } from "@domain/search/SearchService";
import { ErrorCode, InfrastructureError } from "@typesLocal/AppError";

function setup() {
  const repository = new InMemoryElasticsearchRepository();
  const logger = new RecordingLogger();
  const service = new SearchService(repository, logger);
  return { repository, logger, service };
}

function lastSearchBody(repository: InMemoryElasticsearchRepository): SearchRequestBody {
  const body = repository.searchBodies.at(-1);
  assert.ok(body, "expected a search call");
  return body;
}

test("search rejects an offset over 10000 before calling the backend", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.search({ query: "laptop", from: 10001 }), {
    code: "VALIDATION_FAILED",
    message: "From offset cannot exceed 10000",
  });
  assert.equal(repository.calls.length, 0);
});

test("search rejects a blank query before calling the backend", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.search({ query: "  " }), {
    code: "VALIDATION_FAILED",
    message: "Search query cannot be empty",
  });
  assert.equal(repository.calls.length, 0);
});

test("search sends at most 1000 results to the backend", async () => {
  const { repository, service } = setup();

  const result = await service.search({ query: "laptop", size: 5000 });

  assert.equal(lastSearchBody(repository).size, 1000);
  assert.equal(result.query.pagination.limit, 1000);
});

test("search defaults size 0 to 10 and sorts by score", async () => {
  const { repository, service } = setup();

  await service.search({ query: "laptop", size: 0 });

  const body = lastSearchBody(repository);
  assert.equal(body.size, 10);
  assert.equal(body.from, 0);
  assert.deepEqual(body.sort, [{ _score: { order: "desc" } }]);
});

test("search post-processes hits and logs the execution", async () => {
  const { repository, logger, service } = setup();
  repository.seed("products", "p1", { name: "Laptop", price: 999, password: "test-secret" });
  repository.seed("products", "p2", { name: "Phone", price: 499 });

  const result = await service.search({ query: "laptop", index: "products" });

  assert.equal(repository.callsTo("search")[0]?.args[0], "products");
  assert.equal(result.total, 1);
  assert.deepEqual(result.hits, [
    {
      collection: "products",
      id: "p1",
      score: 1,
      fields: { name: "Laptop", price: 999, _match_quality: "high", _source_index: "products" },
    },
  ]);

  assert.deepEqual(logger.eventsOfType("SEARCH_EXECUTED")[0]?.payload, {
    operation: "Search",
    index: "products",
    from: 0,
    size: 10,
    total: 1,
    returned: 1,
    took: 1,
  });
});

test("search wraps backend failures as SEARCH_FAILED", async () => {
  const { repository, logger, service } = setup();
  const cause = new Error("socket hang up");
  repository.failNext("search", cause);

  await assert.rejects(service.search({ query: "laptop" }), (err: unknown) => {
    assert.ok(err instanceof Error);
    assert.equal(err.name, "DomainError");
    assert.equal(err.message, "Search operation failed");
    assert.equal(err.cause, cause);
    return true;
  });
  assert.equal(logger.entries.at(-1)?.level, "error");
});

test("search keeps infrastructure errors as they are", async () => {
  const { repository, service } = setup();
  const down = new InfrastructureError(ErrorCode.ELASTICSEARCH_DOWN, "Elasticsearch is unavailable");
  repository.failNext("search", down);

  await assert.rejects(service.search({ query: "laptop" }), (err: unknown) => {
    assert.equal(err, down);
    return true;
  });
});

test("advancedSearch builds term filters and drops blank ones", async () => {
  const { repository, service } = setup();

  await service.advancedSearch({
    query: "laptop",
    filters: { brand: "acme", color: "", "": "x" },
    sort: [{ field: "price", direction: "asc" }],
  });

  const body = lastSearchBody(repository);
  assert.deepEqual(body.query, {
    bool: {
      must: { multi_match: { query: "laptop", fields: ["*"] } },
      filter: [{ term: { brand: "acme" } }],
    },
  });
  assert.deepEqual(body.sort, [{ price: { order: "asc" } }]);
});

test("advancedSearch rejects a sort field outside the allow-list", async () => {
  const { repository, service } = setup();

  await assert.rejects(
    service.advancedSearch({ query: "laptop", sort: [{ field: "Price", direction: "asc" }] }),
    { code: "VALIDATION_FAILED", message: "Invalid sort field: Price" }
  );
  assert.equal(repository.calls.length, 0);
});

test("suggest requires a field and uses a phrase-prefix match", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.suggest({ query: "lap", field: " " }), {
    message: "Field for suggestion cannot be empty",
  });

  await service.suggest({ query: "lap", field: "name", index: "products" });

  const body = lastSearchBody(repository);
  assert.deepEqual(body.query, { match_phrase_prefix: { name: { query: "lap" } } });
  assert.equal(body.size, 5);
});

test("facetedSearch requests aggregations and returns buckets", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.facetedSearch({ query: "laptop", facets: [" "] }), {
    message: "Facet fields cannot be empty",
  });

  repository.replyNext({
    took: 2,
    hits: { total: { value: 0 }, hits: [] },
    aggregations: { brand: { buckets: [{ key: "acme", doc_count: 4 }] } },
  });

  const result = await service.facetedSearch({
    query: "laptop",
    filters: { color: "black" },
    facets: ["brand"],
  });

  const body = lastSearchBody(repository);
  assert.deepEqual(body.aggs, { brand: { terms: { field: "brand" } } });
  assert.deepEqual(body.query, {
    bool: {
      must: { multi_match: { query: "laptop", fields: ["*"] } },
      filter: [{ term: { color: "black" } }],
    },
  });
  assert.deepEqual(result.facets, { brand: [{ key: "acme", count: 4 }] });
});

test("searchByField uses the value as text and as a term filter", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.searchByField({ field: "", value: "x" }), {
    message: "Field cannot be empty",
  });
  await assert.rejects(service.searchByField({ field: "brand", value: "" }), {
    message: "Value cannot be empty",
  });

  await service.searchByField({ field: "brand", value: "acme" });

  assert.deepEqual(lastSearchBody(repository).query, {
    bool: {
      must: { multi_match: { query: "acme", fields: ["*"] } },
      filter: [{ term: { brand: "acme" } }],
    },
  });
});

test("multiSearch validates every query before one backend round trip", async () => {
  const { repository, service } = setup();

  await assert.rejects(service.multiSearch([]), { message: "No search queries provided" });
  await assert.rejects(
    service.multiSearch([{ query: "laptop" }, { query: "" }]),
    { code: "VALIDATION_FAILED", message: "Query 1 validation failed: Search query cannot be empty" }
  );
  assert.equal(repository.calls.length, 0);

  repository.seed("products", "p1", { name: "Laptop" });
  repository.seed("users", "u1", { name: "Ada" });

  const results = await service.multiSearch([
    { query: "laptop", index: "products" },
    { query: "ada", index: "users", size: 3 },
  ]);

  assert.equal(repository.callsTo("multiSearch").length, 1);
  assert.deepEqual(
    results.map((result) => result.hits.map((hit) => hit.id)),
    [["p1"], ["u1"]]
  );
  assert.equal(results[1]?.query.pagination.limit, 3);
});

test("multiSearch fails when one response carries an error", async () => {
  const { repository, service } = setup();
  repository.replyNext({
    responses: [{ error: { type: "index_not_found_exception" }, status: 404 }],
  });

  await assert.rejects(service.multiSearch([{ query: "laptop", index: "missing" }]), {
    code: "SEARCH_FAILED",
    message: "Query 0 failed in multi-search",
    details: '{"type":"index_not_found_exception"}',
  });
});
