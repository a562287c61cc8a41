import assert from "node:assert/strict";
import test from "node:test";

import { createSearchQuery } from "@domain/search/model";
import { buildSearchRequest } from "@domain/search/queryBuilder";

test("buildSearchRequest emits a multi_match over all fields", () => {
  assert.deepEqual(buildSearchRequest(createSearchQuery("laptop")), {
    query: { multi_match: { query: "laptop", fields: ["*"] } },
    from: 0,
    size: 10,
  });
});

test("buildSearchRequest ANDs term filters with the text match", () => {
  const body = buildSearchRequest(
    createSearchQuery("laptop", {
      filters: { brand: "acme", color: "black" },
      pagination: { offset: 20, limit: 5 },
    })
  );

  assert.deepEqual(body, {
    query: {
      bool: {
        must: { multi_match: { query: "laptop", fields: ["*"] } },
        filter: [{ term: { brand: "acme" } }, { term: { color: "black" } }],
      },
    },
    from: 20,
    size: 5,
  });
});

test("buildSearchRequest keeps sort order and skips the facet marker", () => {
  const body = buildSearchRequest(
    createSearchQuery("laptop", {
      filters: { _facets: "brand,color" },
      sort: [
        { field: "price", direction: "asc" },
        { field: "_score", direction: "desc" },
      ],
    })
  );

  assert.deepEqual(body.query, { multi_match: { query: "laptop", fields: ["*"] } });
  assert.deepEqual(body.sort, [
    { price: { order: "asc" } },
    { _score: { order: "desc" } },
  ]);
  assert.deepEqual(body.aggs, {
    brand: { terms: { field: "brand" } },
    color: { terms: { field: "color" } },
  });
});

test("buildSearchRequest uses a phrase-prefix match for a prefix field", () => {
  const body = buildSearchRequest(createSearchQuery("lap", { prefixField: "name" }));

  assert.deepEqual(body.query, { match_phrase_prefix: { name: { query: "lap" } } });
  assert.equal(body.sort, undefined);
  assert.equal(body.aggs, undefined);
});
