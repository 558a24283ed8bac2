import assert from "node:assert/strict";
import test from "node:test";
import { verifyCartEndpoint } from "./cart";
import { FetchLike, FetchRuntimeConfig } from "./http";
import { DEFAULT_DETECTION_PROFILE } from "./profile";

function runtimeReturning(body: string, init: ResponseInit, seen: string[] = []): FetchRuntimeConfig {
  const fakeFetch: FetchLike = async (url) => {
    seen.push(url);
    return new Response(body, init);
  };
  return { timeoutMs: 1000, userAgent: "TestAgent/1.0", fetch: fakeFetch };
}

const JSON_HEADERS = { "content-type": "application/json; charset=utf-8" };

test("verifyCartEndpoint accepts a JSON cart with a token", async () => {
  const seen: string[] = [];
  const result = await verifyCartEndpoint(
    "https://www.shop.example/collections/all?page=2",
    runtimeReturning(JSON.stringify({ token: "c1-test", note: null }), { status: 200, headers: JSON_HEADERS }, seen),
    DEFAULT_DETECTION_PROFILE
  );

  assert.deepEqual(seen, ["https://www.shop.example/cart.js"]);
  assert.deepEqual(result, {
    ok: true,
    url: "https://www.shop.example/cart.js",
    signal: {
      kind: "cart_endpoint",
      description: "Reachable https://www.shop.example/cart.js (valid JSON with Shopify cart keys)",
      matches: ["token"]
    }
  });
});

test("verifyCartEndpoint rejects a non-200 status", async () => {
  const result = await verifyCartEndpoint(
    "https://shop.example/",
    runtimeReturning("{}", { status: 404, headers: JSON_HEADERS }),
    DEFAULT_DETECTION_PROFILE
  );
  assert.deepEqual(result, {
    ok: false,
    url: "https://shop.example/cart.js",
    reason: "/cart.js did not confirm Shopify (status=404, type=application/json; charset=utf-8)"
  });
});

test("verifyCartEndpoint rejects an HTML page served with 200", async () => {
  const result = await verifyCartEndpoint(
    "https://shop.example/",
    runtimeReturning("<html></html>", { status: 200, headers: { "content-type": "text/html" } }),
    DEFAULT_DETECTION_PROFILE
  );
  assert.equal(result.ok, false);
  assert.equal(result.ok ? "" : result.reason, "/cart.js did not confirm Shopify (status=200, type=text/html)");
});

test("verifyCartEndpoint treats malformed JSON as a negative result", async () => {
  const result = await verifyCartEndpoint(
    "https://shop.example/",
    runtimeReturning("{ not json", { status: 200, headers: JSON_HEADERS }),
    DEFAULT_DETECTION_PROFILE
  );
  assert.equal(result.ok, false);
  assert.ok(!result.ok && result.reason.startsWith("/cart.js returned malformed JSON: "));
});

test("verifyCartEndpoint requires a JSON object with a cart key", async () => {
  for (const body of ["[]", "\"items\"", JSON.stringify({ products: [] })]) {
    const result = await verifyCartEndpoint(
      "https://shop.example/",
      runtimeReturning(body, { status: 200, headers: JSON_HEADERS }),
      DEFAULT_DETECTION_PROFILE
    );
    assert.deepEqual(result, {
      ok: false,
      url: "https://shop.example/cart.js",
      reason: "/cart.js did not confirm Shopify (status=200, type=application/json; charset=utf-8)"
    });
  }
});

test("verifyCartEndpoint never throws on network errors", async () => {
  const failingFetch: FetchLike = async () => {
    throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:443") });
  };
  const result = await verifyCartEndpoint(
    "https://shop.example/",
    { timeoutMs: 1000, userAgent: "TestAgent/1.0", fetch: failingFetch },
    DEFAULT_DETECTION_PROFILE
  );
  assert.deepEqual(result, {
    ok: false,
    url: "https://shop.example/cart.js",
    reason: "/cart.js error: fetch failed (connect ECONNREFUSED 127.0.0.1:443)"
  });
});

test("verifyCartEndpoint reports a base URL it cannot resolve against", async () => {
  const result = await verifyCartEndpoint(
    "not a url",
    runtimeReturning("{}", { status: 200, headers: JSON_HEADERS }),
    DEFAULT_DETECTION_PROFILE
  );
  assert.deepEqual(result, { ok: false, url: null, reason: "/cart.js could not be resolved against not a url" });
});

test("verifyCartEndpoint sends the same request headers as a page request", async () => {
  let seenHeaders = new Headers();
  const fakeFetch: FetchLike = async (_url, init) => {
    seenHeaders = new Headers(init.headers);
    return new Response(JSON.stringify({ items: [] }), { status: 200, headers: JSON_HEADERS });
  };
  const result = await verifyCartEndpoint(
    "https://shop.example/",
    { timeoutMs: 1000, userAgent: "TestAgent/1.0", fetch: fakeFetch },
    DEFAULT_DETECTION_PROFILE
  );
  assert.equal(result.ok, true);
  assert.equal(seenHeaders.get("user-agent"), "TestAgent/1.0");
  assert.equal(seenHeaders.get("accept"), null);
});
