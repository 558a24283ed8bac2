import assert from "node:assert/strict";
import test from "node:test";
import { parseConfig } from "./config";

test("parseConfig applies defaults", () => {
  const parsed = parseConfig({});
  assert.equal(parsed.PORT, 3001);
  assert.equal(parsed.REQUEST_TIMEOUT_MS, 8000);
  assert.equal(parsed.VERIFY_CART_ON_HEADER_MATCH, true);
  assert.equal(parsed.LOG_LEVEL, "info");
  assert.match(parsed.USER_AGENT, /^Mozilla\/5\.0 /);
});

test("parseConfig reads boolean flags literally", () => {
  assert.equal(parseConfig({ VERIFY_CART_ON_HEADER_MATCH: "false" }).VERIFY_CART_ON_HEADER_MATCH, false);
  assert.equal(parseConfig({ VERIFY_CART_ON_HEADER_MATCH: "0" }).VERIFY_CART_ON_HEADER_MATCH, false);
  assert.equal(parseConfig({ VERIFY_CART_ON_HEADER_MATCH: "TRUE" }).VERIFY_CART_ON_HEADER_MATCH, true);
  assert.equal(parseConfig({ VERIFY_CART_ON_HEADER_MATCH: "" }).VERIFY_CART_ON_HEADER_MATCH, true);
});

test("parseConfig rejects a non-positive timeout", () => {
  assert.throws(() => parseConfig({ REQUEST_TIMEOUT_MS: "0" }));
});
