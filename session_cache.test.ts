/// <reference types="node" />
/**
 * In-memory TTL store used for guide sessions.
 */

import assert from "node:assert";
import test from "node:test";
import { Cache } from "./src/utils/cache";

test("entries are readable until they expire", () => {
  const cache = new Cache<string>({ ttl: 60_000 });
  cache.set("a", "alpha");

  assert.strictEqual(cache.get("a"), "alpha");
  assert.strictEqual(cache.has("a"), true);
  assert.strictEqual(cache.get("missing"), null);
});

test("expired entries are evicted on access", () => {
  const evicted: string[] = [];
  const cache = new Cache<string>({ onEvict: (key) => evicted.push(key) });
  cache.set("old", "value", -1);

  assert.strictEqual(cache.get("old"), null);
  assert.deepStrictEqual(evicted, ["old"]);
  assert.strictEqual(cache.size, 0);
});

test("cleanup evicts only what has expired", () => {
  const evicted: Array<[string, number]> = [];
  const cache = new Cache<number>({ ttl: 1_000, onEvict: (key, value) => evicted.push([key, value]) });
  cache.set("short", 1);
  cache.set("long", 2, 10_000);

  cache.cleanup(Date.now() + 5_000);

  assert.deepStrictEqual(evicted, [["short", 1]]);
  assert.strictEqual(cache.get("long"), 2);
});

test("clear evicts everything and delete evicts nothing", () => {
  const evicted: string[] = [];
  const cache = new Cache<string>({ onEvict: (key) => evicted.push(key) });
  cache.set("a", "1");
  cache.set("b", "2");
  cache.delete("a");

  cache.clear();

  assert.deepStrictEqual(evicted, ["b"]);
  assert.strictEqual(cache.size, 0);
});

test("periodic cleanup can be started and stopped", () => {
  const cache = new Cache<string>();
  cache.startCleanup(10);
  cache.startCleanup(10);
  cache.stopCleanup();
  assert.strictEqual(cache.size, 0);
});
