/**
 * Tests for the helper transformers.
 *
 * Run: node --import tsx src/transforms/transforms.test.ts
 *
 * Tests cover:
 *   1. Result constructors (keep / DROP)
 *   2. filterRows: pass-through and drop
 *   3. renameKeys: mapping, pass-through, collisions, immutability
 *   4. selectKeys and mapRows
 *   5. Configuration errors
 */

import { strict as assert } from "node:assert";

import {
  DROP,
  keep,
  isDrop,
  filterRows,
  renameKeys,
  selectKeys,
  mapRows,
  TransformConfigError,
} from "./index.js";
import type { Row, TransformResult } from "../types/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function kept(result: TransformResult): Row {
  if (result.kind !== "keep") {
    throw new Error("expected the row to be kept");
  }
  return result.row;
}

function configError(err: unknown): TransformConfigError {
  assert.ok(err instanceof TransformConfigError, "expected TransformConfigError");
  return err;
}

const ORDER: Row = { order_id: "A1", customer: "Alice", total_price: 120.0 };

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

section("Results");

test("keep wraps the row without copying", () => {
  const result = keep(ORDER);
  assert.equal(result.kind, "keep");
  assert.equal(result.row, ORDER);
  assert.equal(isDrop(result), false);
});

test("DROP is a frozen drop signal", () => {
  assert.equal(DROP.kind, "drop");
  assert.equal(isDrop(DROP), true);
  assert.ok(Object.isFrozen(DROP));
});

test("a row holding null is still kept", () => {
  const row: Row = { value: null };
  assert.equal(kept(mapRows((r) => r)(row)), row);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILTER
// ═══════════════════════════════════════════════════════════════════════════

section("filterRows");

test("returns the same row when the predicate holds", () => {
  const transform = filterRows((row) => Number(row.total_price) >= 20);
  assert.equal(kept(transform(ORDER)), ORDER);
});

test("drops the row when the predicate fails", () => {
  const transform = filterRows((row) => Number(row.total_price) >= 20);
  assert.equal(transform({ order_id: "B2", total_price: 15.0 }), DROP);
});

test("missing keys are left to the predicate", () => {
  const transform = filterRows((row) => (row.flag ?? true) === true);
  assert.equal(transform({}).kind, "keep");
  assert.equal(transform({ flag: false }).kind, "drop");
});

test("output equals the input rows satisfying the predicate, in order", () => {
  const rows: Row[] = [1, 2, 3, 4, 5, 6].map((n) => ({ n }));
  const isEven = (row: Row) => Number(row.n) % 2 === 0;
  const transform = filterRows(isEven);
  const out = rows.map(transform).filter((r) => !isDrop(r)).map(kept);
  assert.deepEqual(out, rows.filter(isEven));
});

// ═══════════════════════════════════════════════════════════════════════════
// RENAME
// ═══════════════════════════════════════════════════════════════════════════

section("renameKeys");

test("renames mapped keys and passes others through", () => {
  const transform = renameKeys({ order_id: "id", total_price: "price" });
  assert.deepEqual(kept(transform(ORDER)), {
    id: "A1",
    customer: "Alice",
    price: 120.0,
  });
});

test("keeps key order of the source row", () => {
  const transform = renameKeys({ order_id: "id", total_price: "price" });
  assert.deepEqual(Object.keys(kept(transform(ORDER))), ["id", "customer", "price"]);
});

test("mapping entries for absent keys are ignored", () => {
  const transform = renameKeys({ missing: "other" });
  assert.deepEqual(kept(transform({ a: 1 })), { a: 1 });
});

test("never mutates the source row", () => {
  const row = Object.freeze({ a: 1, b: 2 });
  const out = kept(renameKeys({ a: "x" })(row));
  assert.notEqual(out, row);
  assert.deepEqual(row, { a: 1, b: 2 });
  assert.deepEqual(out, { x: 1, b: 2 });
});

test("two keys mapped to one name: the later key in the row wins", () => {
  const transform = renameKeys({ a: "x", b: "x" });
  assert.deepEqual(kept(transform({ a: 1, b: 2 })), { x: 2 });
  assert.deepEqual(kept(transform({ b: 2, a: 1 })), { x: 1 });
});

test("renaming onto an existing key follows row order", () => {
  const transform = renameKeys({ a: "b" });
  assert.deepEqual(kept(transform({ a: 1, b: 2 })), { b: 2 });
  assert.deepEqual(kept(transform({ b: 2, a: 1 })), { b: 1 });
});

test("later changes to the mapping object have no effect", () => {
  const mapping: Record<string, string> = { a: "x" };
  const transform = renameKeys(mapping);
  mapping.a = "y";
  assert.deepEqual(kept(transform({ a: 1 })), { x: 1 });
});

test("the empty string is a valid source and target key", () => {
  assert.deepEqual(kept(renameKeys({ "": "blank" })({ "": 1, a: 2 })), { blank: 1, a: 2 });
  assert.deepEqual(kept(renameKeys({ a: "" })({ a: 1 })), { "": 1 });
});

test("a __proto__ key from parsed JSON is renamed like any other", () => {
  const mapping: Record<string, string> = JSON.parse('{"__proto__":"proto"}');
  const row: Row = JSON.parse('{"__proto__":1,"a":2}');
  const out = kept(renameKeys(mapping)(row));
  assert.deepEqual(Object.keys(out), ["proto", "a"]);
  assert.equal(out.proto, 1);
  assert.equal(Object.hasOwn(out, "__proto__"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// SELECT / MAP
// ═══════════════════════════════════════════════════════════════════════════

section("selectKeys and mapRows");

test("selectKeys keeps listed keys in list order", () => {
  const out = kept(selectKeys(["total_price", "order_id"])(ORDER));
  assert.deepEqual(out, { total_price: 120.0, order_id: "A1" });
  assert.deepEqual(Object.keys(out), ["total_price", "order_id"]);
});

test("selectKeys fills missing keys with null", () => {
  assert.deepEqual(kept(selectKeys(["a", "c"])({ a: 1, b: 2 })), { a: 1, c: null });
});

test("selectKeys keeps an explicit undefined value", () => {
  const out = kept(selectKeys(["a"])({ a: undefined }));
  assert.ok(Object.hasOwn(out, "a"));
  assert.equal(out.a, undefined);
});

test("selectKeys accepts the empty string as a key", () => {
  assert.deepEqual(kept(selectKeys([""])({ "": "x", a: 1 })), { "": "x" });
});

test("mapRows keeps whatever the function returns", () => {
  const transform = mapRows((row) => ({ ...row, total: Number(row.qty) * 2 }));
  assert.deepEqual(kept(transform({ qty: 3 })), { qty: 3, total: 6 });
});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Configuration errors");

test("renameKeys rejects a non-string target", () => {
  assert.throws(
    () => Reflect.apply(renameKeys, undefined, [{ a: 1 }]),
    (err: unknown) => {
      const error = configError(err);
      assert.deepEqual(error.issues[0]?.path, ["a"]);
      assert.equal(error.issues[0]?.code, "invalid_type");
      return true;
    }
  );
});

test("selectKeys rejects a non-string key with its index", () => {
  assert.throws(
    () => Reflect.apply(selectKeys, undefined, [["a", 3]]),
    (err: unknown) => {
      const error = configError(err);
      assert.equal(error.transform, "selectKeys");
      assert.deepEqual(error.issues[0]?.path, [1]);
      assert.equal(error.issues[0]?.code, "invalid_type");
      return true;
    }
  );
});

test("filterRows rejects a non-function predicate", () => {
  assert.throws(
    () => Reflect.apply(filterRows, undefined, ["total_price > 20"]),
    (err: unknown) => {
      const error = configError(err);
      assert.equal(error.transform, "filterRows");
      assert.equal(error.issues[0]?.message, "predicate must be a function");
      return true;
    }
  );
});

test("format lists each issue with its path", () => {
  try {
    Reflect.apply(renameKeys, undefined, [{ a: 1 }]);
    assert.fail("expected renameKeys to throw");
  } catch (err) {
    assert.equal(
      configError(err).format(),
      "Invalid renameKeys configuration:\n  - a: Expected string, received number"
    );
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
