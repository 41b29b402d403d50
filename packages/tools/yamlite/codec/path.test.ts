import { expect, test } from "vitest";
import { deletePath, getPath, setPath, splitPath } from "./path.ts";
import { fromPlain, toPlain } from "./plain.ts";
import { yamlMapping, yamlNumber, yamlString } from "../domain/entities/value.ts";

test("splitPath - drops empty segments", () => {
  expect(splitPath("a..b.")).toEqual(["a", "b"]);
  expect(splitPath("")).toEqual([]);
});

// ============================================================================
// getPath
// ============================================================================

test("getPath - gets nested values", () => {
  const tree = fromPlain({ database: { host: "localhost", port: 5432 } });
  expect(getPath(tree, "database.host")).toEqual(yamlString("localhost"));
  expect(getPath(tree, "database.port")).toEqual(yamlNumber(5432));
});

test("getPath - returns undefined for a missing key", () => {
  const tree = fromPlain({ name: "x" });
  expect(getPath(tree, "database.host")).toBeUndefined();
  expect(getPath(tree, "other")).toBeUndefined();
});

test("getPath - does not walk through scalars or sequences", () => {
  const tree = fromPlain({ name: "x", list: [{ a: 1 }] });
  expect(getPath(tree, "name.length")).toBeUndefined();
  expect(getPath(tree, "list.0")).toBeUndefined();
});

test("getPath - a path without segments yields the tree", () => {
  const tree = fromPlain({ a: 1 });
  expect(getPath(tree, "")).toBe(tree);
});

// ============================================================================
// setPath
// ============================================================================

test("setPath - creates intermediate mappings", () => {
  const tree = yamlMapping();
  const result = setPath(tree, "a.b.c", yamlNumber(5));
  expect(result).toBe(tree);
  expect(toPlain(tree)).toEqual({ a: { b: { c: 5 } } });
});

test("setPath - replaces a scalar on the way with a fresh mapping", () => {
  const tree = fromPlain({ a: "scalar", keep: true });
  setPath(tree, "a.b", yamlNumber(1));
  expect(toPlain(tree)).toEqual({ a: { b: 1 }, keep: true });
});

test("setPath - replaces a sequence on the way with a fresh mapping", () => {
  const tree = fromPlain({ a: [1, 2] });
  setPath(tree, "a.b", yamlNumber(1));
  expect(toPlain(tree)).toEqual({ a: { b: 1 } });
});

test("setPath - keeps siblings and key position", () => {
  const tree = fromPlain({ db: { host: "old", port: 1 }, z: 0 });
  setPath(tree, "db.host", yamlString("new"));
  expect(toPlain(tree)).toEqual({ db: { host: "new", port: 1 }, z: 0 });
  const db = getPath(tree, "db");
  expect(db?.kind === "mapping" ? [...db.entries.keys()] : []).toEqual([
    "host",
    "port",
  ]);
});

test("setPath - leaves a tree that is not a mapping untouched", () => {
  const tree = fromPlain([1]);
  expect(setPath(tree, "a", yamlNumber(2))).toBe(tree);
  expect(toPlain(tree)).toEqual([1]);
});

test("setPath - an empty path changes nothing", () => {
  const tree = fromPlain({ a: 1 });
  setPath(tree, "", yamlNumber(2));
  expect(toPlain(tree)).toEqual({ a: 1 });
});

// ============================================================================
// deletePath
// ============================================================================

test("deletePath - removes an existing key", () => {
  const tree = fromPlain({ db: { host: "h", port: 1 } });
  expect(deletePath(tree, "db.host")).toBe(true);
  expect(toPlain(tree)).toEqual({ db: { port: 1 } });
});

test("deletePath - reports a missing key", () => {
  const tree = fromPlain({ db: { port: 1 } });
  expect(deletePath(tree, "db.host")).toBe(false);
  expect(deletePath(tree, "nope.host")).toBe(false);
  expect(deletePath(tree, "")).toBe(false);
});
