/**
 * Unit tests for domain use cases.
 *
 * Uses the in-memory file system; no real files are touched.
 */

import { beforeEach, expect, test } from "vitest";
import { InMemoryFileSystem } from "../../adapters/filesystem/in-memory-fs.ts";
import { YamlCodecService } from "../../adapters/services/yaml-codec.ts";
import { toPlain } from "../../codec/plain.ts";
import { YamlError } from "../entities/errors.ts";
import { yamlMapping, yamlNumber } from "../entities/value.ts";
import { ReadDocumentUseCase } from "./read-document.ts";
import { WriteDocumentUseCase } from "./write-document.ts";
import { ModifyDocumentUseCase } from "./modify-document.ts";
import { ManageKeysUseCase } from "./manage-keys.ts";

let fs: InMemoryFileSystem;
let yamlService: YamlCodecService;
let readDocument: ReadDocumentUseCase;
let writeDocument: WriteDocumentUseCase;
let modifyDocument: ModifyDocumentUseCase;

beforeEach(() => {
  fs = new InMemoryFileSystem();
  yamlService = new YamlCodecService();
  readDocument = new ReadDocumentUseCase(fs, yamlService);
  writeDocument = new WriteDocumentUseCase(fs, yamlService);
  modifyDocument = new ModifyDocumentUseCase(readDocument, writeDocument);
});

async function rejection(promise: Promise<unknown>): Promise<YamlError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof YamlError) return e;
    throw e;
  }
  throw new Error("expected the promise to reject");
}

// ============================================================================
// ReadDocument
// ============================================================================

test("ReadDocument - decodes the file", async () => {
  fs.setFile("app.yaml", "name: app\nport: 80\n");
  const tree = await readDocument.execute({ path: "app.yaml" });
  expect(toPlain(tree)).toEqual({ name: "app", port: 80 });
});

test("ReadDocument - missing file is an io_error with the reason", async () => {
  const error = await rejection(readDocument.execute({ path: "missing.yaml" }));
  expect(error.code).toBe("io_error");
  expect(error.file).toBe("missing.yaml");
  expect(error.message).toBe(
    "Failed to open file: ENOENT: no such file or directory, open 'missing.yaml'",
  );
});

// ============================================================================
// WriteDocument
// ============================================================================

test("WriteDocument - encodes and writes the tree", async () => {
  const tree = yamlMapping([["b", yamlNumber(2)], ["a", yamlNumber(1)]]);
  const output = await writeDocument.execute({ path: "out.yaml", value: tree });
  expect(output.content).toBe("a: 1\nb: 2");
  expect(fs.getFile("out.yaml")).toBe("a: 1\nb: 2");
});

test("WriteDocument - passes the indent width through", async () => {
  const tree = yamlMapping([["a", yamlMapping([["b", yamlNumber(1)]])]]);
  await writeDocument.execute({
    path: "out.yaml",
    value: tree,
    options: { indentWidth: 4 },
  });
  expect(fs.getFile("out.yaml")).toBe("a:\n    b: 1");
});

test("WriteDocument - write failure is an io_error", async () => {
  fs.lock("locked.yaml");
  const error = await rejection(
    writeDocument.execute({ path: "locked.yaml", value: yamlMapping() }),
  );
  expect(error.code).toBe("io_error");
  expect(error.message).toBe(
    "Failed to open file for writing: EACCES: permission denied, open 'locked.yaml'",
  );
});

// ============================================================================
// ModifyDocument
// ============================================================================

test("ModifyDocument - saves what the mutator returns", async () => {
  fs.setFile("app.yaml", "port: 80\n");
  await modifyDocument.execute({
    path: "app.yaml",
    mutator: (tree) =>
      yamlService.setNestedValue(tree, "db.host", yamlService.parseValue("h")),
  });
  expect(fs.getFile("app.yaml")).toBe("db:\n  host: h\nport: 80");
});

test("ModifyDocument - accepts an async mutator", async () => {
  fs.setFile("app.yaml", "a: 1\n");
  await modifyDocument.execute({
    path: "app.yaml",
    mutator: async () => await Promise.resolve(yamlMapping()),
  });
  expect(fs.getFile("app.yaml")).toBe("{}");
});

test("ModifyDocument - mutator returning nothing leaves the file", async () => {
  fs.setFile("app.yaml", "a: 1\n");
  const error = await rejection(
    modifyDocument.execute({ path: "app.yaml", mutator: () => undefined }),
  );
  expect(error.code).toBe("mutator_error");
  expect(error.message).toBe("Mutator returned nothing");
  expect(fs.getFile("app.yaml")).toBe("a: 1\n");
});

test("ModifyDocument - domain errors from the mutator pass through", async () => {
  fs.setFile("app.yaml", "a: 1\n");
  const error = await rejection(
    modifyDocument.execute({
      path: "app.yaml",
      mutator: () => {
        throw new YamlError("key_not_found", "Key 'b' not found");
      },
    }),
  );
  expect(error.code).toBe("key_not_found");
  expect(error.message).toBe("Key 'b' not found");
});

test("ModifyDocument - read failure stops before the mutator", async () => {
  let called = false;
  const error = await rejection(
    modifyDocument.execute({
      path: "missing.yaml",
      mutator: (tree) => {
        called = true;
        return tree;
      },
    }),
  );
  expect(error.code).toBe("io_error");
  expect(called).toBe(false);
  expect(fs.size).toBe(0);
});

// ============================================================================
// ManageKeys
// ============================================================================

test("ManageKeys - get formats the value at a key", () => {
  const manageKeys = new ManageKeysUseCase(yamlService);
  const tree = yamlService.parse("db:\n  host: h\n  port: 5432\n  opts:\n    - a\n");
  expect(manageKeys.get({ tree, key: "db.host" }).formatted).toBe("h");
  expect(manageKeys.get({ tree, key: "db.port" }).formatted).toBe("5432");
  expect(manageKeys.get({ tree, key: "db.opts" }).formatted).toBe("- a");
  expect(manageKeys.get({ tree, key: "db.user" })).toEqual({
    value: undefined,
    formatted: "",
  });
});

test("ManageKeys - get without a key returns the whole document", () => {
  const manageKeys = new ManageKeysUseCase(yamlService);
  const tree = yamlService.parse("b: 1\na: 2\n");
  expect(manageKeys.get({ tree }).formatted).toBe("a: 2\nb: 1");
});

test("ManageKeys - set reads the value as a scalar or a snippet", () => {
  const manageKeys = new ManageKeysUseCase(yamlService);
  const tree = yamlMapping();
  manageKeys.set({ tree, key: "n", value: "42" });
  manageKeys.set({ tree, key: "flag", value: "true" });
  manageKeys.set({ tree, key: "url", value: "http://host:80" });
  const result = manageKeys.set({ tree, key: "obj", value: "x: 1\ny: 2" });
  expect(result.message).toBe("set obj");
  expect(toPlain(tree)).toEqual({
    n: 42,
    flag: true,
    url: "http://host:80",
    obj: { x: 1, y: 2 },
  });
});

test("ManageKeys - delete removes a key or reports it missing", () => {
  const manageKeys = new ManageKeysUseCase(yamlService);
  const tree = yamlService.parse("a: 1\nb: 2\n");
  expect(manageKeys.delete({ tree, key: "a" }).message).toBe("deleted a");
  expect(toPlain(tree)).toEqual({ b: 2 });
  expect(() => manageKeys.delete({ tree, key: "a" })).toThrowError(
    "Key 'a' not found",
  );
});
