// Main module exports for yamlite

// ============================================================================
// Domain entities
// ============================================================================

export type {
  YamlBool,
  YamlContainer,
  YamlKind,
  YamlMapping,
  YamlNull,
  YamlNumber,
  YamlScalar,
  YamlSequence,
  YamlString,
  YamlValue,
} from "./domain/entities/value.ts";
export {
  isContainer,
  isMapping,
  isSequence,
  yamlBool,
  yamlMapping,
  yamlNull,
  yamlNumber,
  yamlSequence,
  yamlString,
} from "./domain/entities/value.ts";
export type { Result, YamlErrorCode } from "./domain/entities/errors.ts";
export { YamlError } from "./domain/entities/errors.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { FileSystem } from "./domain/ports/filesystem.ts";
export type {
  StringifyOptions,
  YamlService,
} from "./domain/ports/yaml-service.ts";

// ============================================================================
// Use cases
// ============================================================================

export { ReadDocumentUseCase } from "./domain/use-cases/read-document.ts";
export { WriteDocumentUseCase } from "./domain/use-cases/write-document.ts";
export {
  type Mutator,
  ModifyDocumentUseCase,
} from "./domain/use-cases/modify-document.ts";
export { ManageKeysUseCase } from "./domain/use-cases/manage-keys.ts";

// ============================================================================
// Codec
// ============================================================================

export { decode } from "./codec/decoder.ts";
export { encode, type EncodeOptions } from "./codec/encoder.ts";
export { deletePath, getPath, setPath } from "./codec/path.ts";
export { fromPlain, type PlainValue, toPlain } from "./codec/plain.ts";
export {
  type Config,
  type ConfigInput,
  DEFAULT_CONFIG,
  resolveConfig,
} from "./config.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { YamlCodecService } from "./adapters/services/yaml-codec.ts";

// ============================================================================
// CLI
// ============================================================================

export { main } from "./cli.ts";

// ============================================================================
// Facade - Result-returning API bound to a configuration
// ============================================================================

import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { YamlCodecService } from "./adapters/services/yaml-codec.ts";
import { decode } from "./codec/decoder.ts";
import type { EncodeOptions } from "./codec/encoder.ts";
import { deletePath, getPath, setPath } from "./codec/path.ts";
import { type Config, type ConfigInput, resolveConfig } from "./config.ts";
import { type Result, YamlError } from "./domain/entities/errors.ts";
import type { YamlValue } from "./domain/entities/value.ts";
import type { FileSystem } from "./domain/ports/filesystem.ts";
import { ReadDocumentUseCase } from "./domain/use-cases/read-document.ts";
import { WriteDocumentUseCase } from "./domain/use-cases/write-document.ts";
import {
  ModifyDocumentUseCase,
  type Mutator,
} from "./domain/use-cases/modify-document.ts";

export interface Yaml {
  readonly config: Config;
  parse(text: string): YamlValue;
  encode(value: YamlValue, options?: EncodeOptions): string;
  get(tree: YamlValue, path: string): YamlValue | undefined;
  set(tree: YamlValue, path: string, value: YamlValue): YamlValue;
  delete(tree: YamlValue, path: string): boolean;
  read(path: string): Promise<Result<YamlValue>>;
  write(
    path: string,
    value: YamlValue,
    options?: EncodeOptions,
  ): Promise<Result<void>>;
  modify(path: string, mutator: Mutator): Promise<Result<void>>;
}

async function attempt<T>(run: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (e) {
    if (e instanceof YamlError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * Create a yamlite instance bound to a validated configuration.
 * Throws YamlError("invalid_config") for a bad configuration; every
 * operation of the instance reports failures through Result instead.
 */
export function createYaml(
  config: ConfigInput = {},
  fs: FileSystem = new NodeFileSystem(),
): Yaml {
  const resolved = resolveConfig(config);
  const yamlService = new YamlCodecService(resolved);
  const readDocument = new ReadDocumentUseCase(fs, yamlService);
  const writeDocument = new WriteDocumentUseCase(fs, yamlService);
  const modifyDocument = new ModifyDocumentUseCase(readDocument, writeDocument);

  return {
    config: resolved,
    parse: (text) => yamlService.parse(text),
    encode: (value, options = {}) => yamlService.stringify(value, options),
    get: (tree, path) => getPath(tree, path),
    set: (tree, path, value) => setPath(tree, path, value),
    delete: (tree, path) => deletePath(tree, path),
    read: (path) => attempt(() => readDocument.execute({ path })),
    write: (path, value, options) =>
      attempt(async () => {
        await writeDocument.execute({ path, value, options });
      }),
    modify: (path, mutator) =>
      attempt(async () => {
        await modifyDocument.execute({ path, mutator });
      }),
  };
}

// Default instance for the functional API
let _default: Yaml | undefined;

function defaultYaml(): Yaml {
  _default ??= createYaml();
  return _default;
}

export function parse(text: string): YamlValue {
  return decode(text);
}

export async function read(path: string): Promise<Result<YamlValue>> {
  return await defaultYaml().read(path);
}

export async function write(
  path: string,
  value: YamlValue,
  options?: EncodeOptions,
): Promise<Result<void>> {
  return await defaultYaml().write(path, value, options);
}

export async function modify(
  path: string,
  mutator: Mutator,
): Promise<Result<void>> {
  return await defaultYaml().modify(path, mutator);
}
