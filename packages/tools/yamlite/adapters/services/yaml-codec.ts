/**
 * Adapter: YamlCodecService
 *
 * Concrete YamlService implementation over the line decoder, the
 * sorted-key encoder and the dot-path accessor.
 *
 * Dependencies: codec modules, Config.
 */

import { decode } from "../../codec/decoder.ts";
import { encode } from "../../codec/encoder.ts";
import { deletePath, getPath, setPath } from "../../codec/path.ts";
import { parseScalar } from "../../codec/scalar.ts";
import { type Config, DEFAULT_CONFIG } from "../../config.ts";
import {
  isFilledContainer,
  type YamlValue,
} from "../../domain/entities/value.ts";
import type {
  StringifyOptions,
  YamlService,
} from "../../domain/ports/yaml-service.ts";

export class YamlCodecService implements YamlService {
  constructor(private readonly config: Config = DEFAULT_CONFIG) {}

  parse(yaml: string): YamlValue {
    return decode(yaml);
  }

  parseValue(text: string): YamlValue {
    if (text.includes("\n")) {
      const parsed = decode(text);
      if (isFilledContainer(parsed)) {
        return parsed;
      }
    }
    return parseScalar(text);
  }

  stringify(value: YamlValue, options: StringifyOptions = {}): string {
    return encode(value, {
      indentWidth: options.indentWidth ?? this.config.indentWidth,
    });
  }

  getNestedValue(tree: YamlValue, path: string): YamlValue | undefined {
    return getPath(tree, path);
  }

  setNestedValue(tree: YamlValue, path: string, value: YamlValue): YamlValue {
    return setPath(tree, path, value);
  }

  deleteNestedValue(tree: YamlValue, path: string): boolean {
    return deletePath(tree, path);
  }

  formatValue(value: YamlValue | undefined): string {
    if (value === undefined || value.kind === "null") {
      return "";
    }
    if (value.kind === "string") {
      return value.value;
    }
    if (value.kind === "number" || value.kind === "bool") {
      return String(value.value);
    }
    // For sequences and mappings, return YAML
    return this.stringify(value);
  }
}
