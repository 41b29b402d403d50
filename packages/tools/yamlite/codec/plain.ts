/**
 * Conversion between value trees and JSON-like JavaScript data.
 */

import {
  yamlBool,
  yamlMapping,
  yamlNull,
  yamlNumber,
  yamlSequence,
  yamlString,
  type YamlValue,
} from "../domain/entities/value.ts";

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

function isRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Build a value tree from JavaScript data. `undefined` becomes null;
 * anything that is neither JSON-like nor a plain object becomes its
 * `String()` form.
 */
export function fromPlain(data: unknown): YamlValue {
  if (data === null || data === undefined) return yamlNull();
  if (typeof data === "boolean") return yamlBool(data);
  if (typeof data === "number") return yamlNumber(data);
  if (typeof data === "string") return yamlString(data);
  if (Array.isArray(data)) {
    return yamlSequence(data.map((item: unknown) => fromPlain(item)));
  }
  if (typeof data === "object" && isRecord(data)) {
    return yamlMapping(
      Object.entries(data).map((
        [key, value],
      ): [string, YamlValue] => [key, fromPlain(value)]),
    );
  }
  return yamlString(String(data));
}

/** Convert a value tree to JSON-compatible JavaScript data */
export function toPlain(value: YamlValue): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "sequence":
      return value.items.map(toPlain);
    case "mapping":
      return Object.fromEntries(
        [...value.entries].map(([key, item]) => [key, toPlain(item)]),
      );
  }
}
