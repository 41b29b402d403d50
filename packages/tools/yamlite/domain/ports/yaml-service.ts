/**
 * Port: YamlService
 *
 * Abstracts YAML parsing/serialization and nested-value operations
 * so the use cases do not depend on the codec modules directly.
 *
 * Dependencies: entities only.
 */

import type { YamlValue } from "../entities/value.ts";

export interface StringifyOptions {
  /** Spaces per nesting level */
  readonly indentWidth?: number;
}

/** YAML parsing, serialization, and nested-value manipulation */
export interface YamlService {
  /** Parse YAML text into a value tree. Never fails. */
  parse(yaml: string): YamlValue;

  /**
   * Parse a single value given on its own, e.g. a CLI argument.
   * A multi-line snippet with entries or items yields that container;
   * anything else is read as a scalar, so "http://host" stays a string.
   */
  parseValue(text: string): YamlValue;

  /** Serialize a value tree to YAML text */
  stringify(value: YamlValue, options?: StringifyOptions): string;

  /**
   * Get a nested value using dot notation, e.g. "database.host".
   * Returns undefined as soon as the chain breaks.
   */
  getNestedValue(tree: YamlValue, path: string): YamlValue | undefined;

  /**
   * Set a nested value using dot notation.
   * Replaces anything that is not a mapping along the way with a new mapping.
   */
  setNestedValue(tree: YamlValue, path: string, value: YamlValue): YamlValue;

  /**
   * Delete a nested value using dot notation.
   * Returns true if the value was found and deleted, false otherwise.
   */
  deleteNestedValue(tree: YamlValue, path: string): boolean;

  /**
   * Format a value for human-readable output.
   * Strings are returned as-is, numbers/booleans are stringified,
   * containers are serialized as YAML.
   */
  formatValue(value: YamlValue | undefined): string;
}
