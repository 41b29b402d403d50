/**
 * CLI output formatters for yamlite.
 *
 * Text and JSON formatting for all command outputs.
 * These are pure functions with no side effects.
 */

import { toPlain } from "../../codec/plain.ts";
import type { YamlValue } from "../../domain/entities/value.ts";

// ============================================================================
// Text formatters
// ============================================================================

export function formatMutation(action: "set" | "deleted", key: string): string {
  return `${action} ${key}`;
}

export function formatRewrite(file: string): string {
  return `formatted ${file}`;
}

// ============================================================================
// JSON formatters
// ============================================================================

export function jsonTree(tree: YamlValue): string {
  return JSON.stringify(toPlain(tree), null, 2);
}

export function jsonKey(key: string, value: YamlValue | undefined): string {
  return JSON.stringify({
    key,
    found: value !== undefined,
    value: value === undefined ? null : toPlain(value),
  });
}

export function jsonMutation(
  action: "set" | "deleted",
  key: string,
  file: string,
): string {
  return JSON.stringify({ action, key, file });
}
