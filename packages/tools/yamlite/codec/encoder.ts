/**
 * Value tree to YAML text.
 * Deterministic: mapping keys are emitted in sorted order, whatever order
 * they were read or inserted in.
 */

import { quoteString, SPECIAL_CHARS } from "./scalar.ts";
import {
  isFilledContainer,
  type YamlMapping,
  type YamlSequence,
  type YamlValue,
} from "../domain/entities/value.ts";

export interface EncodeOptions {
  /** Spaces per nesting level (default 2) */
  indentWidth?: number;
}

export const DEFAULT_INDENT_WIDTH = 2;

// Block scalar bodies sit this many columns right of the line owning them
const BLOCK_OFFSET = 2;

function writeNumber(n: number): string {
  return String(n);
}

/**
 * Render a string owned by a line at `depth`. Multi-line text without
 * special characters becomes a `|` block; empty lines are not kept.
 */
function writeString(s: string, depth: number): string {
  if (s.includes("\n") && !SPECIAL_CHARS.test(s)) {
    const pad = " ".repeat(depth + BLOCK_OFFSET);
    const body = s
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line) => pad + line);
    return ["|", ...body].join("\n");
  }
  return quoteString(s);
}

class Encoder {
  constructor(private readonly indentWidth: number) {}

  /**
   * Non-empty containers render as "\n"-prefixed lines at `depth`; every
   * other value renders inline, owned by a line at `depth`.
   */
  render(value: YamlValue, depth: number): string {
    switch (value.kind) {
      case "null":
        return "null";
      case "bool":
        return value.value ? "true" : "false";
      case "number":
        return writeNumber(value.value);
      case "string":
        return writeString(value.value, depth);
      case "sequence":
        return this.renderSequence(value, depth);
      case "mapping":
        return this.renderMapping(value, depth);
    }
  }

  private renderSequence(sequence: YamlSequence, depth: number): string {
    if (sequence.items.length === 0) return "[]";
    const pad = " ".repeat(depth);
    const lines = sequence.items.map((item) => {
      if (isFilledContainer(item)) {
        return `${pad}-${this.render(item, depth + this.indentWidth)}`;
      }
      return `${pad}- ${this.render(item, depth)}`;
    });
    return "\n" + lines.join("\n");
  }

  private renderMapping(mapping: YamlMapping, depth: number): string {
    if (mapping.entries.size === 0) return "{}";
    const pad = " ".repeat(depth);
    const keys = [...mapping.entries.keys()].sort();
    const lines = keys.map((key) => {
      const value = mapping.entries.get(key);
      const keyPart = pad + quoteString(key) + ":";
      if (value === undefined) return `${keyPart} null`;
      if (isFilledContainer(value)) {
        return keyPart + this.render(value, depth + this.indentWidth);
      }
      return `${keyPart} ${this.render(value, depth)}`;
    });
    return "\n" + lines.join("\n");
  }
}

/**
 * Serialize a value tree to YAML text.
 *
 * A scalar renders as its bare text; a container has the leading newline
 * of its line block removed.
 */
export function encode(value: YamlValue, options: EncodeOptions = {}): string {
  const indentWidth = options.indentWidth ?? DEFAULT_INDENT_WIDTH;
  const text = new Encoder(indentWidth).render(value, 0);
  return text.startsWith("\n") ? text.slice(1) : text;
}
