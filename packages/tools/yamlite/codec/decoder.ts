/**
 * YAML text to value tree.
 *
 * Line-based: every non-empty line is attached to the container on top of
 * an indentation stack. The decoder is lenient and has no failure path:
 * lines it cannot place are skipped and the tree built so far is returned.
 */

import {
  closingQuote,
  isQuotedScalar,
  parseScalar,
  unquote,
} from "./scalar.ts";
import {
  type YamlContainer,
  yamlMapping,
  type YamlMapping,
  yamlNull,
  yamlSequence,
  yamlString,
  type YamlValue,
} from "../domain/entities/value.ts";

interface Frame {
  container: YamlContainer;
  readonly indent: number;
  /** Only the root starts undetermined: its first line decides its kind */
  undetermined: boolean;
}

const BLOCK_MARKERS = new Set(["|", ">"]);

function countIndent(line: string): number {
  let n = 0;
  while (line[n] === " ") n++;
  return n;
}

function isComment(trimmed: string): boolean {
  return trimmed.startsWith("#");
}

function isSequenceItem(trimmed: string): boolean {
  return trimmed === "-" || trimmed.startsWith("- ");
}

/**
 * Split `key: value` on the first colon after the key; undefined for an
 * empty key. A quoted key may hold colons of its own.
 */
function splitEntry(
  text: string,
): { key: string; value: string } | undefined {
  const colon = text.indexOf(":", Math.max(closingQuote(text), 0));
  if (colon <= 0) return undefined;
  const key = unquote(text.slice(0, colon).trim());
  if (key === "") return undefined;
  return { key, value: text.slice(colon + 1).trim() };
}

class LineDecoder {
  private readonly lines: string[];
  private readonly root: Frame;
  private readonly stack: Frame[];
  private i = 0;

  constructor(text: string) {
    this.lines = text.split(/[\r\n]+/).filter((line) => line.length > 0);
    this.root = {
      container: yamlMapping(),
      indent: -1,
      undetermined: true,
    };
    this.stack = [this.root];
  }

  decode(): YamlValue {
    while (this.i < this.lines.length) {
      const line = this.lines[this.i] ?? "";
      const trimmed = line.trim();
      if (trimmed !== "" && !isComment(trimmed)) {
        this.decodeLine(countIndent(line), trimmed);
      }
      this.i++;
    }
    return this.root.container;
  }

  private decodeLine(indent: number, trimmed: string): void {
    while (this.stack.length > 1 && indent <= this.top().indent) {
      this.stack.pop();
    }
    const frame = this.top();

    // A root written as `[]` or `{}` is an empty container of that kind
    if (frame.undetermined && (trimmed === "[]" || trimmed === "{}")) {
      frame.container = trimmed === "[]" ? yamlSequence() : yamlMapping();
      frame.undetermined = false;
      return;
    }

    if (isSequenceItem(trimmed)) {
      this.decodeItem(frame, indent, trimmed.slice(1).trim());
    } else if (trimmed.includes(":")) {
      const mapping = frame.container;
      if (mapping.kind !== "mapping") return;
      frame.undetermined = false;
      this.applyEntry(mapping, trimmed, indent);
    }
  }

  private decodeItem(frame: Frame, indent: number, rest: string): void {
    if (frame.undetermined && frame.container.kind === "mapping") {
      frame.container = yamlSequence();
    }
    frame.undetermined = false;
    const sequence = frame.container;
    if (sequence.kind !== "sequence") return;

    if (rest === "" || BLOCK_MARKERS.has(rest)) {
      sequence.items.push(this.openNested(rest, indent));
      return;
    }

    if (rest.includes(":") && !isQuotedScalar(rest)) {
      const mapping = yamlMapping();
      sequence.items.push(mapping);
      this.stack.push({ container: mapping, indent, undetermined: false });
      // Keys written after the dash sit two columns right of it
      this.applyEntry(mapping, rest, indent + 2);
      return;
    }

    sequence.items.push(parseScalar(rest));
  }

  private applyEntry(mapping: YamlMapping, text: string, indent: number): void {
    const entry = splitEntry(text);
    if (!entry) return;

    if (entry.value === "" || BLOCK_MARKERS.has(entry.value)) {
      mapping.entries.set(entry.key, this.openNested(entry.value, indent));
      return;
    }
    mapping.entries.set(entry.key, parseScalar(entry.value));
  }

  /**
   * Resolve a value left open at the end of its line: a block scalar when
   * `marker` is `|` or `>`, otherwise a container chosen by the next line.
   */
  private openNested(marker: string, indent: number): YamlValue {
    if (BLOCK_MARKERS.has(marker)) {
      return yamlString(this.readBlock(indent));
    }

    const next = this.peekContentLine();
    if (next === undefined || countIndent(next) <= indent) {
      return yamlNull();
    }
    const container = isSequenceItem(next.trim())
      ? yamlSequence()
      : yamlMapping();
    this.stack.push({ container, indent, undetermined: false });
    return container;
  }

  /** Consume the lines indented past `indent`, stripping `indent + 2` columns */
  private readBlock(indent: number): string {
    const body: string[] = [];
    while (this.i + 1 < this.lines.length) {
      const next = this.lines[this.i + 1] ?? "";
      if (countIndent(next) <= indent) break;
      body.push(next.slice(indent + 2));
      this.i++;
    }
    return body.join("\n");
  }

  private peekContentLine(): string | undefined {
    for (let j = this.i + 1; j < this.lines.length; j++) {
      const line = this.lines[j] ?? "";
      const trimmed = line.trim();
      if (trimmed !== "" && !isComment(trimmed)) return line;
    }
    return undefined;
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1] ?? this.root;
  }
}

/**
 * Parse YAML text into a value tree.
 *
 * Empty input yields an empty mapping.
 */
export function decode(text: string): YamlValue {
  return new LineDecoder(text).decode();
}
