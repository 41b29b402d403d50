/**
 * Scalar literals: reading bare values and deciding how strings are written.
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

const NULL_WORDS = new Set(["null", "~", ""]);
const TRUE_WORDS = new Set(["true", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "no", "off"]);

const DECIMAL = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const HEXADECIMAL = /^([-+]?)0[xX]([0-9a-fA-F]+)$/;

/** Characters that force quoting and rule out the block literal form */
export const SPECIAL_CHARS = /[:#[\]{}]/;

/**
 * Parse a numeric literal, or return undefined when the text is not one.
 */
export function parseNumber(text: string): number | undefined {
  if (DECIMAL.test(text)) return Number(text);
  const hex = HEXADECIMAL.exec(text);
  if (hex) {
    const magnitude = Number.parseInt(hex[2] ?? "", 16);
    return hex[1] === "-" ? -magnitude : magnitude;
  }
  return undefined;
}

function isQuoted(text: string): boolean {
  if (text.length < 2) return false;
  const first = text[0];
  return (first === '"' || first === "'") && text.endsWith(first);
}

/** Strip one pair of matching surrounding quotes, if present */
export function unquote(text: string): string {
  return isQuoted(text) ? text.slice(1, -1) : text;
}

/**
 * Index of the quote closing the one that opens `text`, or -1 when `text`
 * does not open with a quote or never closes it. Backslash escapes are
 * skipped inside double quotes.
 */
export function closingQuote(text: string): number {
  const mark = text[0];
  if (mark !== '"' && mark !== "'") return -1;
  for (let i = 1; i < text.length; i++) {
    const c = text[i];
    if (c === "\\" && mark === '"') {
      i++;
    } else if (c === mark) {
      return i;
    }
  }
  return -1;
}

/** True when the text is a single quoted scalar such as `"10:30"` */
export function isQuotedScalar(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length >= 2 && closingQuote(trimmed) === trimmed.length - 1;
}

/**
 * Parse a bare (non-block) value.
 *
 * Quoted text is returned verbatim without escape processing.
 */
export function parseScalar(raw: string): YamlValue {
  const text = raw.trim();

  if (NULL_WORDS.has(text)) return yamlNull();
  if (TRUE_WORDS.has(text)) return yamlBool(true);
  if (FALSE_WORDS.has(text)) return yamlBool(false);
  if (text === "[]") return yamlSequence();
  if (text === "{}") return yamlMapping();

  const num = parseNumber(text);
  if (num !== undefined) return yamlNumber(num);

  return yamlString(unquote(text));
}

// ============================================================================
// Writing
// ============================================================================

// Words the decoder would not read back as a string
const RESERVED_WORDS = new Set([
  ...NULL_WORDS,
  ...TRUE_WORDS,
  ...FALSE_WORDS,
  "|",
  ">",
]);

export function needsQuote(s: string): boolean {
  return /^\d+$/.test(s) ||
    /^[\d.]+$/.test(s) ||
    RESERVED_WORDS.has(s) ||
    parseNumber(s) !== undefined ||
    SPECIAL_CHARS.test(s) ||
    /^["']/.test(s) ||
    /^\s/.test(s) ||
    /\s$/.test(s) ||
    s.includes("\n");
}

export function escapeDouble(s: string): string {
  return s
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

// Quoted text is read back verbatim, so a string opening with one quote
// mark is wrapped in the other when nothing inside needs escaping
function wrapInOtherMark(s: string): string | undefined {
  const mark = s.startsWith('"') ? "'" : s.startsWith("'") ? '"' : undefined;
  if (mark === undefined || s.includes(mark) || /[\\\n\r\t]/.test(s)) {
    return undefined;
  }
  return mark + s + mark;
}

/** Quote a string (value or key) when the decoder could misread it */
export function quoteString(s: string): string {
  if (!needsQuote(s)) return s;
  return wrapInOtherMark(s) ?? `"${escapeDouble(s)}"`;
}
