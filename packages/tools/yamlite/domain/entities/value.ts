/**
 * Domain entities for yamlite.
 *
 * A decoded document is a tree of tagged nodes. Containers carry their
 * kind from the moment they are created, so an empty sequence and an
 * empty mapping stay distinct.
 *
 * This module has ZERO external dependencies.
 */

export interface YamlNull {
  readonly kind: "null";
}

export interface YamlBool {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface YamlNumber {
  readonly kind: "number";
  readonly value: number;
}

export interface YamlString {
  readonly kind: "string";
  readonly value: string;
}

/** Ordered list of values */
export interface YamlSequence {
  readonly kind: "sequence";
  readonly items: YamlValue[];
}

/** Insertion-ordered key/value pairs with unique keys */
export interface YamlMapping {
  readonly kind: "mapping";
  readonly entries: Map<string, YamlValue>;
}

export type YamlScalar = YamlNull | YamlBool | YamlNumber | YamlString;

export type YamlContainer = YamlSequence | YamlMapping;

export type YamlValue = YamlScalar | YamlContainer;

export type YamlKind = YamlValue["kind"];

// ============================================================================
// Constructors
// ============================================================================

export function yamlNull(): YamlNull {
  return { kind: "null" };
}

export function yamlBool(value: boolean): YamlBool {
  return { kind: "bool", value };
}

export function yamlNumber(value: number): YamlNumber {
  return { kind: "number", value };
}

export function yamlString(value: string): YamlString {
  return { kind: "string", value };
}

export function yamlSequence(items: YamlValue[] = []): YamlSequence {
  return { kind: "sequence", items };
}

export function yamlMapping(
  entries: Iterable<readonly [string, YamlValue]> = [],
): YamlMapping {
  return { kind: "mapping", entries: new Map(entries) };
}

// ============================================================================
// Guards
// ============================================================================

export function isMapping(value: YamlValue | undefined): value is YamlMapping {
  return value?.kind === "mapping";
}

export function isSequence(
  value: YamlValue | undefined,
): value is YamlSequence {
  return value?.kind === "sequence";
}

export function isContainer(
  value: YamlValue | undefined,
): value is YamlContainer {
  return value?.kind === "mapping" || value?.kind === "sequence";
}

/** True for a container that holds at least one item or entry */
export function isFilledContainer(value: YamlValue): value is YamlContainer {
  if (value.kind === "sequence") return value.items.length > 0;
  if (value.kind === "mapping") return value.entries.size > 0;
  return false;
}
