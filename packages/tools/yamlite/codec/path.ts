/**
 * Dot-separated key paths over mapping chains, e.g. "database.host".
 * Empty segments are ignored, so "a..b" addresses the same node as "a.b".
 */

import {
  isMapping,
  yamlMapping,
  type YamlMapping,
  type YamlValue,
} from "../domain/entities/value.ts";

export function splitPath(path: string): string[] {
  return path.split(".").filter((segment) => segment.length > 0);
}

/**
 * Walk the mapping chain. Returns undefined as soon as a node is not a
 * mapping or a key is missing; a path without segments yields the tree.
 */
export function getPath(
  tree: YamlValue,
  path: string,
): YamlValue | undefined {
  let current: YamlValue | undefined = tree;
  for (const key of splitPath(path)) {
    if (!isMapping(current)) return undefined;
    current = current.entries.get(key);
  }
  return current;
}

/**
 * Assign `value` at `path`, creating intermediate mappings. Any
 * intermediate value that is not a mapping is replaced by an empty one.
 * Mutates and returns `tree`; a tree that is not a mapping is left as is.
 */
export function setPath(
  tree: YamlValue,
  path: string,
  value: YamlValue,
): YamlValue {
  const keys = splitPath(path);
  const last = keys.pop();
  if (last === undefined || !isMapping(tree)) return tree;

  let current: YamlMapping = tree;
  for (const key of keys) {
    const next = current.entries.get(key);
    if (isMapping(next)) {
      current = next;
    } else {
      const created = yamlMapping();
      current.entries.set(key, created);
      current = created;
    }
  }
  current.entries.set(last, value);
  return tree;
}

/**
 * Remove the value at `path`. Returns true if it existed.
 */
export function deletePath(tree: YamlValue, path: string): boolean {
  const keys = splitPath(path);
  const last = keys.pop();
  if (last === undefined) return false;

  const parent = getPath(tree, keys.join("."));
  if (!isMapping(parent)) return false;
  return parent.entries.delete(last);
}
