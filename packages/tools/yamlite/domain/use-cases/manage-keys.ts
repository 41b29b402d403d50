/**
 * Use Case: ManageKeys
 *
 * Get, set, delete values in a decoded document by dot path.
 * Set and delete mutate the tree they are given.
 *
 * Dependencies: YamlService (port) for parsing/serialization and paths.
 */

import { YamlError } from "../entities/errors.ts";
import type { YamlValue } from "../entities/value.ts";
import type { YamlService } from "../ports/yaml-service.ts";

export interface GetKeyInput {
  readonly tree: YamlValue;
  readonly key?: string;
}

export interface SetKeyInput {
  readonly tree: YamlValue;
  readonly key: string;
  /** Raw text: a scalar literal or a YAML snippet */
  readonly value: string;
}

export interface DeleteKeyInput {
  readonly tree: YamlValue;
  readonly key: string;
}

export interface KeyGetResult {
  /** The value at the key, or the whole tree when no key is given */
  readonly value: YamlValue | undefined;
  /** Formatted string for display */
  readonly formatted: string;
}

export interface KeyMutationResult {
  readonly tree: YamlValue;
  readonly message: string;
}

export class ManageKeysUseCase {
  constructor(private readonly yamlService: YamlService) {}

  get(input: GetKeyInput): KeyGetResult {
    const { tree, key } = input;

    if (!key) {
      return {
        value: tree,
        formatted: this.yamlService.stringify(tree),
      };
    }

    const value = this.yamlService.getNestedValue(tree, key);
    return {
      value,
      formatted: this.yamlService.formatValue(value),
    };
  }

  set(input: SetKeyInput): KeyMutationResult {
    const { tree, key, value } = input;

    this.yamlService.setNestedValue(
      tree,
      key,
      this.yamlService.parseValue(value),
    );

    return {
      tree,
      message: `set ${key}`,
    };
  }

  delete(input: DeleteKeyInput): KeyMutationResult {
    const { tree, key } = input;

    const deleted = this.yamlService.deleteNestedValue(tree, key);
    if (!deleted) {
      throw new YamlError("key_not_found", `Key '${key}' not found`);
    }

    return {
      tree,
      message: `deleted ${key}`,
    };
  }
}
