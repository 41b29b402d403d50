/**
 * Encoder configuration.
 *
 * There is no process-wide setting: callers resolve a Config once and
 * pass it to whatever encodes.
 */

import { z } from "zod";
import { YamlError } from "./domain/entities/errors.ts";
import { DEFAULT_INDENT_WIDTH } from "./codec/encoder.ts";

export interface Config {
  /** Number of spaces per nesting level */
  readonly indentWidth: number;
}

export const DEFAULT_CONFIG: Config = {
  indentWidth: DEFAULT_INDENT_WIDTH,
};

const ConfigInputSchema = z
  .object({
    indentWidth: z.number().int().min(1).max(16),
  })
  .partial()
  .strict();

export type ConfigInput = z.infer<typeof ConfigInputSchema>;

/**
 * Merge `input` over the defaults.
 * Throws YamlError("invalid_config") when the input does not validate.
 */
export function resolveConfig(input: unknown = {}): Config {
  const parsed = ConfigInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new YamlError("invalid_config", `Invalid configuration: ${issues}`);
  }
  return {
    indentWidth: parsed.data.indentWidth ?? DEFAULT_CONFIG.indentWidth,
  };
}
