/**
 * Use Case: WriteDocument
 *
 * Encode a value tree and write it to a file, replacing its contents.
 *
 * Dependencies: FileSystem (port), YamlService (port).
 */

import { reasonOf, YamlError } from "../entities/errors.ts";
import type { YamlValue } from "../entities/value.ts";
import type { FileSystem } from "../ports/filesystem.ts";
import type {
  StringifyOptions,
  YamlService,
} from "../ports/yaml-service.ts";

export interface WriteDocumentInput {
  readonly path: string;
  readonly value: YamlValue;
  readonly options?: StringifyOptions;
}

export interface WriteDocumentOutput {
  readonly path: string;
  /** The text that was written */
  readonly content: string;
}

export class WriteDocumentUseCase {
  constructor(
    private readonly fs: FileSystem,
    private readonly yamlService: YamlService,
  ) {}

  async execute(input: WriteDocumentInput): Promise<WriteDocumentOutput> {
    const { path, value, options } = input;
    const content = this.yamlService.stringify(value, options);

    try {
      await this.fs.writeFile(path, content);
    } catch (e) {
      throw new YamlError(
        "io_error",
        `Failed to open file for writing: ${reasonOf(e)}`,
        path,
      );
    }

    return { path, content };
  }
}
