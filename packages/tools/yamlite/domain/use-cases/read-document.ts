/**
 * Use Case: ReadDocument
 *
 * Read a YAML file and decode it into a value tree.
 *
 * Dependencies: FileSystem (port), YamlService (port).
 */

import { reasonOf, YamlError } from "../entities/errors.ts";
import type { YamlValue } from "../entities/value.ts";
import type { FileSystem } from "../ports/filesystem.ts";
import type { YamlService } from "../ports/yaml-service.ts";

export interface ReadDocumentInput {
  readonly path: string;
}

export class ReadDocumentUseCase {
  constructor(
    private readonly fs: FileSystem,
    private readonly yamlService: YamlService,
  ) {}

  async execute(input: ReadDocumentInput): Promise<YamlValue> {
    const { path } = input;

    let content: string;
    try {
      content = await this.fs.readFile(path);
    } catch (e) {
      throw new YamlError(
        "io_error",
        `Failed to open file: ${reasonOf(e)}`,
        path,
      );
    }

    return this.yamlService.parse(content);
  }
}
