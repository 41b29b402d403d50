/**
 * Use Case: ModifyDocument
 *
 * Load a YAML file, hand the tree to a mutator, and save what it returns.
 * A mutator that returns nothing or throws aborts the operation and the
 * file is left untouched.
 *
 * Dependencies: ReadDocumentUseCase, WriteDocumentUseCase.
 */

import { reasonOf, YamlError } from "../entities/errors.ts";
import type { YamlValue } from "../entities/value.ts";
import type { StringifyOptions } from "../ports/yaml-service.ts";
import type { ReadDocumentUseCase } from "./read-document.ts";
import type {
  WriteDocumentOutput,
  WriteDocumentUseCase,
} from "./write-document.ts";

export type Mutator = (
  tree: YamlValue,
) => YamlValue | undefined | Promise<YamlValue | undefined>;

export interface ModifyDocumentInput {
  readonly path: string;
  readonly mutator: Mutator;
  readonly options?: StringifyOptions;
}

export class ModifyDocumentUseCase {
  constructor(
    private readonly readDocument: ReadDocumentUseCase,
    private readonly writeDocument: WriteDocumentUseCase,
  ) {}

  async execute(input: ModifyDocumentInput): Promise<WriteDocumentOutput> {
    const { path, mutator, options } = input;

    const tree = await this.readDocument.execute({ path });
    let modified: YamlValue | undefined;
    try {
      modified = await mutator(tree);
    } catch (e) {
      if (e instanceof YamlError) throw e;
      throw new YamlError("mutator_error", reasonOf(e), path);
    }
    if (modified === undefined) {
      throw new YamlError("mutator_error", "Mutator returned nothing", path);
    }

    return await this.writeDocument.execute({
      path,
      value: modified,
      options,
    });
  }
}
