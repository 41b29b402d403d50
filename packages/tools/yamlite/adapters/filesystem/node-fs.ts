/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by the Node runtime.
 *
 * Dependencies: node:fs/promises, node:path (dirname).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { FileSystem } from "../../domain/ports/filesystem.ts";

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    return await readFile(path, "utf8");
  }

  async writeFile(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf8");
  }
}
