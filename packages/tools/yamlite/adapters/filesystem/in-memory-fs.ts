/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * All operations work on a Map<string, string>.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private readOnly = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new Error(`ENOENT: no such file or directory, open '${path}'`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    if (this.readOnly.has(path)) {
      return Promise.reject(
        new Error(`EACCES: permission denied, open '${path}'`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup) */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Read a file directly, undefined when absent */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Make writes to `path` fail */
  lock(path: string): void {
    this.readOnly.add(path);
  }

  /** Get the number of stored files */
  get size(): number {
    return this.files.size;
  }
}
