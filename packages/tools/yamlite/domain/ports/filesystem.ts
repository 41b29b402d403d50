/**
 * Port: FileSystem
 *
 * Abstracts file system operations so the domain does not depend
 * on Node or any concrete runtime.
 *
 * Dependencies: entities only (none needed here).
 */

/** File system abstraction for reading and writing documents */
export interface FileSystem {
  /** Read the entire contents of a file as UTF-8 text */
  readFile(path: string): Promise<string>;

  /** Write UTF-8 text content to a file (creates or truncates) */
  writeFile(path: string, content: string): Promise<void>;
}
