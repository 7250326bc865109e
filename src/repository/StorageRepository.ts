/**
 * StorageRepository: Abstract interface for reading and writing files.
 *
 * Every file the library touches (schemas, candidates, the catalog and
 * plugin checkouts) goes through this contract.
 */
export interface StorageRepository {
  /**
   * Lists files under a directory, or the file itself when the path is a file.
   *
   * @param path - File or directory path.
   * @returns Matched file paths, relative to the repository base.
   */
  listFiles(path: string): Promise<string[]>;

  /**
   * Reads the content of a file.
   *
   * @param path - The file path to read.
   * @returns File content as a UTF-8 string.
   */
  readFile(path: string): Promise<string>;

  /**
   * Writes data to a file.
   *
   * @param path - Destination file path.
   * @param data - File contents as a string or binary buffer.
   */
  writeFile(path: string, data: Uint8Array | string): Promise<void>;

  /**
   * Checks if a file exists.
   *
   * @param path - The file path to check.
   * @returns `true` if the file exists, otherwise `false`.
   */
  exists(path: string): Promise<boolean>;
}
