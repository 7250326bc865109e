import { promises as fs } from "fs";
import * as path from "path";
import { StorageRepository } from "./StorageRepository.js";

/**
 * FsRepository: StorageRepository implementation for the local file system.
 */
export class FsRepository implements StorageRepository {
  baseDir: string;

  constructor(baseDir: string = ".") {
    this.baseDir = baseDir;
  }

  /**
   * Checks whether a file or directory exists.
   *
   * @param filePath - Relative path from baseDir.
   * @returns `true` if the file exists, otherwise `false`.
   */
  async exists(filePath: string): Promise<boolean> {
    const abs = path.resolve(this.baseDir, filePath);

    try {
      await fs.access(abs);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Reads the content of a file as UTF-8 text.
   *
   * @param filePath - Relative path to the file.
   * @returns File content as a string.
   */
  async readFile(filePath: string): Promise<string> {
    const abs = path.resolve(this.baseDir, filePath);
    return await fs.readFile(abs, "utf-8");
  }

  /**
   * Writes data to a file (string or binary). Creates parent directories if needed.
   *
   * @param filePath - Relative file path.
   * @param content - File content as string or Uint8Array.
   */
  async writeFile(
    filePath: string,
    content: string | Uint8Array
  ): Promise<void> {
    const abs = path.resolve(this.baseDir, filePath);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }

  /**
   * Lists all files under a given path.
   *
   * If the path points to a file, it returns an array with a single entry.
   * Otherwise, recursively walks the directory and returns all file paths
   * in sorted order.
   *
   * @param pathString - File or directory path.
   * @returns List of file paths relative to baseDir.
   */
  async listFiles(pathString: string): Promise<string[]> {
    const abs = path.resolve(this.baseDir, pathString);

    if ((await fs.stat(abs)).isFile()) {
      return [path.relative(this.baseDir, abs)];
    }

    const result: string[] = [];
    for await (const file of this.walk(abs)) {
      result.push(file);
    }

    return result.sort();
  }

  /**
   * Recursively walks through a directory and yields all file paths.
   *
   * @param pathString - Absolute path to start from.
   * @yields Relative file paths from baseDir.
   */
  async *walk(pathString: string): AsyncGenerator<string, void, unknown> {
    const dirHandle = await fs.opendir(pathString);

    for await (const entry of dirHandle) {
      const full = path.join(pathString, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(full);
      } else {
        yield path.relative(this.baseDir, full);
      }
    }
  }
}
