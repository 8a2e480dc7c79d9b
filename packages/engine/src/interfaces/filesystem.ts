/**
 * Abstract file system used by file-serving handlers, so they can be
 * exercised against memory as well as the real disk.
 */

export interface IFileStat {
  isDirectory: boolean;
  isFile: boolean;
}

export interface IFileSystem {
  /** Get file statistics. Rejects when the path does not exist. */
  stat(path: string): Promise<IFileStat>;

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>;

  /** Read a whole file. */
  readFile(path: string): Promise<Uint8Array>;

  /** Create or replace a file, creating missing parent directories. */
  writeFile(path: string, data: Uint8Array): Promise<void>;
}
