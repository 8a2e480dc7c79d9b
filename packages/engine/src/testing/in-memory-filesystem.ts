import type { IFileStat, IFileSystem } from "../interfaces/filesystem.js";

function normalizePath(path: string): string {
  const parts: string[] = [];
  for (const part of path.split("/")) {
    if (part === "" || part === ".") continue;
    if (part === "..") {
      parts.pop();
      continue;
    }
    parts.push(part);
  }
  return `/${parts.join("/")}`;
}

function parentOf(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx <= 0 ? "/" : path.slice(0, idx);
}

export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly directories = new Set<string>(["/"]);

  async stat(path: string): Promise<IFileStat> {
    const normalized = normalizePath(path);

    if (this.files.has(normalized)) {
      return { isDirectory: false, isFile: true };
    }
    if (this.directories.has(normalized)) {
      return { isDirectory: true, isFile: false };
    }

    throw new Error(`ENOENT: no such file or directory: ${normalized}`);
  }

  async exists(path: string): Promise<boolean> {
    const normalized = normalizePath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  async readFile(path: string): Promise<Uint8Array> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    const file = this.files.get(normalized);
    if (!file) {
      throw new Error(`ENOENT: no such file or directory: ${normalized}`);
    }
    return file.slice();
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    this.ensureDirectory(parentOf(normalized));
    this.files.set(normalized, data.slice());
  }

  async mkdir(path: string): Promise<void> {
    const normalized = normalizePath(path);
    if (this.files.has(normalized)) {
      throw new Error(`EEXIST: file exists at path: ${normalized}`);
    }
    this.ensureDirectory(normalized);
  }

  private ensureDirectory(dir: string): void {
    if (this.directories.has(dir)) return;
    if (this.files.has(dir)) {
      throw new Error(`ENOTDIR: not a directory: ${dir}`);
    }
    this.ensureDirectory(parentOf(dir));
    this.directories.add(dir);
  }
}
