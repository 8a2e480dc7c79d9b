import * as path from "node:path";
import type { Handler, IFileSystem, ResponseWriter } from "@linehttp/engine";

export interface FilesHandlerOptions {
  /** Route prefix the handler is mounted on, e.g. "/files/". */
  prefix: string;
  /** Directory the file names resolve against. */
  directory: string;
  fs: IFileSystem;
}

/**
 * File name from the part of the path after the prefix: query dropped,
 * percent-decoded. Returns null when the name cannot be decoded.
 */
export function fileNameFromPath(
  requestPath: string,
  prefix: string,
): string | null {
  const rest = requestPath.slice(prefix.length);
  const queryStart = rest.indexOf("?");
  const raw = queryStart === -1 ? rest : rest.slice(0, queryStart);
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

function escapesDirectory(name: string): boolean {
  return name.includes("\0") || name.split("/").includes("..");
}

async function reply(
  res: ResponseWriter,
  status: number,
  body = "",
): Promise<void> {
  res.setStatus(status);
  res.setBody(body);
  await res.write();
}

export function createFilesHandler(options: FilesHandlerOptions): Handler {
  const { prefix, directory, fs } = options;

  return async (res, req) => {
    const name = fileNameFromPath(req.path, prefix);
    if (name === null) {
      return reply(res, 400, "Bad Request");
    }
    if (escapesDirectory(name)) {
      return reply(res, 403, "Forbidden");
    }

    const filePath = path.join(directory, name);

    if (req.method === "GET") {
      if (name === "" || !(await fs.exists(filePath))) {
        return reply(res, 404, "Not Found");
      }
      const stat = await fs.stat(filePath);
      if (!stat.isFile) {
        return reply(res, 404, "Not Found");
      }

      res.setStatus(200);
      res.setHeader("Content-Type", "application/octet-stream");
      res.setBody(await fs.readFile(filePath));
      await res.write();
      return;
    }

    if (req.method === "POST") {
      if (name === "") {
        return reply(res, 400, "Bad Request");
      }
      await fs.writeFile(filePath, req.body ?? new Uint8Array(0));
      return reply(res, 201);
    }

    res.setHeader("Allow", "GET, POST");
    return reply(res, 405, "Method Not Allowed");
  };
}
