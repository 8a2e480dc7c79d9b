import { type Handler, type IFileSystem, Router } from "@linehttp/engine";
import { createFilesHandler } from "./files-handler.js";

export interface AppOptions {
  /** Opaque directory value handed to the file handler. */
  directory: string;
  fs: IFileSystem;
}

const ECHO_PREFIX = "/echo/";
const FILES_PREFIX = "/files/";

const rootHandler: Handler = async (res) => {
  await res.write();
};

const echoHandler: Handler = async (res, req) => {
  res.setBody(req.path.slice(ECHO_PREFIX.length));
  await res.write();
};

const userAgentHandler: Handler = async (res, req) => {
  res.setBody(req.headers.get("User-Agent") ?? "");
  await res.write();
};

export function createRouter(options: AppOptions): Router {
  return new Router()
    .handle("/", rootHandler)
    .handle(ECHO_PREFIX, echoHandler)
    .handle("/user-agent", userAgentHandler)
    .handle(
      FILES_PREFIX,
      createFilesHandler({
        prefix: FILES_PREFIX,
        directory: options.directory,
        fs: options.fs,
      }),
    );
}
