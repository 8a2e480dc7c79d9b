import type { ReadonlyHeader } from "./header.js";
import type { ResponseWriter } from "./response-writer.js";

export interface HttpRequest {
  readonly method: string;
  /** Raw request-target: not decoded, not normalized, query included. */
  readonly path: string;
  /** Protocol token as sent, e.g. "HTTP/1.1". */
  readonly proto: string;
  readonly headers: ReadonlyHeader;
  /** Present only when Content-Length was positive. */
  readonly body?: Uint8Array;
}

export type Handler = (
  res: ResponseWriter,
  req: HttpRequest,
) => void | Promise<void>;

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  204: "No Content",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  413: "Payload Too Large",
  500: "Internal Server Error",
};

export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? "";
}

/** True when the request asked for the connection to end after the response. */
export function wantsClose(req: HttpRequest): boolean {
  return req.headers.get("Connection")?.toLowerCase() === "close";
}
