import type { ITcpSocket } from "../interfaces/socket.js";
import { BoundedReader, readAll } from "../io/bounded-reader.js";
import {
  LineTooLongError,
  StreamTimeoutError,
  UnexpectedEndOfStreamError,
} from "../io/errors.js";
import { SocketReader } from "../io/socket-reader.js";
import { decodeToString } from "../utils/buffer.js";
import { Header, isToken } from "./header.js";
import type { HttpRequest } from "./types.js";

export const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024; // 1MB

export interface ParseHttpRequestOptions {
  /** Upper bound for the request line plus header block, in bytes. */
  maxHeaderSize?: number;
  maxBodySize?: number;
  /** Max wait for the first byte of a request. 0 disables. */
  idleTimeoutMs?: number;
  /** Max time from the first byte to the end of the body. 0 disables. */
  requestTimeoutMs?: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "INVALID_METHOD"
  | "MALFORMED_HEADER"
  | "DUPLICATE_HOST"
  | "BODY_TOO_LARGE"
  | "INCOMPLETE_BODY";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

function trimWhitespace(value: string): string {
  return value.replace(/^[ \t]+|[ \t]+$/g, "");
}

/** First Content-Length value as a decimal integer; absent or junk is 0. */
export function parseContentLength(value: string | undefined): number {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return 0;
  }
  return Number.parseInt(value, 10);
}

function deadlineAfter(timeoutMs: number): number | null {
  return timeoutMs > 0 ? Date.now() + timeoutMs : null;
}

function translateReadError(err: unknown): unknown {
  if (err instanceof StreamTimeoutError) {
    return new HttpRequestParseError(
      "REQUEST_TIMEOUT",
      "Request timed out before completion",
    );
  }
  if (err instanceof LineTooLongError) {
    return new HttpRequestParseError(
      "HEADERS_TOO_LARGE",
      "Request headers too large",
    );
  }
  if (err instanceof UnexpectedEndOfStreamError) {
    return new HttpRequestParseError(
      "CONNECTION_CLOSED_INCOMPLETE",
      "Connection closed before request was complete",
    );
  }
  return err;
}

/**
 * Reads successive requests off one connection. Each call to readRequest
 * consumes exactly one message, leaving the reader at the start of the next.
 */
export class RequestParser {
  private readonly maxHeaderSize: number;
  private readonly maxBodySize: number;
  private readonly idleTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private headStart = 0;

  constructor(
    private readonly reader: SocketReader,
    options?: ParseHttpRequestOptions,
  ) {
    this.maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    this.maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    this.idleTimeoutMs = options?.idleTimeoutMs ?? 0;
    this.requestTimeoutMs = options?.requestTimeoutMs ?? 0;
  }

  /**
   * Resolves the next request, or `null` when the peer closed the stream
   * cleanly between requests.
   */
  async readRequest(): Promise<HttpRequest | null> {
    try {
      this.reader.setDeadline(deadlineAfter(this.idleTimeoutMs));
      let hasData: boolean;
      try {
        hasData = await this.reader.fill();
      } catch (err) {
        if (err instanceof StreamTimeoutError) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }
        throw err;
      }
      if (!hasData) {
        return null;
      }

      this.reader.setDeadline(deadlineAfter(this.requestTimeoutMs));
      try {
        return await this.readMessage();
      } catch (err) {
        throw translateReadError(err);
      }
    } finally {
      this.reader.setDeadline(null);
    }
  }

  private async readMessage(): Promise<HttpRequest | null> {
    this.headStart = this.reader.consumed;

    const requestLine = await this.readHeadLine();
    if (requestLine === null) {
      return null;
    }
    const { method, path, proto } = parseRequestLine(requestLine);
    const headers = await this.readHeaders();

    if (headers.values("Host").length > 1) {
      throw new HttpRequestParseError(
        "DUPLICATE_HOST",
        "Too many Host headers",
      );
    }

    const contentLength = parseContentLength(headers.get("Content-Length"));
    if (contentLength > this.maxBodySize) {
      throw new HttpRequestParseError(
        "BODY_TOO_LARGE",
        "Request body too large",
      );
    }

    if (contentLength <= 0) {
      return { method, path, proto, headers };
    }

    const body = await readAll(new BoundedReader(this.reader, contentLength));
    if (body.length < contentLength) {
      throw new HttpRequestParseError(
        "INCOMPLETE_BODY",
        `Expected ${contentLength} body bytes, got ${body.length}`,
      );
    }

    return { method, path, proto, headers, body };
  }

  private async readHeaders(): Promise<Header> {
    const fields: Array<[string, string]> = [];

    while (true) {
      const line = await this.readHeadLine();
      if (line === null) {
        throw new UnexpectedEndOfStreamError();
      }
      if (line === "") {
        break;
      }

      if (line.startsWith(" ") || line.startsWith("\t")) {
        // Continuation of the previous field.
        const previous = fields[fields.length - 1];
        if (!previous) {
          throw new HttpRequestParseError(
            "MALFORMED_HEADER",
            `Malformed header initial line: ${line}`,
          );
        }
        const continuation = trimWhitespace(line);
        if (continuation !== "") {
          previous[1] =
            previous[1] === "" ? continuation : `${previous[1]} ${continuation}`;
        }
        continue;
      }

      const colonIdx = line.indexOf(":");
      const key = colonIdx === -1 ? "" : trimWhitespace(line.slice(0, colonIdx));
      if (!isToken(key)) {
        throw new HttpRequestParseError(
          "MALFORMED_HEADER",
          `Malformed header line: ${line}`,
        );
      }
      fields.push([key, trimWhitespace(line.slice(colonIdx + 1))]);
    }

    return new Header(fields);
  }

  // Request line and header lines share one maxHeaderSize budget,
  // terminators included.
  private async readHeadLine(): Promise<string | null> {
    const used = this.reader.consumed - this.headStart;
    const line = await this.reader.readLine(this.maxHeaderSize - used);
    return line === null ? null : decodeToString(line);
  }
}

/**
 * Split "METHOD SP TARGET SP PROTO". The target is everything between the
 * first two spaces and is kept verbatim.
 */
export function parseRequestLine(line: string): {
  method: string;
  path: string;
  proto: string;
} {
  const firstSpace = line.indexOf(" ");
  const secondSpace = firstSpace === -1 ? -1 : line.indexOf(" ", firstSpace + 1);
  const proto = secondSpace === -1 ? "" : line.slice(secondSpace + 1);
  if (proto === "" || proto.includes(" ")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: ${line}`,
    );
  }

  const method = line.slice(0, firstSpace);
  if (!isToken(method)) {
    throw new HttpRequestParseError(
      "INVALID_METHOD",
      `Invalid method in request line: ${line}`,
    );
  }

  return { method, path: line.slice(firstSpace + 1, secondSpace), proto };
}

export function createHttpRequestParser(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): RequestParser {
  return new RequestParser(new SocketReader(socket), options);
}

/**
 * Parse a single HTTP/1.1 request from a TCP socket stream. Resolves `null`
 * if the socket closes before any byte arrives.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest | null> {
  return createHttpRequestParser(socket, options).readRequest();
}
