import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { Header } from "./header.js";
import type { HttpRequest } from "./types.js";
import { statusText, wantsClose } from "./types.js";

/** What a handler sees of the response it is building. */
export interface ResponseWriter {
  /** Text defaults to the standard reason phrase for the code. */
  setStatus(code: number, text?: string): void;
  /** Replace every value of the header. */
  setHeader(key: string, value: string): void;
  addHeader(key: string, value: string): void;
  setBody(body: Uint8Array | string): void;
  getBody(): Uint8Array;
  /**
   * Finalize and send the message. Only the first call reaches the wire;
   * later calls resolve without writing.
   */
  write(): Promise<void>;
  readonly written: boolean;
}

export interface SerializableResponse {
  status: number;
  statusText: string;
  headers: Header;
  body: Uint8Array;
}

/**
 * Status line, one line per header value, blank line, body. Iteration
 * follows header insertion order.
 */
export function serializeResponse(response: SerializableResponse): Uint8Array {
  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${response.statusText}`,
  ];
  for (const [key, values] of response.headers.entries()) {
    for (const value of values) {
      lines.push(`${key}: ${value}`);
    }
  }
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

export class HttpResponseWriter implements ResponseWriter {
  private status = 200;
  private text = "OK";
  private readonly headers = new Header();
  private body: Uint8Array = new Uint8Array(0);
  private sent = false;

  /**
   * @param request - the request being answered; drives the default
   *   Connection header. `null` for responses synthesized before a request
   *   could be parsed.
   */
  constructor(
    private readonly socket: ITcpSocket,
    private readonly request: HttpRequest | null,
  ) {}

  get written(): boolean {
    return this.sent;
  }

  get statusCode(): number {
    return this.status;
  }

  setStatus(code: number, text?: string): void {
    this.status = code;
    this.text = text ?? statusText(code);
  }

  setHeader(key: string, value: string): void {
    this.headers.set(key, value);
  }

  addHeader(key: string, value: string): void {
    this.headers.add(key, value);
  }

  setBody(body: Uint8Array | string): void {
    this.body = typeof body === "string" ? fromString(body) : body;
  }

  getBody(): Uint8Array {
    return this.body;
  }

  async write(): Promise<void> {
    if (this.sent) {
      return;
    }
    this.sent = true;

    if (!this.headers.has("Content-Type")) {
      this.headers.set("Content-Type", "text/plain");
    }
    if (!this.headers.has("Connection")) {
      const close = this.request === null || wantsClose(this.request);
      this.headers.set("Connection", close ? "close" : "keep-alive");
    }
    this.headers.set("Content-Length", String(this.body.length));

    await this.socket.send(
      serializeResponse({
        status: this.status,
        statusText: this.text,
        headers: this.headers,
        body: this.body,
      }),
    );
  }
}
