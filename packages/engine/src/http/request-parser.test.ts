import { describe, expect, it } from "vitest";
import { SocketReader } from "../io/socket-reader.js";
import { MockTcpSocket } from "../testing/mock-socket.js";
import { decodeToString } from "../utils/buffer.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
  type ParseHttpRequestOptions,
  parseContentLength,
  parseHttpRequest,
  parseRequestLine,
  RequestParser,
} from "./request-parser.js";

/** Parser over a socket that delivers `raw` and then closes. */
function parserFor(raw: string, options?: ParseHttpRequestOptions) {
  const socket = new MockTcpSocket();
  const parser = createHttpRequestParser(socket, options);
  socket.push(raw);
  socket.end();
  return parser;
}

function parseErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof HttpRequestParseError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe("parseHttpRequest", () => {
  it("parses a simple GET request", async () => {
    const socket = new MockTcpSocket();
    const pending = parseHttpRequest(socket);
    socket.push(
      "GET /index.html HTTP/1.1\r\nHost: localhost\r\nUser-Agent: test\r\n\r\n",
    );

    const req = await pending;
    expect(req?.method).toBe("GET");
    expect(req?.path).toBe("/index.html");
    expect(req?.proto).toBe("HTTP/1.1");
    expect(req?.headers.get("host")).toBe("localhost");
    expect(req?.headers.get("User-Agent")).toBe("test");
    expect(req?.body).toBeUndefined();
  });

  it("keeps the request target verbatim", async () => {
    const req = await parserFor(
      "GET /echo/a%20b?x=1&y=2 HTTP/1.1\r\n\r\n",
    ).readRequest();
    expect(req?.path).toBe("/echo/a%20b?x=1&y=2");
  });

  it("keeps the protocol token as sent", async () => {
    const req = await parserFor("GET / HTTP/1.0\r\n\r\n").readRequest();
    expect(req?.proto).toBe("HTTP/1.0");
  });

  it("accepts bare LF line endings", async () => {
    const req = await parserFor("GET / HTTP/1.1\nHost: a\n\n").readRequest();
    expect(req?.headers.get("Host")).toBe("a");
  });

  it("resolves null when the connection closes before any byte", async () => {
    const socket = new MockTcpSocket();
    const pending = parseHttpRequest(socket);
    socket.end();
    expect(await pending).toBeNull();
  });

  it("propagates transport errors untranslated", async () => {
    const socket = new MockTcpSocket();
    const pending = parseHttpRequest(socket);
    socket.fail(new Error("connection reset"));
    await expect(pending).rejects.toThrow("connection reset");
  });
});

describe("RequestParser headers", () => {
  it("trims whitespace around names and values", async () => {
    const req = await parserFor(
      "GET / HTTP/1.1\r\nX-Pad \t:  spaced value \t\r\n\r\n",
    ).readRequest();
    expect(req?.headers.get("X-Pad")).toBe("spaced value");
  });

  it("collects repeated fields in order", async () => {
    const req = await parserFor(
      "GET / HTTP/1.1\r\nAccept: a\r\nAccept: b\r\n\r\n",
    ).readRequest();
    expect(req?.headers.values("Accept")).toEqual(["a", "b"]);
  });

  it("folds continuation lines into the previous value", async () => {
    const req = await parserFor(
      "GET / HTTP/1.1\r\nX-Long: one\r\n  two\r\n\tthree\r\n\r\n",
    ).readRequest();
    expect(req?.headers.get("X-Long")).toBe("one two three");
  });

  it("rejects a continuation line with no field before it", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\n continued\r\n\r\n").readRequest(),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER" });
  });

  it("rejects a header line without a colon", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\nNoColon\r\n\r\n").readRequest(),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER" });
  });

  it("rejects a field name that is not a token", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\nBad Key: v\r\n\r\n").readRequest(),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER" });
  });

  it("rejects more than one Host header", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\nHost: a\r\nhost: b\r\n\r\n").readRequest(),
    ).rejects.toMatchObject({ code: "DUPLICATE_HOST" });
  });

  it("reports a connection closed before the blank line", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\nHost: a\r\n").readRequest(),
    ).rejects.toMatchObject({ code: "CONNECTION_CLOSED_INCOMPLETE" });
  });

  it("reports a connection closed mid-line", async () => {
    await expect(
      parserFor("GET / HTTP/1.1\r\nHost: a").readRequest(),
    ).rejects.toMatchObject({ code: "CONNECTION_CLOSED_INCOMPLETE" });
  });

  it("enforces maxHeaderSize across the whole head", async () => {
    // 16 bytes of the 32-byte budget go to "GET / HTTP/1.1\r\n".
    const parser = parserFor(
      "GET / HTTP/1.1\r\nX-Padding: aaaaaaaaaaaaaaaaaaaa\r\n\r\n",
      { maxHeaderSize: 32 },
    );
    await expect(parser.readRequest()).rejects.toMatchObject({
      code: "HEADERS_TOO_LARGE",
    });
  });

  it("treats maxHeaderSize as an inclusive byte count", async () => {
    // 16 + 9 + 2 bytes.
    const head = "GET / HTTP/1.1\r\nHost: a\r\n\r\n";

    const req = await parserFor(head, { maxHeaderSize: 27 }).readRequest();
    expect(req?.headers.get("Host")).toBe("a");

    await expect(
      parserFor(head, { maxHeaderSize: 26 }).readRequest(),
    ).rejects.toMatchObject({ code: "HEADERS_TOO_LARGE" });
  });

  it("gives every request on a connection a fresh head budget", async () => {
    const parser = parserFor(
      "GET /a HTTP/1.1\r\n\r\nGET /b HTTP/1.1\r\n\r\n",
      { maxHeaderSize: 19 },
    );
    expect((await parser.readRequest())?.path).toBe("/a");
    expect((await parser.readRequest())?.path).toBe("/b");
  });

  it("parses a request whose sender stopped sending after it", async () => {
    const socket = new MockTcpSocket();
    const parser = createHttpRequestParser(socket);
    socket.push("GET /done HTTP/1.1\r\n\r\n");
    socket.finish();

    expect((await parser.readRequest())?.path).toBe("/done");
    expect(await parser.readRequest()).toBeNull();
  });
});

describe("RequestParser bodies", () => {
  it("reads exactly Content-Length bytes and leaves the next request", async () => {
    const parser = parserFor(
      "POST /files/a HTTP/1.1\r\nContent-Length: 5\r\n\r\nhelloGET /next HTTP/1.1\r\n\r\n",
    );

    const first = await parser.readRequest();
    expect(first?.method).toBe("POST");
    expect(first?.body && decodeToString(first.body)).toBe("hello");

    const second = await parser.readRequest();
    expect(second?.method).toBe("GET");
    expect(second?.path).toBe("/next");

    expect(await parser.readRequest()).toBeNull();
  });

  it("waits for a body split across chunks", async () => {
    const socket = new MockTcpSocket();
    const parser = createHttpRequestParser(socket);
    const pending = parser.readRequest();
    socket.push("POST / HTTP/1.1\r\nContent-Length: 6\r\n\r\nab");
    socket.push("cd");
    socket.push("ef");

    const req = await pending;
    expect(req?.body && decodeToString(req.body)).toBe("abcdef");
  });

  it("rejects an oversized body before reading it", async () => {
    const socket = new MockTcpSocket();
    const reader = new SocketReader(socket);
    const parser = new RequestParser(reader, { maxBodySize: 4 });
    socket.push("POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello");

    await expect(parser.readRequest()).rejects.toMatchObject({
      code: "BODY_TOO_LARGE",
    });
    expect(reader.buffered).toBe(5);
  });

  it("accepts a body of exactly maxBodySize", async () => {
    const req = await parserFor(
      "POST / HTTP/1.1\r\nContent-Length: 4\r\n\r\nabcd",
      { maxBodySize: 4 },
    ).readRequest();
    expect(req?.body?.length).toBe(4);
  });

  it("rejects a body shorter than Content-Length", async () => {
    await expect(
      parserFor(
        "POST / HTTP/1.1\r\nContent-Length: 10\r\n\r\nabc",
      ).readRequest(),
    ).rejects.toMatchObject({ code: "INCOMPLETE_BODY" });
  });

  it("ignores an unparseable Content-Length", async () => {
    const req = await parserFor(
      "POST / HTTP/1.1\r\nContent-Length: ten\r\n\r\n",
    ).readRequest();
    expect(req?.body).toBeUndefined();
  });
});

describe("RequestParser timeouts", () => {
  it("reports an idle connection", async () => {
    const socket = new MockTcpSocket();
    const parser = createHttpRequestParser(socket, { idleTimeoutMs: 20 });
    await expect(parser.readRequest()).rejects.toMatchObject({
      code: "IDLE_TIMEOUT",
    });
  });

  it("reports a request that stalls after it started", async () => {
    const socket = new MockTcpSocket();
    const parser = createHttpRequestParser(socket, { requestTimeoutMs: 20 });
    socket.push("GET / HTTP/1.1\r\n");
    await expect(parser.readRequest()).rejects.toMatchObject({
      code: "REQUEST_TIMEOUT",
    });
  });
});

describe("parseRequestLine", () => {
  it("splits on the first two spaces", () => {
    expect(parseRequestLine("GET /a HTTP/1.1")).toEqual({
      method: "GET",
      path: "/a",
      proto: "HTTP/1.1",
    });
  });

  it("allows an empty target", () => {
    expect(parseRequestLine("GET  HTTP/1.1")).toEqual({
      method: "GET",
      path: "",
      proto: "HTTP/1.1",
    });
  });

  it.each([
    ["GARBAGE"],
    ["GET /"],
    ["GET / "],
    ["GET / HTTP/1.1 extra"],
  ])("rejects %j as malformed", (line) => {
    expect(parseErrorCode(() => parseRequestLine(line))).toBe(
      "MALFORMED_REQUEST_LINE",
    );
  });

  it.each([["G(T / HTTP/1.1"], [" / HTTP/1.1"]])(
    "rejects the method in %j",
    (line) => {
      expect(parseErrorCode(() => parseRequestLine(line))).toBe(
        "INVALID_METHOD",
      );
    },
  );
});

describe("parseContentLength", () => {
  it("reads decimal integers", () => {
    expect(parseContentLength("42")).toBe(42);
    expect(parseContentLength("+7")).toBe(7);
    expect(parseContentLength("-5")).toBe(-5);
  });

  it("treats absent or junk values as zero", () => {
    expect(parseContentLength(undefined)).toBe(0);
    expect(parseContentLength("")).toBe(0);
    expect(parseContentLength("12abc")).toBe(0);
    expect(parseContentLength(" 3")).toBe(0);
  });
});
