// Node adapters
export { NodeFileSystem } from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type { ReadonlyHeader } from "./http/header.js";
export { canonicalHeaderKey, Header, isToken } from "./http/header.js";
export type {
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  parseContentLength,
  parseHttpRequest,
  parseRequestLine,
  RequestParser,
} from "./http/request-parser.js";
export type {
  ResponseWriter,
  SerializableResponse,
} from "./http/response-writer.js";
export {
  HttpResponseWriter,
  serializeResponse,
} from "./http/response-writer.js";
export type { RouteEntry } from "./http/router.js";
export { Router } from "./http/router.js";
export type { Handler, HttpRequest } from "./http/types.js";
export { STATUS_TEXT, statusText, wantsClose } from "./http/types.js";
// Interfaces
export type { IFileStat, IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// IO
export { BoundedReader, readAll } from "./io/bounded-reader.js";
export {
  LineTooLongError,
  StreamTimeoutError,
  UnexpectedEndOfStreamError,
} from "./io/errors.js";
export type { ByteReader } from "./io/socket-reader.js";
export { SocketReader } from "./io/socket-reader.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  HttpServerEvents,
  HttpServerOptions,
} from "./server/http-server.js";
export { HttpServer, statusForParseError } from "./server/http-server.js";
// Testing
export type { ParsedResponse } from "./testing/http-response.js";
export { parseResponse, splitResponses } from "./testing/http-response.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
export { MockTcpSocket } from "./testing/mock-socket.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
