import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import { HttpResponseWriter } from "../http/response-writer.js";
import type { Router } from "../http/router.js";
import type { HttpRequest } from "../http/types.js";
import { statusText, wantsClose } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";

export interface HttpServerOptions {
  socketFactory: ISocketFactory;
  /** Fully populated route table. The server seals it. */
  router: Router;
  config: ServerConfig;
  logger?: Logger;
}

export type HttpServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
  connectionError: [err: unknown, remoteAddress: string | undefined];
};

export class HttpServer extends EventEmitter<HttpServerEvents> {
  private socketFactory: ISocketFactory;
  private router: Router;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: HttpServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.router = options.router.seal();
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.onConnection((rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.warn(
            `Connection from ${socket.remoteAddress ?? "?"} failed:`,
            err,
          );
          this.emit("connectionError", err, socket.remoteAddress);
        });
      });

      server.onError((err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  /**
   * One request at a time: parse, dispatch, repeat until the peer closes,
   * asks to close, or sends something that cannot be answered in-stream.
   * Transport failures reject; the accept loop is unaffected.
   */
  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const parser = createHttpRequestParser(socket, {
      maxHeaderSize: this.config.maxHeaderSize,
      maxBodySize: this.config.maxBodySize,
      idleTimeoutMs: this.config.idleTimeoutMs,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });

    try {
      while (true) {
        let request: HttpRequest | null;
        try {
          request = await parser.readRequest();
        } catch (err) {
          if (!(err instanceof HttpRequestParseError)) {
            throw err;
          }

          const status = statusForParseError(err);
          if (status === null) {
            break;
          }

          this.logger.debug(
            `Rejecting request from ${socket.remoteAddress ?? "?"}: ${err.message}`,
          );
          await this.sendError(socket, status);
          break;
        }

        if (request === null) {
          break;
        }

        const keepOpen = await this.dispatch(socket, request);
        if (!keepOpen || wantsClose(request)) {
          break;
        }
      }
    } finally {
      socket.close();
    }
  }

  /** Resolves false when the connection must close after this exchange. */
  private async dispatch(
    socket: ITcpSocket,
    request: HttpRequest,
  ): Promise<boolean> {
    const res = new HttpResponseWriter(socket, request);
    const route = this.router.findHandler(request);

    if (!route) {
      res.setStatus(404);
      res.setBody(statusText(404));
      await res.write();
      this.logExchange(socket, request, 404);
      return true;
    }

    try {
      await route.handler(res, request);
    } catch (err) {
      if (res.written) {
        throw err;
      }
      this.logger.error(`Handler for ${route.pattern} threw:`, err);
      await this.sendError(socket, 500);
      this.logExchange(socket, request, 500);
      return false;
    }

    if (!res.written) {
      this.logger.warn(
        `Handler for ${route.pattern} returned without writing a response`,
      );
      await res.write();
    }

    this.logExchange(socket, request, res.statusCode);
    return true;
  }

  private async sendError(socket: ITcpSocket, status: number): Promise<void> {
    const res = new HttpResponseWriter(socket, null);
    res.setStatus(status);
    res.setHeader("Connection", "close");
    res.setBody(statusText(status));
    await res.write();
  }

  private logExchange(
    socket: ITcpSocket,
    request: HttpRequest,
    status: number,
  ): void {
    if (this.config.quiet) return;
    this.logger.info(
      `${request.method} ${request.path} ${status} - ${socket.remoteAddress ?? "?"}`,
    );
  }
}

/** Status to answer a parse failure with, or null to just close. */
export function statusForParseError(
  err: HttpRequestParseError,
): 400 | 408 | 413 | null {
  switch (err.code) {
    case "IDLE_TIMEOUT":
      return null;
    case "REQUEST_TIMEOUT":
      return 408;
    case "BODY_TOO_LARGE":
      return 413;
    default:
      return 400;
  }
}
