import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Router } from "../http/router.js";
import type { Logger } from "../logging/logger.js";
import { HttpServer } from "../server/http-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  router: Router;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): HttpServer {
  return new HttpServer({
    socketFactory: new NodeSocketFactory(),
    router: options.router,
    config: options.config,
    logger: options.logger,
  });
}
