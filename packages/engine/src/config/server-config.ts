export interface ServerConfig {
  /** Port to listen on. 0 picks an ephemeral port. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Max bytes for the request line plus headers. Default: 8KB */
  maxHeaderSize: number;
  /** Largest accepted Content-Length; larger requests get 413. Default: 1MB */
  maxBodySize: number;
  /** Max wait for the next request on an open connection. 0 = no limit. */
  idleTimeoutMs: number;
  /** Max time to receive one request once it started. 0 = no limit. */
  requestTimeoutMs: number;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 4221,
    host: "127.0.0.1",
    quiet: false,
    maxHeaderSize: 8 * 1024,
    maxBodySize: 1024 * 1024,
    idleTimeoutMs: 0,
    requestTimeoutMs: 0,
  };
}
