/**
 * Abstract socket interfaces. The engine only ever talks to these, so the
 * same connection loop runs over Node's net module or an in-memory pair.
 */

export interface ITcpSocket {
  /**
   * Write data to the peer. Resolves once the transport accepted the bytes
   * and rejects if the socket is closed or the write fails.
   */
  send(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /**
   * Register a callback for the peer ending its sending side. The socket
   * stays writable until it is closed.
   */
  onEnd(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. Safe to call more than once. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  onConnection(cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the server. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
