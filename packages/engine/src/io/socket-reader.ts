import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";
import {
  LineTooLongError,
  StreamTimeoutError,
  UnexpectedEndOfStreamError,
} from "./errors.js";

const CR = 13;
const LF = 10;

/** Pull-style byte source. `null` means the stream has ended. */
export interface ByteReader {
  read(maxBytes: number): Promise<Uint8Array | null>;
}

/**
 * Buffered reader over a push-style socket. Data events accumulate in an
 * internal buffer; readers wait until enough bytes, a close or an error arrive.
 */
export class SocketReader implements ByteReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private deadline: number | null = null;
  private taken = 0;

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer =
        this.buffer.length === 0 ? data : concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    // Peer finished sending; anything still buffered can be read.
    socket.onEnd(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** Total bytes handed out since the reader was created. */
  get consumed(): number {
    return this.taken;
  }

  /** Bytes received and not consumed yet. */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Absolute time (ms since epoch) after which waiting for more data fails
   * with StreamTimeoutError. `null` waits forever.
   */
  setDeadline(deadline: number | null): void {
    this.deadline = deadline;
  }

  /**
   * Wait until at least one byte is buffered. Resolves false when the stream
   * ended first.
   */
  async fill(): Promise<boolean> {
    while (this.buffer.length === 0) {
      if (this.socketError) {
        throw this.socketError;
      }
      if (this.closed) {
        return false;
      }
      await this.waitForActivity();
    }
    return true;
  }

  async read(maxBytes: number): Promise<Uint8Array | null> {
    if (maxBytes <= 0) {
      return new Uint8Array(0);
    }
    if (!(await this.fill())) {
      return null;
    }
    return this.take(Math.min(maxBytes, this.buffer.length));
  }

  /**
   * Read one line terminated by LF, with a preceding CR removed. The line,
   * terminator included, may take at most `limit` bytes. Resolves `null`
   * when the stream ends before the first byte of the line.
   */
  async readLine(limit: number): Promise<Uint8Array | null> {
    while (true) {
      const lf = this.buffer.indexOf(LF);
      if (lf !== -1) {
        if (lf + 1 > limit) {
          throw new LineTooLongError(limit);
        }
        const raw = this.take(lf + 1);
        const end = lf > 0 && raw[lf - 1] === CR ? lf - 1 : lf;
        return raw.subarray(0, end);
      }

      if (this.buffer.length >= limit) {
        throw new LineTooLongError(limit);
      }
      if (this.socketError) {
        throw this.socketError;
      }
      if (this.closed) {
        if (this.buffer.length === 0) {
          return null;
        }
        throw new UnexpectedEndOfStreamError(
          "Stream ended in the middle of a line",
        );
      }

      await this.waitForActivity();
    }
  }

  private take(count: number): Uint8Array {
    const chunk = this.buffer.slice(0, count);
    this.buffer = this.buffer.subarray(count);
    this.taken += count;
    return chunk;
  }

  private waitForActivity(): Promise<void> {
    const deadline = this.deadline;
    if (deadline === null) {
      return new Promise((resolve) => {
        this.waiters.push(resolve);
      });
    }

    const timeoutMs = deadline - Date.now();
    if (timeoutMs <= 0) {
      return Promise.reject(new StreamTimeoutError());
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        reject(new StreamTimeoutError());
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
