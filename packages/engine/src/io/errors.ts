export class StreamTimeoutError extends Error {
  constructor(message = "Timed out waiting for data") {
    super(message);
    this.name = "StreamTimeoutError";
  }
}

export class LineTooLongError extends Error {
  constructor(readonly limit: number) {
    super(`Line exceeds ${limit} bytes`);
    this.name = "LineTooLongError";
  }
}

/** The stream ended in the middle of a unit the caller asked for. */
export class UnexpectedEndOfStreamError extends Error {
  constructor(message = "Unexpected end of stream") {
    super(message);
    this.name = "UnexpectedEndOfStreamError";
  }
}
