export interface CliArgs {
  directory: string;
  port: number;
  host: string;
  quiet: boolean;
  maxBodySize?: number;
  idleTimeoutMs?: number;
  requestTimeoutMs?: number;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parseNonNegativeInt(raw: string, flag: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`Invalid value for ${flag}: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    directory: ".",
    port: 4221,
    host: "127.0.0.1",
    quiet: false,
    help: false,
    version: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      parsed.directory = takeValue(args, ++i, arg);
    } else if (arg === "--port" || arg === "-p") {
      const port = parseNonNegativeInt(takeValue(args, ++i, arg), arg);
      if (port > 65535) {
        throw new CliUsageError(`Invalid port number: ${port}`);
      }
      parsed.port = port;
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = takeValue(args, ++i, arg);
    } else if (arg === "--max-body-size") {
      parsed.maxBodySize = parseNonNegativeInt(takeValue(args, ++i, arg), arg);
    } else if (arg === "--idle-timeout") {
      parsed.idleTimeoutMs = parseNonNegativeInt(takeValue(args, ++i, arg), arg);
    } else if (arg === "--request-timeout") {
      parsed.requestTimeoutMs = parseNonNegativeInt(
        takeValue(args, ++i, arg),
        arg,
      );
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

export const HELP_TEXT = `
linehttp - minimal HTTP/1.1 server

Usage: linehttp [options]

Options:
  --directory, -d <dir>      Directory served under /files/ (default: .)
  --port, -p <port>          Port to listen on (default: 4221)
  --host, -H <host>          Host to bind (default: 127.0.0.1)
  --max-body-size <bytes>    Largest accepted request body (default: 1048576)
  --idle-timeout <ms>        Close connections idle this long (default: off)
  --request-timeout <ms>     Max time to receive one request (default: off)
  --quiet, -q                Suppress request logging
  --version, -v              Show version
  --help, -h                 Show this help
`;
