import type { Handler, HttpRequest } from "./types.js";

export interface RouteEntry {
  pattern: string;
  handler: Handler;
}

/**
 * Path multiplexer. Every pattern is an exact route; a pattern longer than
 * "/" that ends in "/" is also a prefix route matching any path that starts
 * with it. "/" alone matches only the root path.
 *
 * Prefix routes are kept longest first, so the most specific prefix wins.
 * Lookup over them is a linear scan, which is fine for small tables but
 * grows with the number of prefix routes.
 */
export class Router {
  private readonly exact: Map<string, RouteEntry> = new Map();
  private readonly prefixes: RouteEntry[] = [];
  private sealed = false;

  handle(pattern: string, handler: Handler): this {
    if (this.sealed) {
      throw new Error(`Cannot register ${pattern}: router is sealed`);
    }
    if (pattern === "") {
      throw new Error("Route pattern must not be empty");
    }
    if (this.exact.has(pattern)) {
      throw new Error(`Route already registered: ${pattern}`);
    }

    const entry: RouteEntry = { pattern, handler };
    this.exact.set(pattern, entry);
    if (pattern.length > 1 && pattern.endsWith("/")) {
      this.insertPrefix(entry);
    }
    return this;
  }

  findHandler(request: Pick<HttpRequest, "path">): RouteEntry | undefined {
    const path = request.path;
    const exact = this.exact.get(path);
    if (exact) {
      return exact;
    }

    for (const entry of this.prefixes) {
      if (path.startsWith(entry.pattern)) {
        return entry;
      }
    }
    return undefined;
  }

  /** Freeze the table. Servers seal the router they are given. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  patterns(): string[] {
    return [...this.exact.keys()];
  }

  /** Prefix patterns in match order. */
  prefixPatterns(): string[] {
    return this.prefixes.map((entry) => entry.pattern);
  }

  // Binary search for the first entry no longer than the new one; inserting
  // there puts it ahead of existing entries of equal length.
  private insertPrefix(entry: RouteEntry): void {
    const length = entry.pattern.length;
    let lo = 0;
    let hi = this.prefixes.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.prefixes[mid].pattern.length <= length) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    this.prefixes.splice(lo, 0, entry);
  }
}
