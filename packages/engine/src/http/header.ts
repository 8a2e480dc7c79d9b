const TOKEN_PUNCTUATION = "!#$%&'*+-.^_`|~";

function isTokenChar(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) || // 0-9
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x61 && code <= 0x7a) || // a-z
    TOKEN_PUNCTUATION.includes(String.fromCharCode(code))
  );
}

/** RFC 9110 token: one or more tchar. Methods and field names are tokens. */
export function isToken(value: string): boolean {
  if (value.length === 0) return false;
  for (let i = 0; i < value.length; i++) {
    if (!isTokenChar(value.charCodeAt(i))) return false;
  }
  return true;
}

/**
 * Canonical form of a field name: first letter and every letter after a
 * hyphen upper-cased, the rest lower-cased. Names that are not tokens are
 * returned unchanged.
 */
export function canonicalHeaderKey(name: string): string {
  if (!isToken(name)) return name;

  let out = "";
  let upper = true;
  for (const ch of name) {
    out += upper ? ch.toUpperCase() : ch.toLowerCase();
    upper = ch === "-";
  }
  return out;
}

export interface ReadonlyHeader {
  /** First value for the field, if any. */
  get(key: string): string | undefined;
  values(key: string): readonly string[];
  has(key: string): boolean;
  entries(): IterableIterator<[string, readonly string[]]>;
  readonly size: number;
}

/**
 * Multi-value header map. Keys are canonicalized on every access, so lookups
 * are case-insensitive while each field keeps the order its values arrived in.
 */
export class Header implements ReadonlyHeader {
  private fields: Map<string, string[]> = new Map();

  constructor(init?: Iterable<[string, string]>) {
    if (init) {
      for (const [key, value] of init) {
        this.add(key, value);
      }
    }
  }

  get(key: string): string | undefined {
    return this.fields.get(canonicalHeaderKey(key))?.[0];
  }

  values(key: string): readonly string[] {
    return this.fields.get(canonicalHeaderKey(key)) ?? [];
  }

  has(key: string): boolean {
    return this.fields.has(canonicalHeaderKey(key));
  }

  /** Replace every value of the field with `value`. */
  set(key: string, value: string): void {
    this.fields.set(canonicalHeaderKey(key), [value]);
  }

  add(key: string, value: string): void {
    const canonical = canonicalHeaderKey(key);
    const existing = this.fields.get(canonical);
    if (existing) {
      existing.push(value);
    } else {
      this.fields.set(canonical, [value]);
    }
  }

  delete(key: string): boolean {
    return this.fields.delete(canonicalHeaderKey(key));
  }

  entries(): IterableIterator<[string, readonly string[]]> {
    return this.fields.entries();
  }

  get size(): number {
    return this.fields.size;
  }
}
