import { HttpClientError } from "../errors.js";

// RFC 9110 tchar: ALPHA / DIGIT / "!#$%&'*+-.^_`|~"
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const FORBIDDEN_VALUE_CHARS = /[\r\n\0]/;
// Field values travel one octet per character.
const NON_LATIN1 = /[^\u0000-\u00ff]/;

export interface HeaderEntry {
  name: string;
  value: string;
}

export type HeaderInit =
  | ReadonlyHeaderMap
  | Iterable<readonly [string, string]>
  | Record<string, string | readonly string[]>;

/** Read side of a header map, handed out where mutation is not allowed. */
export interface ReadonlyHeaderMap extends Iterable<[string, string]> {
  readonly size: number;
  get(name: string): string | undefined;
  getAll(name: string): string[];
  has(name: string): boolean;
  names(): string[];
  entries(): IterableIterator<[string, string]>;
  clone(): HeaderMap;
}

export function isValidHeaderName(name: string): boolean {
  return TOKEN.test(name);
}

export function isValidHeaderValue(value: string): boolean {
  return !FORBIDDEN_VALUE_CHARS.test(value) && !NON_LATIN1.test(value);
}

export function assertHeaderName(name: string): void {
  if (!isValidHeaderName(name)) {
    throw new HttpClientError(
      "INVALID_HEADER_NAME",
      `Invalid header name: ${JSON.stringify(name)}`,
    );
  }
}

export function assertHeaderValue(name: string, value: string): void {
  if (FORBIDDEN_VALUE_CHARS.test(value)) {
    throw new HttpClientError(
      "INVALID_HEADER_VALUE",
      `Header ${name} contains CR, LF or NUL`,
    );
  }
  if (NON_LATIN1.test(value)) {
    throw new HttpClientError(
      "INVALID_HEADER_VALUE",
      `Header ${name} contains characters above U+00FF`,
    );
  }
}

function fold(name: string): string {
  return name.toLowerCase();
}

/**
 * Ordered multi-map of header fields. Names compare case-insensitively but
 * keep the case they were added with, which is the case written on the wire.
 */
export class HeaderMap implements ReadonlyHeaderMap {
  private entryList: HeaderEntry[] = [];

  static from(init?: HeaderInit): HeaderMap {
    const map = new HeaderMap();
    if (!init) return map;

    if (isIterable(init)) {
      for (const [name, value] of init) {
        map.append(name, value);
      }
      return map;
    }

    for (const [name, value] of Object.entries(init)) {
      if (typeof value === "string") {
        map.append(name, value);
      } else {
        for (const v of value) {
          map.append(name, v);
        }
      }
    }
    return map;
  }

  get size(): number {
    return this.entryList.length;
  }

  /** Add a value, keeping any existing values for the same name. */
  append(name: string, value: string): this {
    assertHeaderName(name);
    assertHeaderValue(name, value);
    this.entryList.push({ name, value });
    return this;
  }

  /** Replace every value for `name` with a single one. */
  set(name: string, value: string): this {
    assertHeaderName(name);
    assertHeaderValue(name, value);

    const key = fold(name);
    const first = this.entryList.findIndex((e) => fold(e.name) === key);
    if (first === -1) {
      this.entryList.push({ name, value });
      return this;
    }

    this.entryList = this.entryList.filter(
      (e, i) => i <= first || fold(e.name) !== key,
    );
    this.entryList[first] = { name, value };
    return this;
  }

  get(name: string): string | undefined {
    const key = fold(name);
    return this.entryList.find((e) => fold(e.name) === key)?.value;
  }

  getAll(name: string): string[] {
    const key = fold(name);
    return this.entryList
      .filter((e) => fold(e.name) === key)
      .map((e) => e.value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Remove every value for `name`. Returns whether anything was removed. */
  remove(name: string): boolean {
    const key = fold(name);
    const before = this.entryList.length;
    this.entryList = this.entryList.filter((e) => fold(e.name) !== key);
    return this.entryList.length !== before;
  }

  /** Distinct names in first-seen order, in the case first added. */
  names(): string[] {
    const seen = new Map<string, string>();
    for (const { name } of this.entryList) {
      const key = fold(name);
      if (!seen.has(key)) seen.set(key, name);
    }
    return [...seen.values()];
  }

  *entries(): IterableIterator<[string, string]> {
    // Snapshot so an iteration is unaffected by later mutation.
    for (const { name, value } of [...this.entryList]) {
      yield [name, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  clone(): HeaderMap {
    const copy = new HeaderMap();
    copy.entryList = this.entryList.map((e) => ({ ...e }));
    return copy;
  }
}

function isIterable(
  init: HeaderInit,
): init is ReadonlyHeaderMap | Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}
