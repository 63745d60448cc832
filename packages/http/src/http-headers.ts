import { formatMediaType, toMediaType, tryParseMediaType } from './core/media-type.js';
import type { MediaType } from './core/types.js';

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 9110 5.6.2: token = 1*tchar
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new TypeError(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new TypeError(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

export type HttpHeadersInit =
  | HttpHeaders
  | Readonly<Record<string, string | readonly string[]>>
  | Iterable<readonly [string, string]>;

interface HeaderEntry {
  name: string;
  values: string[];
}

/**
 * Case-insensitive header multimap. Names keep the spelling they were first
 * added with; values keep insertion order.
 *
 * A read-only view shares storage with the headers it was taken from and
 * throws on every mutation.
 */
export class HttpHeaders implements Iterable<[string, string]> {
  private store = new Map<string, HeaderEntry>();
  private frozen = false;

  constructor(init?: HttpHeadersInit) {
    if (init !== undefined) {
      this.addAll(init);
    }
  }

  private static view(store: Map<string, HeaderEntry>): HttpHeaders {
    const view = new HttpHeaders();
    view.store = store;
    view.frozen = true;
    return view;
  }

  get isReadOnly(): boolean {
    return this.frozen;
  }

  /** Number of distinct header names */
  get size(): number {
    return this.store.size;
  }

  add(name: string, value: string): this {
    this.assertWritable();
    validateHeaderName(name);
    validateHeaderValue(name, value);

    const key = name.toLowerCase();
    const entry = this.store.get(key);
    if (entry) {
      entry.values.push(value);
    } else {
      this.store.set(key, { name, values: [value] });
    }
    return this;
  }

  set(name: string, value: string | readonly string[]): this {
    this.assertWritable();
    validateHeaderName(name);
    const values = typeof value === 'string' ? [value] : [...value];
    for (const v of values) {
      validateHeaderValue(name, v);
    }

    const key = name.toLowerCase();
    if (values.length === 0) {
      this.store.delete(key);
    } else {
      this.store.set(key, { name: this.store.get(key)?.name ?? name, values });
    }
    return this;
  }

  addAll(init: HttpHeadersInit): this {
    if (init instanceof HttpHeaders) {
      for (const entry of init.store.values()) {
        for (const value of entry.values) {
          this.add(entry.name, value);
        }
      }
    } else if (isIterable(init)) {
      for (const [name, value] of init) {
        this.add(name, value);
      }
    } else {
      for (const [name, value] of Object.entries(init)) {
        for (const v of typeof value === 'string' ? [value] : value) {
          this.add(name, v);
        }
      }
    }
    return this;
  }

  get(name: string): string | undefined {
    return this.store.get(name.toLowerCase())?.values[0];
  }

  getAll(name: string): string[] {
    return [...(this.store.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.store.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    this.assertWritable();
    return this.store.delete(name.toLowerCase());
  }

  names(): string[] {
    return [...this.store.values()].map((entry) => entry.name);
  }

  *entries(): IterableIterator<[string, string]> {
    for (const entry of this.store.values()) {
      for (const value of entry.values) {
        yield [entry.name, value];
      }
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /**
   * One value per name; repeated values are joined with ", " (RFC 9110 5.3).
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const entry of this.store.values()) {
      record[entry.name] = entry.values.join(', ');
    }
    return record;
  }

  /**
   * Parsed Content-Type, or undefined when absent or malformed.
   */
  getContentType(): MediaType | undefined {
    const value = this.get('Content-Type');
    if (value === undefined) {
      return undefined;
    }
    const parsed = tryParseMediaType(value);
    return parsed.isOk() ? parsed.value : undefined;
  }

  setContentType(mediaType: MediaType | string): this {
    return this.set('Content-Type', formatMediaType(toMediaType(mediaType)));
  }

  /**
   * Every media type listed across Accept headers, in order. Malformed entries are skipped.
   */
  getAccept(): MediaType[] {
    const accepted: MediaType[] = [];
    for (const value of this.getAll('Accept')) {
      for (const part of value.split(',')) {
        if (!part.trim()) continue;
        const parsed = tryParseMediaType(part);
        if (parsed.isOk()) {
          accepted.push(parsed.value);
        }
      }
    }
    return accepted;
  }

  setAccept(mediaTypes: readonly (MediaType | string)[]): this {
    if (mediaTypes.length === 0) {
      this.assertWritable();
      this.store.delete('accept');
      return this;
    }
    return this.set('Accept', mediaTypes.map((mt) => formatMediaType(toMediaType(mt))).join(', '));
  }

  getContentLength(): number | undefined {
    const value = this.get('Content-Length');
    if (value === undefined || !/^\d+$/.test(value)) {
      return undefined;
    }
    return Number(value);
  }

  setContentLength(length: number): this {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid content length: ${length}`);
    }
    return this.set('Content-Length', String(length));
  }

  /** Independent, writable copy */
  copy(): HttpHeaders {
    return new HttpHeaders(this);
  }

  /** Read-only view over the same storage */
  readOnly(): HttpHeaders {
    return this.frozen ? this : HttpHeaders.view(this.store);
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new TypeError('Headers are read-only');
    }
  }
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
