import type { ValueType } from './codec/value-type.js';
import { isSuccessStatus } from './core/http-utils.js';
import type { HttpHeaders } from './http-headers.js';
import { collect, concatBytes, singlePass } from './streams.js';
import { HttpEngineError } from './types.js';

/**
 * Response metadata paired with the lazily decoded body.
 *
 * The body is single-pass: once consumed (by iteration, collect or flatten)
 * further iteration yields nothing. No projection sends the request again.
 */
export class ResponseEnvelope<T> implements AsyncIterable<T> {
  readonly body: AsyncIterable<T>;

  constructor(
    readonly status: number,
    readonly headers: HttpHeaders,
    body: AsyncIterable<T>,
    private readonly type: ValueType<T>,
    private readonly onCancel: () => void,
    readonly statusText?: string | undefined
  ) {
    this.body = singlePass(body);
  }

  get ok(): boolean {
    return isSuccessStatus(this.status);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.body[Symbol.asyncIterator]();
  }

  /** Every remaining element, in arrival order */
  collect(): Promise<T[]> {
    return collect(this.body);
  }

  /**
   * Materialize the body into one value.
   *
   * Without a reducer: undefined for an empty body, the element itself when
   * there is exactly one, and the concatenation when text or byte chunks were
   * decoded. Several elements of any other type need a reducer.
   */
  async flatten(reducer?: (accumulated: T, next: T) => T): Promise<T | undefined> {
    const items = await this.collect();
    const [first, ...rest] = items;
    if (first === undefined) {
      return undefined;
    }
    if (reducer) {
      return rest.reduce(reducer, first);
    }
    if (rest.length === 0) {
      return first;
    }

    const joined = this.join(items);
    if (joined === undefined) {
      throw new HttpEngineError(`Cannot flatten ${items.length} elements of type '${this.type.name}' without a reducer`);
    }
    const validated = this.type.validate(joined);
    if (validated.isErr()) {
      throw validated.error;
    }
    return validated.value;
  }

  /**
   * Release the connection behind an unread body. Safe to call more than once.
   */
  cancel(): void {
    this.onCancel();
  }

  private join(items: readonly T[]): string | Uint8Array | undefined {
    const strings: string[] = [];
    const chunks: Uint8Array[] = [];
    for (const item of items) {
      if (typeof item === 'string') {
        strings.push(item);
      } else if (item instanceof Uint8Array) {
        chunks.push(item);
      }
    }
    if (this.type.kind === 'text' && strings.length === items.length) {
      return strings.join('');
    }
    if (this.type.kind === 'bytes' && chunks.length === items.length) {
      return concatBytes(chunks);
    }
    return undefined;
  }
}
