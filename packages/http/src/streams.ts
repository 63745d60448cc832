// Pull-based stream helpers over AsyncIterable.
// Every helper is lazy: no work happens until the consumer calls next().

export async function* singleValue<T>(value: T): AsyncGenerator<T> {
  yield value;
}

export async function* fromIterable<T>(values: Iterable<T>): AsyncGenerator<T> {
  for (const value of values) {
    yield value;
  }
}

export interface CompletionCallbacks {
  onComplete: () => void;
  onError: (error: unknown) => void;
}

/**
 * Pass elements through unchanged and report how the source ended.
 * Exactly one callback fires, and only if the source was iterated to an end
 * (completion or failure). Early abandonment by the consumer fires nothing.
 */
export async function* observeCompletion<T>(source: AsyncIterable<T>, callbacks: CompletionCallbacks): AsyncGenerator<T> {
  try {
    for await (const value of source) {
      yield value;
    }
  } catch (error) {
    callbacks.onError(error);
    throw error;
  }
  callbacks.onComplete();
}

/**
 * Wrap an iterable so it can be iterated once. Later iterations complete
 * immediately instead of restarting the source.
 */
export function singlePass<T>(source: AsyncIterable<T>): AsyncIterable<T> {
  let consumed = false;
  return {
    [Symbol.asyncIterator](): AsyncIterator<T> {
      if (consumed) {
        return {
          next: () => Promise.resolve({ done: true, value: undefined }),
        };
      }
      consumed = true;
      return source[Symbol.asyncIterator]();
    },
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

const utf8Encoder = new TextEncoder();

export const utf8 = (text: string): Uint8Array => utf8Encoder.encode(text);
