/**
 * Incremental splitter that cuts a JSON text stream into complete values
 * without parsing them.
 *
 * Top-level values may follow each other separated by whitespace, which
 * covers newline-delimited JSON. When `unwrapArray` is set and the stream
 * opens with '[', the elements of that array are produced one by one instead
 * of the array itself, so a large array can be consumed while it downloads.
 */
export class JsonValueSplitter {
  private readonly unwrapArray: boolean;
  private depth = 0;
  private level = 0;
  private started = false;
  private inString = false;
  private escaped = false;
  private scalar = false;
  private current = '';

  constructor(options: { unwrapArray: boolean }) {
    this.unwrapArray = options.unwrapArray;
  }

  /**
   * Feed the next piece of text and return every value it completed.
   * @throws SyntaxError on structurally invalid input
   */
  push(text: string): string[] {
    const out: string[] = [];
    for (const ch of text) {
      this.consume(ch, out);
    }
    return out;
  }

  /**
   * Signal end of input and return the last pending value, if any.
   * @throws SyntaxError when the input ended inside a value
   */
  end(): string[] {
    const out: string[] = [];
    if (this.scalar) {
      this.emit(out);
    }
    if (this.inString || this.depth > 0) {
      throw new SyntaxError('Unexpected end of JSON input');
    }
    return out;
  }

  private consume(ch: string, out: string[]): void {
    if (!this.started) {
      if (isWhitespace(ch)) return;
      this.started = true;
      if (this.unwrapArray && ch === '[') {
        this.depth = 1;
        this.level = 1;
        return;
      }
    }

    if (this.inString) {
      this.current += ch;
      if (this.escaped) {
        this.escaped = false;
      } else if (ch === '\\') {
        this.escaped = true;
      } else if (ch === '"') {
        this.inString = false;
        if (this.depth === this.level) {
          this.emit(out);
        }
      }
      return;
    }

    if (this.scalar) {
      if (!isDelimiter(ch)) {
        this.current += ch;
        return;
      }
      this.emit(out);
    }

    if (isWhitespace(ch)) return;

    switch (ch) {
      case '{':
      case '[':
        this.depth++;
        this.current += ch;
        return;
      case '}':
      case ']':
        this.close(ch, out);
        return;
      case '"':
        this.inString = true;
        this.current += ch;
        return;
      case ',':
        if (this.depth > this.level) {
          this.current += ch;
        } else if (this.level === 0) {
          throw new SyntaxError("Unexpected ',' between top-level JSON values");
        }
        return;
      default:
        if (this.depth === this.level) {
          this.scalar = true;
        }
        this.current += ch;
    }
  }

  private close(ch: string, out: string[]): void {
    if (this.level === 1 && this.depth === 1) {
      if (ch !== ']') {
        throw new SyntaxError(`Unexpected '${ch}' closing top-level array`);
      }
      // top-level array finished; whatever follows starts a new top-level value
      this.depth = 0;
      this.level = 0;
      this.started = false;
      return;
    }
    if (this.depth <= this.level) {
      throw new SyntaxError(`Unexpected '${ch}'`);
    }
    this.depth--;
    this.current += ch;
    if (this.depth === this.level) {
      this.emit(out);
    }
  }

  private emit(out: string[]): void {
    out.push(this.current);
    this.current = '';
    this.scalar = false;
  }
}

const isWhitespace = (ch: string): boolean => ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t' || ch === '\uFEFF';

const isDelimiter = (ch: string): boolean =>
  isWhitespace(ch) || ch === ',' || ch === ']' || ch === '}' || ch === '[' || ch === '{' || ch === '"';
