// src/input/json.ts
import { FloatValue } from '../schema/classify.js';

/**
 * JSON decoder that keeps document order.
 *
 * Objects decode to `Map<string, unknown>` so integer-like keys such as
 * `"2024"` stay where they were written (plain objects list them first).
 * Integral numbers written with a fraction or exponent (`10.0`, `1e3`)
 * decode to `FloatValue`; every other number is a plain `number`.
 * Errors are thrown as `SyntaxError`, like `JSON.parse`.
 */

type Frame =
  | { kind: 'array'; value: unknown[] }
  | { kind: 'object'; value: Map<string, unknown>; key: string };

const NUMBER_RE = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y;
const HEX4_RE = /^[0-9a-fA-F]{4}$/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

class Decoder {
  private pos = 0;
  private readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  decode(): unknown {
    const stack: Frame[] = [];

    for (;;) {
      this.skipWhitespace();
      let value: unknown;
      const ch = this.input.charAt(this.pos);

      if (ch === '{') {
        this.pos++;
        this.skipWhitespace();
        if (this.input.charAt(this.pos) !== '}') {
          stack.push({ kind: 'object', value: new Map(), key: this.readKey() });
          continue;
        }
        this.pos++;
        value = new Map<string, unknown>();
      } else if (ch === '[') {
        this.pos++;
        this.skipWhitespace();
        if (this.input.charAt(this.pos) !== ']') {
          stack.push({ kind: 'array', value: [] });
          continue;
        }
        this.pos++;
        value = [];
      } else {
        value = this.readScalar();
      }

      // Attach the value, closing every container that ends after it
      for (;;) {
        const frame = stack[stack.length - 1];
        if (frame === undefined) {
          this.skipWhitespace();
          if (this.pos < this.input.length) throw this.unexpected();
          return value;
        }

        if (frame.kind === 'array') frame.value.push(value);
        else frame.value.set(frame.key, value);

        this.skipWhitespace();
        const next = this.input.charAt(this.pos);
        if (next === ',') {
          this.pos++;
          if (frame.kind === 'object') frame.key = this.readKey();
          break;
        }
        if (next !== (frame.kind === 'array' ? ']' : '}')) throw this.unexpected();
        this.pos++;
        stack.pop();
        value = frame.value;
      }
    }
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length) {
      const ch = this.input.charAt(this.pos);
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') break;
      this.pos++;
    }
  }

  private readKey(): string {
    this.skipWhitespace();
    if (this.input.charAt(this.pos) !== '"') throw this.unexpected();
    const key = this.readString();
    this.skipWhitespace();
    if (this.input.charAt(this.pos) !== ':') throw this.unexpected();
    this.pos++;
    return key;
  }

  private readScalar(): unknown {
    const ch = this.input.charAt(this.pos);
    if (ch === '"') return this.readString();
    if (ch === 't') return this.readLiteral('true', true);
    if (ch === 'f') return this.readLiteral('false', false);
    if (ch === 'n') return this.readLiteral('null', null);
    if (ch === '-' || (ch >= '0' && ch <= '9')) return this.readNumber();
    throw this.unexpected();
  }

  private readLiteral(word: string, value: boolean | null): boolean | null {
    if (!this.input.startsWith(word, this.pos)) throw this.unexpected();
    this.pos += word.length;
    return value;
  }

  private readNumber(): number | FloatValue {
    NUMBER_RE.lastIndex = this.pos;
    const match = NUMBER_RE.exec(this.input);
    if (!match) throw this.unexpected();
    this.pos += match[0].length;
    const value = Number(match[0]);
    const written = match[1] !== undefined || match[2] !== undefined;
    return written && Number.isInteger(value) ? new FloatValue(value) : value;
  }

  private readString(): string {
    this.pos++; // opening quote
    let out = '';
    let start = this.pos;

    for (;;) {
      if (this.pos >= this.input.length) throw new SyntaxError('Unterminated string in JSON');
      const code = this.input.charCodeAt(this.pos);

      if (code === 0x22) {
        out += this.input.slice(start, this.pos);
        this.pos++;
        return out;
      }
      if (code === 0x5c) {
        out += this.input.slice(start, this.pos) + this.readEscape();
        start = this.pos;
        continue;
      }
      if (code < 0x20) {
        throw new SyntaxError(`Bad control character in string literal at position ${this.pos}`);
      }
      this.pos++;
    }
  }

  private readEscape(): string {
    const at = this.pos;
    const ch = this.input.charAt(at + 1);
    const simple = ESCAPES[ch];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }
    if (ch === 'u') {
      const hex = this.input.slice(at + 2, at + 6);
      if (!HEX4_RE.test(hex)) throw new SyntaxError(`Bad Unicode escape at position ${at}`);
      this.pos += 6;
      return String.fromCharCode(parseInt(hex, 16));
    }
    throw new SyntaxError(`Bad escaped character at position ${at}`);
  }

  private unexpected(): SyntaxError {
    if (this.pos >= this.input.length) return new SyntaxError('Unexpected end of JSON input');
    return new SyntaxError(
      `Unexpected token '${this.input.charAt(this.pos)}' at position ${this.pos}`,
    );
  }
}

/** Decode JSON text, keeping object keys in document order. */
export function decodeJson(text: string): unknown {
  return new Decoder(text).decode();
}
