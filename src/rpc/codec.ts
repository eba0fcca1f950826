/**
 * Binary primitives over Buffer.
 *
 * Numbers are f64 big-endian, counts u32, strings a u32 byte length followed
 * by UTF-8, optional values a u8 presence flag. JsonValue gets a tagged
 * encoding so report bodies survive the wire unchanged.
 */

import { FrameError } from "../utils/errors.js";
import type { JsonValue } from "../types/broker.js";

const JSON_TAG = {
  null: 0,
  false: 1,
  true: 2,
  number: 3,
  string: 4,
  array: 5,
  object: 6,
} as const;

export class BinaryWriter {
  private chunks: Buffer[] = [];

  u8(value: number): this {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(value, 0);
    this.chunks.push(buf);
    return this;
  }

  u32(value: number): this {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(value, 0);
    this.chunks.push(buf);
    return this;
  }

  f64(value: number): this {
    const buf = Buffer.alloc(8);
    buf.writeDoubleBE(value, 0);
    this.chunks.push(buf);
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  str(value: string): this {
    const bytes = Buffer.from(value, "utf-8");
    this.u32(bytes.length);
    this.chunks.push(bytes);
    return this;
  }

  /** Presence flag, then the value when present */
  option<T>(value: T | null | undefined, write: (w: this, v: T) => void): this {
    if (value === null || value === undefined) {
      return this.u8(0);
    }
    this.u8(1);
    write(this, value);
    return this;
  }

  array<T>(values: readonly T[], write: (w: this, v: T) => void): this {
    this.u32(values.length);
    for (const value of values) write(this, value);
    return this;
  }

  json(value: JsonValue): this {
    if (value === null) return this.u8(JSON_TAG.null);
    if (typeof value === "boolean") return this.u8(value ? JSON_TAG.true : JSON_TAG.false);
    if (typeof value === "number") return this.u8(JSON_TAG.number).f64(value);
    if (typeof value === "string") return this.u8(JSON_TAG.string).str(value);
    if (Array.isArray(value)) {
      this.u8(JSON_TAG.array);
      return this.array(value, (w, v) => w.json(v));
    }
    const entries = Object.entries(value);
    this.u8(JSON_TAG.object).u32(entries.length);
    for (const [key, v] of entries) {
      this.str(key).json(v);
    }
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export class BinaryReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private take(bytes: number): number {
    if (this.offset + bytes > this.buf.length) {
      throw new FrameError(`truncated payload: need ${bytes} bytes at offset ${this.offset}`);
    }
    const at = this.offset;
    this.offset += bytes;
    return at;
  }

  u8(): number {
    return this.buf.readUInt8(this.take(1));
  }

  u32(): number {
    return this.buf.readUInt32BE(this.take(4));
  }

  f64(): number {
    return this.buf.readDoubleBE(this.take(8));
  }

  bool(): boolean {
    const flag = this.u8();
    if (flag > 1) throw new FrameError(`invalid boolean byte ${flag}`);
    return flag === 1;
  }

  str(): string {
    const length = this.u32();
    const at = this.take(length);
    return this.buf.toString("utf-8", at, at + length);
  }

  option<T>(read: (r: this) => T): T | undefined {
    return this.bool() ? read(this) : undefined;
  }

  /** Same as option, but absent decodes to null */
  nullable<T>(read: (r: this) => T): T | null {
    return this.bool() ? read(this) : null;
  }

  array<T>(read: (r: this) => T): T[] {
    const count = this.u32();
    // Every element takes at least one byte
    if (count > this.remaining) {
      throw new FrameError(`array length ${count} exceeds remaining payload`);
    }
    const out: T[] = [];
    for (let i = 0; i < count; i++) out.push(read(this));
    return out;
  }

  json(): JsonValue {
    const tag = this.u8();
    switch (tag) {
      case JSON_TAG.null:
        return null;
      case JSON_TAG.false:
        return false;
      case JSON_TAG.true:
        return true;
      case JSON_TAG.number:
        return this.f64();
      case JSON_TAG.string:
        return this.str();
      case JSON_TAG.array:
        return this.array((r) => r.json());
      case JSON_TAG.object: {
        const count = this.u32();
        const entries: [string, JsonValue][] = [];
        for (let i = 0; i < count; i++) {
          const key = this.str();
          entries.push([key, this.json()]);
        }
        // fromEntries defines own properties, so "__proto__" stays a plain key
        return Object.fromEntries(entries);
      }
      default:
        throw new FrameError(`unknown json tag ${tag}`);
    }
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  /** Fail on trailing garbage */
  end(): void {
    if (this.remaining !== 0) {
      throw new FrameError(`${this.remaining} trailing bytes after payload`);
    }
  }
}
