import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { Asn1DecodeError } from "../common/errors.js";

/**
 * Forward-only byte input with a reportable position.
 * This is all the decoder needs from a file, buffer or stream.
 */
export interface ByteSource {
  readonly position: number;
  /** Next byte, or -1 at end of data. */
  readByte(): number;
  /** Up to `count` bytes; fewer only at end of data. */
  read(count: number): Uint8Array;
}

export class BufferByteSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private offset: number;

  public constructor(input: Uint8Array | ArrayBuffer, start = 0) {
    this.bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
    if (start < 0 || start > this.bytes.length) {
      throw new RangeError(
        `Start offset ${start} outside buffer of ${this.bytes.length} bytes`,
      );
    }
    this.offset = start;
  }

  public get position(): number {
    return this.offset;
  }

  public get remaining(): number {
    return this.bytes.length - this.offset;
  }

  public readByte(): number {
    if (this.offset >= this.bytes.length) return -1;
    return this.bytes[this.offset++];
  }

  public read(count: number): Uint8Array {
    const end = Math.min(this.offset + count, this.bytes.length);
    // slice copies, so decoded tags never alias the caller's buffer
    const out = this.bytes.slice(this.offset, end);
    this.offset = end;
    return out;
  }
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Reads a file synchronously through a fixed-size chunk buffer.
 * Call `close()` when done.
 */
export class FileByteSource implements ByteSource {
  private readonly fd: number;
  private readonly chunk: Uint8Array;
  private readonly size: number;
  private chunkStart = 0;
  private chunkLength = 0;
  private offset = 0;
  private closed = false;

  public constructor(path: string, chunkSize = DEFAULT_CHUNK_SIZE) {
    this.fd = openSync(path, "r");
    this.size = fstatSync(this.fd).size;
    this.chunk = new Uint8Array(chunkSize);
  }

  public get position(): number {
    return this.offset;
  }

  public get remaining(): number {
    return Math.max(0, this.size - this.offset);
  }

  public readByte(): number {
    if (!this.ensureAvailable()) return -1;
    const b = this.chunk[this.offset - this.chunkStart];
    this.offset++;
    return b;
  }

  public read(count: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let total = 0;
    while (total < count && this.ensureAvailable()) {
      const from = this.offset - this.chunkStart;
      const take = Math.min(count - total, this.chunkLength - from);
      parts.push(this.chunk.slice(from, from + take));
      total += take;
      this.offset += take;
    }
    const out = new Uint8Array(total);
    let at = 0;
    for (const part of parts) {
      out.set(part, at);
      at += part.length;
    }
    return out;
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }

  // Refills the chunk when the cursor has moved past it; false at end of file.
  private ensureAvailable(): boolean {
    if (this.closed) {
      throw new Error("FileByteSource is closed");
    }
    if (this.offset < this.chunkStart + this.chunkLength) return true;
    this.chunkStart = this.offset;
    this.chunkLength = readSync(this.fd, this.chunk, 0, this.chunk.length, this.offset);
    return this.chunkLength > 0;
  }
}

/**
 * Wraps another source and fails with `BudgetExceeded` once more than
 * `maxBytes` bytes have actually been read through it. Running out of input
 * inside the budget is left to the caller to report as truncation.
 */
export class BudgetedByteSource implements ByteSource {
  private readonly inner: ByteSource;
  private readonly maxBytes: number;
  private readonly origin: number;

  public constructor(inner: ByteSource, maxBytes: number) {
    this.inner = inner;
    this.maxBytes = maxBytes;
    this.origin = inner.position;
  }

  public get position(): number {
    return this.inner.position;
  }

  public get consumed(): number {
    return this.inner.position - this.origin;
  }

  public readByte(): number {
    const b = this.inner.readByte();
    if (b !== -1 && this.consumed > this.maxBytes) throw this.exceeded();
    return b;
  }

  public read(count: number): Uint8Array {
    const allowance = this.maxBytes - this.consumed;
    // one byte past the allowance is enough to tell overrun from end of data
    const bytes = this.inner.read(Math.min(count, allowance + 1));
    if (bytes.length > allowance) throw this.exceeded();
    return bytes;
  }

  private exceeded(): Asn1DecodeError {
    return new Asn1DecodeError(
      "BudgetExceeded",
      `Byte budget of ${this.maxBytes} exceeded`,
      this.origin + this.maxBytes,
    );
  }
}
