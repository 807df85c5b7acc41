/**
 * Payload codecs for rendering primitive ASN.1 values
 */
import { Asn1FormatError } from "./errors.js";

export function toHex(input: ArrayBuffer | Uint8Array): string {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Asn1FormatError(`Invalid hex string: '${hex}'`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function toArrayBuffer(u8: Uint8Array): ArrayBuffer {
  const buf = new ArrayBuffer(u8.byteLength);
  new Uint8Array(buf).set(u8);
  return buf;
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (e) {
    throw new Asn1FormatError(`Invalid UTF-8 payload: ${String(e)}`);
  }
}

export function decodeAscii(bytes: Uint8Array): string {
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] > 0x7f) {
      throw new Asn1FormatError(
        `Non-ASCII byte 0x${bytes[i].toString(16)} at index ${i}`,
      );
    }
  }
  return Array.from(bytes, (b) => String.fromCharCode(b)).join("");
}

// BMPString is UCS-2, big endian.
export function decodeBmpString(bytes: Uint8Array): string {
  if (bytes.length % 2 !== 0) {
    throw new Asn1FormatError(`BMPString has odd length ${bytes.length}`);
  }
  let out = "";
  for (let i = 0; i < bytes.length; i += 2) {
    out += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
  }
  return out;
}

// UniversalString is UCS-4, big endian.
export function decodeUniversalString(bytes: Uint8Array): string {
  if (bytes.length % 4 !== 0) {
    throw new Asn1FormatError(
      `UniversalString length ${bytes.length} is not a multiple of 4`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let out = "";
  for (let i = 0; i < bytes.length; i += 4) {
    const cp = view.getUint32(i);
    if (cp > 0x10ffff) {
      throw new Asn1FormatError(`Invalid code point 0x${cp.toString(16)}`);
    }
    out += String.fromCodePoint(cp);
  }
  return out;
}

export function decodeBoolean(bytes: Uint8Array): boolean {
  if (bytes.length !== 1) {
    throw new Asn1FormatError(
      `BOOLEAN must be exactly 1 byte; got ${bytes.length}`,
    );
  }
  return bytes[0] !== 0x00;
}

/** Two's complement big-endian INTEGER. */
export function decodeInteger(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    throw new Asn1FormatError("Empty INTEGER encoding (0 bytes)");
  }
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  if (bytes[0] & 0x80) n -= 1n << BigInt(bytes.length * 8);
  return n;
}

function decodeSubidentifiers(bytes: Uint8Array): bigint[] {
  const out: bigint[] = [];
  let i = 0;
  while (i < bytes.length) {
    let val = 0n;
    let b: number;
    do {
      if (i >= bytes.length)
        throw new Asn1FormatError(`Truncated OID at byte index ${i}`);
      b = bytes[i++];
      val = (val << 7n) | BigInt(b & 0x7f);
    } while (b & 0x80);
    out.push(val);
  }
  return out;
}

export function decodeOID(bytes: Uint8Array): string {
  if (bytes.length === 0)
    throw new Asn1FormatError("Empty OID encoding (0 bytes)");
  const [head, ...rest] = decodeSubidentifiers(bytes);
  let first: bigint;
  let second: bigint;
  if (head < 80n) {
    first = head / 40n;
    second = head % 40n;
  } else {
    first = 2n;
    second = head - 80n;
  }
  return [first, second, ...rest].join(".");
}

export function decodeRelativeOID(bytes: Uint8Array): string {
  if (bytes.length === 0)
    throw new Asn1FormatError("Empty RELATIVE-OID encoding (0 bytes)");
  return decodeSubidentifiers(bytes).join(".");
}

export function decodeBitString(bytes: Uint8Array): {
  unusedBits: number;
  content: Uint8Array;
} {
  if (bytes.length === 0) {
    throw new Asn1FormatError("Empty BIT STRING encoding (0 bytes)");
  }
  const unusedBits = bytes[0];
  if (unusedBits > 7 || (bytes.length === 1 && unusedBits !== 0)) {
    throw new Asn1FormatError(`Invalid BIT STRING unused bits: ${unusedBits}`);
  }
  return { unusedBits, content: bytes.slice(1) };
}
