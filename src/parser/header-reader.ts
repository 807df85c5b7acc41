import { Asn1DecodeError } from "../common/errors.js";
import {
  INDEFINITE_LENGTH,
  INDEFINITE_LENGTH_BYTE,
  TagClass,
} from "../common/types.js";
import type { TagInfo, TagLength } from "../common/types.js";
import type { ByteSource } from "./byte-source.js";

const MAX_LENGTH_BYTES = 8;

export interface IdentifierResult {
  tag: TagInfo;
  byteCount: number;
}

export interface LengthResult {
  length: TagLength;
  byteCount: number;
}

export class TagHeaderReader {
  /**
   * Read the identifier octets of a tag.
   * @param source - Source positioned at the first identifier byte.
   * @returns The tag class, constructed flag and tag number, plus the number of bytes read.
   */
  public static readIdentifier(source: ByteSource): IdentifierResult {
    const firstByte = source.readByte();
    if (firstByte < 0) {
      throw new Asn1DecodeError(
        "TruncatedInput",
        "Unexpected end of data while reading identifier",
        source.position,
      );
    }

    //  8  7 | 6 | 5  4  3  2  1
    // Class |P/C|   Tag number
    const tagClass = this.getTagClass((firstByte & 0xc0) >> 6);
    const constructed = !!(firstByte & 0x20);
    let tagNumber = firstByte & 0x1f;
    let byteCount = 1;

    if (tagNumber === 0x1f) {
      tagNumber = 0;
      let b: number;
      do {
        b = source.readByte();
        if (b < 0) {
          throw new Asn1DecodeError(
            "TruncatedInput",
            "Unexpected end of data while reading multi-byte identifier",
            source.position,
          );
        }
        byteCount++;
        // multiply rather than shift: tag numbers may pass 32 bits
        tagNumber = tagNumber * 128 + (b & 0x7f);
        if (tagNumber === 0) {
          throw new Asn1DecodeError(
            "InvalidIdentifier",
            "Multi-byte identifier accumulated to 0",
            source.position,
          );
        }
        if (tagNumber > Number.MAX_SAFE_INTEGER) {
          throw new Asn1DecodeError(
            "InvalidIdentifier",
            "Multi-byte identifier exceeds Number.MAX_SAFE_INTEGER",
            source.position,
          );
        }
      } while (b & 0x80);
    }

    return { tag: { tagClass, constructed, tagNumber }, byteCount };
  }

  /**
   * Read the length octets that follow the identifier.
   * @param source - Source positioned right after the identifier.
   * @returns The definite length or `INDEFINITE_LENGTH`, plus the number of bytes read.
   */
  public static readLength(source: ByteSource): LengthResult {
    const first = source.readByte();
    if (first < 0) {
      throw new Asn1DecodeError(
        "TruncatedInput",
        "Unexpected end of data while reading length",
        source.position,
      );
    }

    if (!(first & 0x80)) {
      return { length: first, byteCount: 1 };
    }
    if (first === INDEFINITE_LENGTH_BYTE) {
      return { length: INDEFINITE_LENGTH, byteCount: 1 };
    }

    const numBytes = first & 0x7f;
    if (numBytes > MAX_LENGTH_BYTES) {
      throw new Asn1DecodeError(
        "UnsupportedLength",
        `Length field of ${numBytes} bytes exceeds ${MAX_LENGTH_BYTES}`,
        source.position,
      );
    }

    const lengthBytes = source.read(numBytes);
    if (lengthBytes.length !== numBytes) {
      throw new Asn1DecodeError(
        "TruncatedInput",
        `Expected ${numBytes} length bytes; got ${lengthBytes.length}`,
        source.position,
      );
    }

    let length = 0n;
    for (const b of lengthBytes) length = (length << 8n) | BigInt(b);
    if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Asn1DecodeError(
        "UnsupportedLength",
        `Length ${length} exceeds Number.MAX_SAFE_INTEGER`,
        source.position,
      );
    }
    return { length: Number(length), byteCount: 1 + numBytes };
  }

  /**
   * Convert tag class bits into a TagClass value.
   * @param bits - The two high bits of the identifier byte.
   */
  protected static getTagClass(bits: number): TagClass {
    switch (bits) {
      case 0:
        return TagClass.Universal;
      case 1:
        return TagClass.Application;
      case 2:
        return TagClass.ContextSpecific;
      case 3:
        return TagClass.Private;
    }
    throw new Error(`Invalid tag class bits: ${bits}`);
  }
}
