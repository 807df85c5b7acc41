import { INDEFINITE_LENGTH_BYTE, TagClass, isIndefinite } from "../common/types.js";
import type { Asn1Tag } from "../common/types.js";

/**
 * Serialises a decoded tag tree back to X.690 bytes.
 *
 * Definite lengths are re-emitted in minimal form. Indefinite-length tags keep
 * the 0x80 marker and rely on the EOC child the decoder appended. Primitive
 * tags always write `data`; a BIT STRING's speculative sub-tree is ignored.
 */
export class TagEncoder {
  /**
   * Encode a tag with its header.
   * @returns The full TLV encoding.
   */
  public static encode(tag: Asn1Tag): Uint8Array {
    const content = this.encodeContent(tag);
    const tagBytes = this.encodeIdentifier(tag);

    let lengthBytes: number[];
    if (isIndefinite(tag.length)) {
      if (!tag.constructed) {
        throw new Error(
          `Primitive tag [${tag.identifier}] cannot use indefinite length`,
        );
      }
      lengthBytes = [INDEFINITE_LENGTH_BYTE];
    } else {
      lengthBytes = this.encodeLength(content.length);
    }

    const result = new Uint8Array(
      tagBytes.length + lengthBytes.length + content.length,
    );
    let offset = 0;
    result.set(tagBytes, offset);
    offset += tagBytes.length;
    result.set(lengthBytes, offset);
    offset += lengthBytes.length;
    result.set(content, offset);
    return result;
  }

  /**
   * Encode only the contents of a tag: the payload of a primitive tag or the
   * concatenated encodings of a constructed tag's children.
   */
  public static encodeContent(tag: Asn1Tag): Uint8Array {
    if (!tag.constructed) {
      return tag.data ? tag.data.slice() : new Uint8Array(0);
    }
    const parts = tag.children.map((child) => this.encode(child));
    const out = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0));
    let offset = 0;
    for (const part of parts) {
      out.set(part, offset);
      offset += part.length;
    }
    return out;
  }

  protected static encodeIdentifier(
    tag: Pick<Asn1Tag, "tagClass" | "identifier" | "constructed">,
  ): number[] {
    const { tagClass, identifier, constructed } = tag;

    if (
      !Number.isSafeInteger(identifier) ||
      identifier < 0
    ) {
      throw new Error(
        `Invalid identifier: ${identifier}. Expected integer in range [0, ${Number.MAX_SAFE_INTEGER}]`,
      );
    }
    if (tagClass < TagClass.Universal || tagClass > TagClass.Private) {
      throw new Error(`Invalid tagClass: ${tagClass} (expected 0..3)`);
    }

    const tagBytes: number[] = [];
    let firstByte = (tagClass << 6) | (constructed ? 0x20 : 0x00);

    if (identifier < 31) {
      firstByte |= identifier;
      tagBytes.push(firstByte);
    } else {
      firstByte |= 0x1f;
      tagBytes.push(firstByte);

      const tagNumBytes: number[] = [];
      let num = identifier;
      do {
        tagNumBytes.unshift(num % 128);
        num = Math.floor(num / 128); // Use division for numbers > 32-bit
      } while (num > 0);

      for (let i = 0; i < tagNumBytes.length - 1; i++) {
        tagBytes.push(tagNumBytes[i] | 0x80);
      }
      tagBytes.push(tagNumBytes[tagNumBytes.length - 1]);
    }
    return tagBytes;
  }

  protected static encodeLength(len: number): number[] {
    if (len < 128) return [len];

    const lenOfLenBytes: number[] = [];
    let tempLen = len;
    do {
      lenOfLenBytes.unshift(tempLen % 256);
      tempLen = Math.floor(tempLen / 256);
    } while (tempLen > 0);

    return [0x80 | lenOfLenBytes.length, ...lenOfLenBytes];
  }
}

/**
 * Number of bytes the tag occupied in its source: header plus contents.
 * Indefinite-length tags are measured through their children, EOC included.
 */
export function totalByteCount(tag: Asn1Tag): number {
  if (isIndefinite(tag.length)) {
    return tag.children.reduce(
      (sum, child) => sum + totalByteCount(child),
      tag.headerLength,
    );
  }
  return tag.headerLength + tag.length;
}
