import { resolveDecodeOptions } from "../common/config.js";
import type { DecodeOptions, ResolvedDecodeOptions } from "../common/config.js";
import { Asn1DecodeError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import {
  BIT_STRING_TAG,
  isEndOfContents,
  isIndefinite,
} from "../common/types.js";
import type { Asn1Tag } from "../common/types.js";
import { shortText } from "../text/tag-formatter.js";
import { BufferByteSource } from "./byte-source.js";
import type { ByteSource } from "./byte-source.js";
import { TagHeaderReader } from "./header-reader.js";

const log = createLogger("tag-decoder");

/** A source that can tell how many bytes are left, for decoding back-to-back tags. */
export interface SizedByteSource extends ByteSource {
  readonly remaining: number;
}

/**
 * Recursive-descent BER/DER decoder producing an `Asn1Tag` tree.
 * Each call to `decode` owns the source it is given until it returns.
 */
export class TagDecoder {
  public readonly options: ResolvedDecodeOptions;
  private depthCounter: number = 0;

  public constructor(options?: DecodeOptions) {
    this.options = resolveDecodeOptions(options);
  }

  // Decodes one tag (and, unless singleNode is set, everything inside it).
  public decode(source: ByteSource): Asn1Tag {
    // Reset depth counter per top-level decode invocation
    this.depthCounter = 0;
    return this.decodeTag(source, this.options.singleNode);
  }

  public decodeAll(source: SizedByteSource): Asn1Tag[] {
    const tags: Asn1Tag[] = [];
    while (source.remaining > 0) {
      tags.push(this.decode(source));
    }
    return tags;
  }

  /**
   * Decode a BIT STRING payload as nested ASN.1, skipping its unused-bits byte.
   * A failed attempt is an expected outcome and yields null.
   */
  public tryDecodeEmbedded(data: Uint8Array): Asn1Tag | null {
    if (data.length < 2) return null;
    const sub = new BufferByteSource(data.subarray(1));
    try {
      const tag = this.decodeTag(sub, false);
      shortText(tag);
      return tag;
    } catch (e) {
      log.debug(
        { err: e, payloadLength: data.length },
        "BIT STRING payload is not nested ASN.1",
      );
      return null;
    }
  }

  private decodeTag(source: ByteSource, singleNode: boolean): Asn1Tag {
    this.ensureDepth(source);
    try {
      const startOffset = source.position;
      const identifier = TagHeaderReader.readIdentifier(source);
      const lengthInfo = TagHeaderReader.readLength(source);
      const headerLength = identifier.byteCount + lengthInfo.byteCount;
      const { tagClass, constructed, tagNumber } = identifier.tag;
      const length = lengthInfo.length;

      const header = {
        startOffset,
        identifier: tagNumber,
        tagClass,
        constructed,
        length,
        headerLength,
      };

      if (constructed) {
        const children = singleNode
          ? []
          : this.decodeChildren(source, startOffset + headerLength, header);
        return { ...header, data: null, children };
      }

      const data = this.readData(source, header);
      const children: Asn1Tag[] = [];
      if (this.options.expandEmbedded && tagNumber === BIT_STRING_TAG) {
        const embedded = this.tryDecodeEmbedded(data);
        if (embedded) children.push(embedded);
      }
      return { ...header, data, children };
    } finally {
      this.depthCounter--;
    }
  }

  private decodeChildren(
    source: ByteSource,
    contentStart: number,
    header: Pick<Asn1Tag, "length" | "identifier" | "startOffset">,
  ): Asn1Tag[] {
    const children: Asn1Tag[] = [];
    const { length } = header;

    if (isIndefinite(length)) {
      for (;;) {
        const child = this.decodeTag(source, false);
        children.push(child);
        if (isEndOfContents(child)) break;
      }
      return children;
    }

    const end = contentStart + length;
    while (source.position < end) {
      children.push(this.decodeTag(source, false));
      if (source.position > end) {
        throw new Asn1DecodeError(
          "InvalidEncoding",
          `Child of tag [${header.identifier}] at offset ${header.startOffset} runs past its end at ${end}`,
          source.position,
        );
      }
    }
    return children;
  }

  private readData(
    source: ByteSource,
    header: Pick<Asn1Tag, "length" | "identifier">,
  ): Uint8Array {
    const { length } = header;
    if (isIndefinite(length)) {
      throw new Asn1DecodeError(
        "InvalidEncoding",
        `Primitive tag [${header.identifier}] cannot use indefinite length`,
        source.position,
      );
    }
    if (length > this.options.maxPayloadLength) {
      throw new Asn1DecodeError(
        "PayloadTooLarge",
        `Payload of ${length} bytes exceeds limit of ${this.options.maxPayloadLength}`,
        source.position,
      );
    }
    const data = source.read(length);
    if (data.length !== length) {
      throw new Asn1DecodeError(
        "TruncatedInput",
        `Declared length ${length} exceeds available bytes (${data.length})`,
        source.position,
      );
    }
    return data;
  }

  // Depth guard to prevent stack overflows on pathological nesting
  private ensureDepth(source: ByteSource): void {
    if (this.depthCounter >= this.options.maxDepth) {
      throw new Asn1DecodeError(
        "DepthExceeded",
        `Maximum nesting depth exceeded: ${this.options.maxDepth}`,
        source.position,
      );
    }
    this.depthCounter++;
  }
}

export function decode(source: ByteSource, options?: DecodeOptions): Asn1Tag {
  return new TagDecoder(options).decode(source);
}

export function decodeAll(
  source: SizedByteSource,
  options?: DecodeOptions,
): Asn1Tag[] {
  return new TagDecoder(options).decodeAll(source);
}

export function decodeBytes(
  input: Uint8Array | ArrayBuffer,
  options?: DecodeOptions,
): Asn1Tag {
  return decode(new BufferByteSource(input), options);
}
