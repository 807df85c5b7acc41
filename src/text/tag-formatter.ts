import { totalByteCount } from "../builder/tag-encoder.js";
import {
  decodeAscii,
  decodeBitString,
  decodeBmpString,
  decodeBoolean,
  decodeInteger,
  decodeOID,
  decodeRelativeOID,
  decodeUniversalString,
  decodeUtf8,
  toHex,
} from "../common/codecs.js";
import { Asn1FormatError } from "../common/errors.js";
import { tagClassName, universalTagName } from "../common/names.js";
import { TagClass, UniversalTag, isIndefinite } from "../common/types.js";
import type { Asn1Tag } from "../common/types.js";

/**
 * Looks up a human-readable name for a dotted OID.
 * The decoder ships no OID database; callers plug theirs in here.
 */
export interface OidNameResolver {
  resolve(oid: string): string | undefined;
}

export interface FormatOptions {
  oidNames?: OidNameResolver;
  /** Spaces per nesting level in `exportText`. */
  indent?: number;
}

export function shortDescription(tag: Asn1Tag): string {
  if (tag.tagClass === TagClass.Universal) {
    return universalTagName(tag.identifier);
  }
  return `[${tagClassName(tag.tagClass)} ${tag.identifier}]`;
}

/**
 * Render the payload of a primitive tag according to its universal type.
 * Non-universal and opaque types come out as hex. Throws `Asn1FormatError`
 * when the payload is not a valid encoding of its type.
 */
export function valueText(tag: Asn1Tag, options: FormatOptions = {}): string {
  const data = tag.data;
  if (data === null) return "";
  if (tag.tagClass !== TagClass.Universal) return toHex(data);

  switch (tag.identifier) {
    case UniversalTag.Boolean:
      return decodeBoolean(data) ? "TRUE" : "FALSE";
    case UniversalTag.Integer:
    case UniversalTag.Enumerated:
      return decodeInteger(data).toString();
    case UniversalTag.Null:
      if (data.length !== 0) {
        throw new Asn1FormatError(`NULL must be empty; got ${data.length} bytes`);
      }
      return "";
    case UniversalTag.ObjectIdentifier: {
      const oid = decodeOID(data);
      const name = options.oidNames?.resolve(oid);
      return name ? `${oid} (${name})` : oid;
    }
    case UniversalTag.RelativeOid:
      return decodeRelativeOID(data);
    case UniversalTag.BitString: {
      const { unusedBits, content } = decodeBitString(data);
      const hex = toHex(content);
      return unusedBits > 0 ? `${hex} (${unusedBits} unused bits)` : hex;
    }
    case UniversalTag.Utf8String:
      return decodeUtf8(data);
    case UniversalTag.NumericString:
    case UniversalTag.PrintableString:
    case UniversalTag.Ia5String:
    case UniversalTag.VisibleString:
    case UniversalTag.GraphicString:
    case UniversalTag.GeneralString:
    case UniversalTag.ObjectDescriptor:
    case UniversalTag.UtcTime:
    case UniversalTag.GeneralizedTime:
      return decodeAscii(data);
    case UniversalTag.BmpString:
      return decodeBmpString(data);
    case UniversalTag.UniversalString:
      return decodeUniversalString(data);
    default:
      return toHex(data);
  }
}

/** Type description followed by the rendered value of a primitive tag. */
export function shortText(tag: Asn1Tag, options: FormatOptions = {}): string {
  const description = shortDescription(tag);
  if (tag.constructed) return description;
  const value = valueText(tag, options);
  return value === "" ? description : `${description}: ${value}`;
}

// "(offset, size) text", size being "inf" for indefinite-length tags
export function nodeLabel(tag: Asn1Tag, options: FormatOptions = {}): string {
  const size = isIndefinite(tag.length) ? "inf" : String(totalByteCount(tag));
  return `(${tag.startOffset}, ${size}) ${shortText(tag, options)}`;
}

/** Indented one-line-per-tag dump of a whole tree. */
export function exportText(tag: Asn1Tag, options: FormatOptions = {}): string {
  const step = options.indent ?? 2;
  const lines: string[] = [];
  const walk = (node: Asn1Tag, depth: number): void => {
    lines.push(" ".repeat(depth * step) + nodeLabel(node, options));
    for (const child of node.children) walk(child, depth + 1);
  };
  walk(tag, 0);
  return lines.join("\n") + "\n";
}
