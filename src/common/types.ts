export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

/** Universal tag numbers from X.690 that the decoder and formatter care about. */
export const UniversalTag = {
  EndOfContents: 0,
  Boolean: 1,
  Integer: 2,
  BitString: 3,
  OctetString: 4,
  Null: 5,
  ObjectIdentifier: 6,
  ObjectDescriptor: 7,
  InstanceOf: 8,
  Real: 9,
  Enumerated: 10,
  EmbeddedPdv: 11,
  Utf8String: 12,
  RelativeOid: 13,
  Sequence: 16,
  Set: 17,
  NumericString: 18,
  PrintableString: 19,
  TeletexString: 20,
  VideotexString: 21,
  Ia5String: 22,
  UtcTime: 23,
  GeneralizedTime: 24,
  GraphicString: 25,
  VisibleString: 26,
  GeneralString: 27,
  UniversalString: 28,
  CharacterString: 29,
  BmpString: 30,
} as const;
export type UniversalTag = (typeof UniversalTag)[keyof typeof UniversalTag];

export const EOC_IDENTIFIER = 0;
export const EOC_LENGTH = 0;
export const INDEFINITE_LENGTH_BYTE = 0x80;
export const BIT_STRING_TAG = UniversalTag.BitString;

export const INDEFINITE_LENGTH = "indefinite";
export type TagLength = number | typeof INDEFINITE_LENGTH;

export interface TagInfo {
  tagClass: TagClass;
  constructed: boolean;
  tagNumber: number;
}

/**
 * One decoded TLV node.
 *
 * Primitive tags carry their payload in `data`. Constructed tags carry their
 * nested tags in `children`. A primitive BIT STRING may additionally hold one
 * speculatively decoded sub-tree in `children`; `data` stays authoritative.
 */
export interface Asn1Tag {
  /** Offset of the first identifier byte in the source. */
  readonly startOffset: number;
  readonly identifier: number;
  readonly tagClass: TagClass;
  readonly constructed: boolean;
  readonly length: TagLength;
  /** Bytes taken by the identifier and length fields. */
  readonly headerLength: number;
  readonly data: Uint8Array | null;
  readonly children: readonly Asn1Tag[];
}

export function isIndefinite(
  length: TagLength,
): length is typeof INDEFINITE_LENGTH {
  return length === INDEFINITE_LENGTH;
}

export function isEndOfContents(tag: Asn1Tag): boolean {
  return tag.identifier === EOC_IDENTIFIER && tag.length === EOC_LENGTH;
}
