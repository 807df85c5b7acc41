import { TagClass, UniversalTag } from "./types.js";
import type { Asn1Tag } from "./types.js";

export const UNKNOWN_TYPE_NAME = "UNKNOWN";

const UNIVERSAL_NAMES: Readonly<Record<number, string>> = {
  [UniversalTag.Boolean]: "BOOLEAN",
  [UniversalTag.Integer]: "INTEGER",
  [UniversalTag.BitString]: "BIT_STRING",
  [UniversalTag.OctetString]: "OCTET_STRING",
  [UniversalTag.Null]: "NULL",
  [UniversalTag.ObjectIdentifier]: "OBJECT_IDENTIFIER",
  [UniversalTag.ObjectDescriptor]: "OBJECTDESCRIPTOR",
  [UniversalTag.InstanceOf]: "INSTANCE_OF",
  [UniversalTag.Real]: "REAL",
  [UniversalTag.Enumerated]: "ENUMERATED",
  [UniversalTag.EmbeddedPdv]: "EMBEDDED_PDV",
  [UniversalTag.Utf8String]: "UTF8STRING",
  [UniversalTag.RelativeOid]: "RELATIVE_OID",
  [UniversalTag.Sequence]: "SEQUENCE",
  [UniversalTag.Set]: "SET",
  [UniversalTag.NumericString]: "NUMERICSTRING",
  [UniversalTag.PrintableString]: "PRINTABLESTRING",
  [UniversalTag.TeletexString]: "TELETEXSTRING",
  [UniversalTag.VideotexString]: "VIDEOTEXSTRING",
  [UniversalTag.Ia5String]: "IA5STRING",
  [UniversalTag.UtcTime]: "UTCTIME",
  [UniversalTag.GeneralizedTime]: "GENERALIZEDTIME",
  [UniversalTag.GraphicString]: "GRAPHICSTRING",
  [UniversalTag.VisibleString]: "VISIBLESTRING",
  [UniversalTag.GeneralString]: "GENERALSTRING",
  [UniversalTag.UniversalString]: "UNIVERSALSTRING",
  [UniversalTag.CharacterString]: "CHARACTER_STRING",
  [UniversalTag.BmpString]: "BMPSTRING",
};

/**
 * Mnemonic of a universal tag number, or `UNKNOWN` for anything outside the
 * table (including 0, 14, 15 and numbers above 30).
 */
export function universalTagName(identifier: number): string {
  if (!Object.prototype.hasOwnProperty.call(UNIVERSAL_NAMES, identifier)) {
    return UNKNOWN_TYPE_NAME;
  }
  return UNIVERSAL_NAMES[identifier];
}

// Non-universal tags have no fixed type.
export function tagTypeName(tag: Pick<Asn1Tag, "tagClass" | "identifier">): string {
  return tag.tagClass === TagClass.Universal
    ? universalTagName(tag.identifier)
    : UNKNOWN_TYPE_NAME;
}

export function tagClassName(tagClass: TagClass): string {
  switch (tagClass) {
    case TagClass.Universal:
      return "UNIVERSAL";
    case TagClass.Application:
      return "APPLICATION";
    case TagClass.ContextSpecific:
      return "CONTEXT_SPECIFIC";
    case TagClass.Private:
      return "PRIVATE";
  }
}
