import { BufferByteSource, TagDecoder, exportText, fromHex } from "../src/index.js";
import type { OidNameResolver } from "../src/index.js";

// SEQUENCE {
//   SEQUENCE { OID 1.2.840.10045.2.1, OID 1.2.840.10045.3.1.7 }
//   BIT STRING { 0 unused bits, SEQUENCE { INTEGER 1 } }
// }
const der = fromHex(
  "301d" +
    "3013" +
    "06072a8648ce3d0201" +
    "06082a8648ce3d030107" +
    "0306" +
    "00" +
    "3003020101",
);

const names = new Map([
  ["1.2.840.10045.2.1", "ecPublicKey"],
  ["1.2.840.10045.3.1.7", "prime256v1"],
]);
const oidNames: OidNameResolver = { resolve: (oid) => names.get(oid) };

const root = new TagDecoder().decode(new BufferByteSource(der));
process.stdout.write(exportText(root, { oidNames }));
// (0, 31) SEQUENCE
//   (2, 21) SEQUENCE
//     (4, 9) OBJECT_IDENTIFIER: 1.2.840.10045.2.1 (ecPublicKey)
//     (13, 10) OBJECT_IDENTIFIER: 1.2.840.10045.3.1.7 (prime256v1)
//   (23, 8) BIT_STRING: 3003020101
//     (0, 5) SEQUENCE
//       (2, 3) INTEGER: 1
