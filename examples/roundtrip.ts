import { TagEncoder, decodeBytes, fromHex, toHex } from "../src/index.js";

// Indefinite-length SEQUENCE holding an OCTET STRING whose length uses a
// non-minimal long form.
const ber = fromHex("3080" + "048103aabbcc" + "0000");

const tree = decodeBytes(ber);
console.log(toHex(TagEncoder.encode(tree))); // 30800403aabbcc0000
console.log(toHex(TagEncoder.encodeContent(tree.children[0]))); // aabbcc
