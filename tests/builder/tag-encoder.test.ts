import { describe, expect, test } from "vitest";
import { TagEncoder, totalByteCount } from "../../src/builder/tag-encoder.js";
import { decodeBytes } from "../../src/parser/tag-decoder.js";
import { toHex } from "../../src/common/codecs.js";
import { INDEFINITE_LENGTH } from "../../src/common/types.js";
import type { Asn1Tag } from "../../src/common/types.js";
import { fromHexString, primitiveTag } from "../helpers/utils.js";

const reencode = (hex: string) =>
  toHex(TagEncoder.encode(decodeBytes(fromHexString(hex))));

// Header fields and payloads, recursively; offsets and header sizes may differ.
function expectSameTree(actual: Asn1Tag, expected: Asn1Tag): void {
  expect(actual.identifier).toBe(expected.identifier);
  expect(actual.tagClass).toBe(expected.tagClass);
  expect(actual.constructed).toBe(expected.constructed);
  expect(actual.length).toBe(expected.length);
  expect(actual.data === null ? null : toHex(actual.data)).toBe(
    expected.data === null ? null : toHex(expected.data),
  );
  expect(actual.children.length).toBe(expected.children.length);
  actual.children.forEach((child, i) => expectSameTree(child, expected.children[i]));
}

describe("TagEncoder.encode", () => {
  test("should reproduce definite-length encodings", () => {
    expect(reencode("3003020105")).toBe("3003020105");
    expect(reencode("3006020101020102")).toBe("3006020101020102");
  });

  test("should reproduce indefinite-length encodings with their EOC", () => {
    expect(reencode("30800201050000")).toBe("30800201050000");
    expect(reencode("3080318002010700000000")).toBe("3080318002010700000000");
  });

  test("should reproduce multi-byte identifiers", () => {
    expect(reencode("1f8100012a")).toBe("1f8100012a");
    expect(reencode("df8fffffff7f00")).toBe("df8fffffff7f00");
  });

  test("should write long-form lengths", () => {
    const payload = "ab".repeat(200);
    expect(reencode("0481c8" + payload)).toBe("0481c8" + payload);
  });

  test("should re-emit non-minimal lengths in minimal form", () => {
    expect(reencode("048103aabbcc")).toBe("0403aabbcc");
  });

  test("should write BIT STRING data and ignore its nested tree", () => {
    const tag = decodeBytes(fromHexString("030400020105"));
    expect(tag.children).toHaveLength(1);
    expect(toHex(TagEncoder.encode(tag))).toBe("030400020105");
  });

  test("should refuse an indefinite-length primitive tag", () => {
    const tag: Asn1Tag = { ...primitiveTag(4, [1]), length: INDEFINITE_LENGTH };
    expect(() => TagEncoder.encode(tag)).toThrow(
      "Primitive tag [4] cannot use indefinite length",
    );
  });

  test("should keep headers and payloads across decode/encode/decode", () => {
    const samples = [
      "3003020105",
      "30800201050000",
      "a1053003020101",
      "3080a08004010000000000",
      "6109" + "1f81000101" + "c1020102",
      "030400020105",
    ];
    for (const hex of samples) {
      const first = decodeBytes(fromHexString(hex));
      const second = decodeBytes(TagEncoder.encode(first));
      expectSameTree(second, first);
    }
  });
});

describe("TagEncoder.encodeContent", () => {
  test("should return the children's encodings for a constructed tag", () => {
    const tag = decodeBytes(fromHexString("3003020105"));
    expect(toHex(TagEncoder.encodeContent(tag))).toBe("020105");
  });

  test("should return a copy of a primitive payload", () => {
    const tag = decodeBytes(fromHexString("0402abcd"));
    const content = TagEncoder.encodeContent(tag);
    expect(toHex(content)).toBe("abcd");
    expect(content).not.toBe(tag.data);
  });
});

describe("totalByteCount", () => {
  test("should add header and definite length", () => {
    expect(totalByteCount(decodeBytes(fromHexString("3003020105")))).toBe(5);
    expect(
      totalByteCount(decodeBytes(fromHexString("0481c8" + "00".repeat(200)))),
    ).toBe(203);
  });

  test("should measure indefinite-length tags through their children", () => {
    expect(totalByteCount(decodeBytes(fromHexString("30800201050000")))).toBe(7);
  });

  test("should count the declared length of a header-only tag", () => {
    const tag = decodeBytes(fromHexString("3003020105"), { singleNode: true });
    expect(totalByteCount(tag)).toBe(5);
  });
});
