import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { expect } from "vitest";
import { fromHex } from "../../src/common/codecs.js";
import { Asn1DecodeError } from "../../src/common/errors.js";
import type { Asn1DecodeErrorCode } from "../../src/common/errors.js";
import { TagClass } from "../../src/common/types.js";
import type { Asn1Tag, TagLength } from "../../src/common/types.js";

export { fromHex as fromHexString };

/**
 * Run `fn` and return the Asn1DecodeError it throws, failing the test when it
 * throws something else or nothing.
 */
export function expectDecodeError(
  fn: () => unknown,
  code: Asn1DecodeErrorCode,
): Asn1DecodeError {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(Asn1DecodeError);
  if (!Asn1DecodeError.is(caught)) {
    throw new Error(`expected Asn1DecodeError(${code})`);
  }
  expect(caught.code).toBe(code);
  return caught;
}

// Hand-built primitive tag for formatter tests
export function primitiveTag(
  identifier: number,
  data: number[],
  tagClass: TagClass = TagClass.Universal,
): Asn1Tag {
  return {
    startOffset: 0,
    identifier,
    tagClass,
    constructed: false,
    length: data.length,
    headerLength: 2,
    data: new Uint8Array(data),
    children: [],
  };
}

export function constructedTag(
  identifier: number,
  children: Asn1Tag[],
  length: TagLength,
  tagClass: TagClass = TagClass.Universal,
): Asn1Tag {
  return {
    startOffset: 0,
    identifier,
    tagClass,
    constructed: true,
    length,
    headerLength: 2,
    data: null,
    children,
  };
}

export interface TempDir {
  path: string;
  write(name: string, hex: string): string;
  remove(): void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "ber-tree-"));
  return {
    path,
    write(name: string, hex: string): string {
      const file = join(path, name);
      writeFileSync(file, fromHex(hex));
      return file;
    },
    remove(): void {
      rmSync(path, { recursive: true, force: true });
    },
  };
}
