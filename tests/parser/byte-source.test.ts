import { afterAll, describe, expect, test } from "vitest";
import {
  BudgetedByteSource,
  BufferByteSource,
  FileByteSource,
} from "../../src/parser/byte-source.js";
import { decode } from "../../src/parser/tag-decoder.js";
import { INDEFINITE_LENGTH } from "../../src/common/types.js";
import { createTempDir, expectDecodeError } from "../helpers/utils.js";

describe("BufferByteSource", () => {
  test("should read bytes forward and report -1 at the end", () => {
    const source = new BufferByteSource(new Uint8Array([1, 2]));
    expect(source.readByte()).toBe(1);
    expect(source.readByte()).toBe(2);
    expect(source.readByte()).toBe(-1);
    expect(source.position).toBe(2);
  });

  test("should return fewer bytes than asked only at the end", () => {
    const source = new BufferByteSource(new Uint8Array([1, 2, 3]));
    expect(Array.from(source.read(2))).toEqual([1, 2]);
    expect(Array.from(source.read(5))).toEqual([3]);
    expect(source.read(1).length).toBe(0);
    expect(source.remaining).toBe(0);
  });

  test("should accept an ArrayBuffer and a start offset", () => {
    const source = new BufferByteSource(new Uint8Array([9, 8, 7]).buffer, 1);
    expect(source.position).toBe(1);
    expect(source.remaining).toBe(2);
    expect(source.readByte()).toBe(8);
  });

  test("should reject a start offset outside the buffer", () => {
    expect(() => new BufferByteSource(new Uint8Array(2), 3)).toThrow(RangeError);
  });
});

describe("FileByteSource", () => {
  const dir = createTempDir();
  afterAll(() => dir.remove());

  test("should refill its chunk across reads", () => {
    // Given: ten bytes and a three-byte chunk
    const file = dir.write("counting.bin", "00010203040506070809");
    const source = new FileByteSource(file, 3);

    // When / Then
    expect(source.remaining).toBe(10);
    expect(Array.from(source.read(5))).toEqual([0, 1, 2, 3, 4]);
    expect(source.readByte()).toBe(5);
    expect(Array.from(source.read(10))).toEqual([6, 7, 8, 9]);
    expect(source.readByte()).toBe(-1);
    expect(source.position).toBe(10);
    expect(source.remaining).toBe(0);
    source.close();
  });

  test("should refuse reads after close", () => {
    const source = new FileByteSource(dir.write("one.bin", "01"));
    source.close();
    expect(() => source.readByte()).toThrow("FileByteSource is closed");
  });

  test("should feed the decoder", () => {
    const file = dir.write("indefinite.ber", "30800201050000");
    const source = new FileByteSource(file, 2);

    const root = decode(source);
    source.close();

    expect(root.length).toBe(INDEFINITE_LENGTH);
    expect(root.children.map((c) => c.identifier)).toEqual([2, 0]);
  });
});

describe("BudgetedByteSource", () => {
  test("should count consumed bytes from where it was wrapped", () => {
    const inner = new BufferByteSource(new Uint8Array([1, 2, 3, 4]), 1);
    const source = new BudgetedByteSource(inner, 3);
    source.readByte();
    source.read(2);
    expect(source.consumed).toBe(3);
    expect(source.position).toBe(4);
  });

  test("should throw BudgetExceeded when a read goes past the budget", () => {
    const source = new BudgetedByteSource(
      new BufferByteSource(new Uint8Array([1, 2, 3])),
      2,
    );
    source.readByte();
    const error = expectDecodeError(() => source.read(2), "BudgetExceeded");
    expect(error.offset).toBe(2);
  });

  test("should charge only for bytes the inner source returned", () => {
    const source = new BudgetedByteSource(
      new BufferByteSource(new Uint8Array([1, 2])),
      2,
    );
    expect(Array.from(source.read(10))).toEqual([1, 2]);
    expect(source.readByte()).toBe(-1);
    expect(source.read(1).length).toBe(0);
  });

  test("should allow a read that uses the budget exactly", () => {
    const source = new BudgetedByteSource(
      new BufferByteSource(new Uint8Array([1, 2, 3])),
      2,
    );
    expect(Array.from(source.read(2))).toEqual([1, 2]);
    expectDecodeError(() => source.readByte(), "BudgetExceeded");
  });
});
