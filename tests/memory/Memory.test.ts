import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { AddressError } from "../../src/core/exceptions/AccessExceptions";
import { Memory } from "../../src/core/memory/Memory";

describe("Memory", () => {
  it("stores words little-endian", () => {
    const memory = new Memory();
    memory.writeWord(0x100, 0x11223344);

    assert.deepEqual(
      [0x100, 0x101, 0x102, 0x103].map((address) => memory.readByte(address)),
      [0x44, 0x33, 0x22, 0x11],
    );
    assert.equal(memory.readHalf(0x102), 0x1122);
  });

  it("reads unwritten locations as zero", () => {
    const memory = new Memory();

    assert.equal(memory.readWord(0x8000_0000), 0);
    assert.equal(memory.readByte(0xffffffff), 0);
  });

  it("returns unsigned values", () => {
    const memory = new Memory();
    memory.writeWord(0x10, -1);

    assert.equal(memory.readWord(0x10), 0xffffffff);
    assert.equal(memory.readHalf(0x10), 0xffff);
    assert.equal(memory.readByte(0x10), 0xff);
  });

  it("allows misaligned access by default", () => {
    const memory = new Memory();
    memory.writeWord(0x100, 0x11223344);

    assert.equal(memory.readWord(0x101), 0x00112233);
  });

  it("faults misaligned access in strict mode", () => {
    const memory = new Memory({ strictAlignment: true });

    assert.throws(
      () => memory.readWord(0x102),
      (error: unknown) => error instanceof AddressError && error.address === 0x102 && error.access === "read",
    );
    assert.throws(() => memory.writeHalf(0x101, 1), /Unaligned halfword address: 0x101/);
    assert.doesNotThrow(() => memory.writeByte(0x101, 1));
  });

  it("spans page boundaries", () => {
    const memory = new Memory();
    memory.writeWord(0xffe, 0xa1b2c3d4);

    assert.equal(memory.readByte(0xfff), 0xc3);
    assert.equal(memory.readByte(0x1000), 0xb2);
    assert.equal(memory.readWord(0xffe), 0xa1b2c3d4);
  });

  it("normalizes addresses to 32 bits and rejects non-integers", () => {
    const memory = new Memory();
    memory.writeByte(-1, 0x5a);

    assert.equal(memory.readByte(0xffffffff), 0x5a);
    assert.throws(() => memory.readByte(1.5), /Invalid memory address: 1.5/);
  });

  it("loads program images and resets", () => {
    const memory = new Memory();
    memory.loadWords(0x400, [0x00500513, 0x00000073]);
    memory.loadBytes(0x500, [1, 2, 0x1ff]);

    assert.equal(memory.readWord(0x404), 0x00000073);
    assert.equal(memory.readByte(0x502), 0xff);

    memory.reset();
    assert.equal(memory.readWord(0x400), 0);
  });
});
