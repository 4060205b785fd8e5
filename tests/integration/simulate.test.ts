import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { Memory, TerminalDevice, simulate, type SymbolTable } from "../../src/core";
import { REG, asm } from "../helpers/encode";

const BASE = 0x1000;

function program(words: number[]): Memory {
  const memory = new Memory();
  memory.loadWords(BASE, words);
  return memory;
}

// Counts t0 down from 3; the bne at 0x1008 is taken twice, then falls through.
const COUNTDOWN = [
  asm.addi(REG.t0, REG.zero, 3),
  asm.addi(REG.t0, REG.t0, -1),
  asm.bne(REG.t0, REG.zero, -4),
  asm.addi(REG.a7, REG.zero, 93),
  asm.ecall(),
];

const isInstructionLine = (line: string) => /^ *\d+ => /.test(line);

class CountingSymbolTable implements SymbolTable {
  lookups = 0;

  lookup(): string | null {
    this.lookups += 1;
    return null;
  }
}

describe("simulate", () => {
  it("counts retired instructions up to and including the exit ecall", () => {
    const memory = program([asm.addi(REG.a0, REG.zero, 5), asm.addi(REG.a7, REG.zero, 93), asm.ecall()]);

    const stat = simulate(memory, BASE, { console: new TerminalDevice() });

    assert.equal(stat.instructionsRetired, 3);
    assert.equal(stat.exitReason, "exit");
    assert.equal(stat.fault, undefined);
    assert.deepEqual(stat.notTaken, { predictions: 0, mispredictions: 0 });
  });

  it("scores all four predictors on a counted loop", () => {
    const stat = simulate(program(COUNTDOWN), BASE, { console: new TerminalDevice() });

    assert.equal(stat.instructionsRetired, 9);
    assert.deepEqual(stat.notTaken, { predictions: 3, mispredictions: 2 });
    assert.deepEqual(stat.backwardTaken, { predictions: 3, mispredictions: 1 });
    assert.deepEqual(stat.bimodal, {
      predictions: 3,
      mispredictions: 2,
      predictionsByCounter: [0, 1, 1, 1],
      mispredictionsByCounter: [0, 1, 0, 1],
    });
    assert.deepEqual(stat.gshare, {
      predictions: 3,
      mispredictions: 2,
      predictionsByCounter: [0, 3, 0, 0],
      mispredictionsByCounter: [0, 2, 0, 0],
    });
  });

  it("writes a trace line per retired instruction", () => {
    const lines: string[] = [];

    simulate(program(COUNTDOWN), BASE, {
      console: new TerminalDevice(),
      logSink: (line) => lines.push(line),
      symbols: { loop: 0x1004 },
    });

    const trace = lines.filter(isInstructionLine);
    assert.equal(trace.length, 9);
    assert.deepEqual(trace.slice(0, 3), [
      "     1 => 00001000 : 00300293    addi t0, zero, 3",
      "     2 => 00001004 : fff28293    addi t0, t0, -1",
      "     3 => 00001008 : fe029ee3    bne t0, zero, 0x00001004 <loop> {T}",
    ]);
    assert.deepEqual(trace.slice(6), [
      "     7 => 00001008 : fe029ee3    bne t0, zero, 0x00001004 <loop>",
      "     8 => 0000100c : 05d00893    addi a7, zero, 93",
      "     9 => 00001010 : 00000073    ecall",
    ]);
  });

  it("truncates trace disassembly to the configured length", () => {
    const lines: string[] = [];

    simulate(program([asm.addi(REG.a7, REG.zero, 93), asm.ecall()]), BASE, {
      console: new TerminalDevice(),
      logSink: (line) => lines.push(line),
      disassemblyMaxLength: 4,
    });

    assert.deepEqual(lines, [
      "Simulator logging enabled",
      " Register write: x17 = 0x0000005D",
      "     1 => 00001000 : 05d00893    addi",
      "     2 => 00001004 : 00000073    ecal",
    ]);
  });

  it("logs every register and memory write before its instruction line", () => {
    const lines: string[] = [];

    simulate(
      program([
        asm.lui(REG.a1, 0x2),
        asm.addi(REG.a0, REG.zero, -1),
        asm.sw(REG.a0, 4, REG.a1),
        asm.sb(REG.a0, 0, REG.a1),
        asm.addi(REG.zero, REG.zero, 5),
        asm.addi(REG.a7, REG.zero, 93),
        asm.ecall(),
      ]),
      BASE,
      { console: new TerminalDevice(), logSink: (line) => lines.push(line) },
    );

    assert.equal(lines[0], "Simulator logging enabled");
    assert.equal(lines[1], " Register write: x11 = 0x00002000");
    assert.ok(lines[2].startsWith("     1 => 00001000 : "));
    assert.deepEqual(
      lines.filter((line) => !isInstructionLine(line)),
      [
        "Simulator logging enabled",
        " Register write: x11 = 0x00002000",
        " Register write: x10 = 0xFFFFFFFF",
        " Memory write: MEM[0x00002004] = 0xFFFFFFFF",
        " Memory write: MEM[0x00002000] = 0x000000FF",
        " Ignored write to x0",
        " Register write: x17 = 0x0000005D",
      ],
    );
    assert.equal(lines.filter(isInstructionLine).length, 7);
  });

  it("does not disassemble without a log sink", () => {
    const symbols = new CountingSymbolTable();

    simulate(program(COUNTDOWN), BASE, { console: new TerminalDevice(), symbols });

    assert.equal(symbols.lookups, 0);
  });

  it("reports a fault through diagnostics and returns partial statistics", () => {
    const diagnostics: string[] = [];
    const lines: string[] = [];

    const stat = simulate(program([asm.addi(REG.a0, REG.zero, 1), 0xffffffff]), BASE, {
      console: new TerminalDevice(),
      diagnostics: (message) => diagnostics.push(message),
      logSink: (line) => lines.push(line),
    });

    assert.equal(stat.instructionsRetired, 1);
    assert.equal(stat.exitReason, "fault");
    assert.deepEqual(stat.fault, {
      name: "InvalidInstruction",
      message: "Invalid or unimplemented instruction 0xffffffff",
      pc: 0x1004,
    });
    assert.deepEqual(diagnostics, ["[Simulator] InvalidInstruction at 0x00001004: Invalid or unimplemented instruction 0xffffffff"]);
    assert.deepEqual(lines, [
      "Simulator logging enabled",
      " Register write: x10 = 0x00000001",
      "     1 => 00001000 : 00100513    addi a0, zero, 1",
    ]);
  });

  it("passes log sink errors to the caller instead of reporting a fault", () => {
    const diagnostics: string[] = [];
    const memory = program([asm.addi(REG.a7, REG.zero, 93), asm.ecall()]);

    assert.throws(
      () =>
        simulate(memory, BASE, {
          console: new TerminalDevice(),
          diagnostics: (message) => diagnostics.push(message),
          logSink: (line) => {
            if (isInstructionLine(line)) throw new Error("disk full");
          },
        }),
      /disk full/,
    );
    assert.deepEqual(diagnostics, []);
  });

  it("faults on a jump to an address that is not word aligned", () => {
    const diagnostics: string[] = [];

    const stat = simulate(program([asm.lui(REG.t0, 0x1), asm.jalr(REG.zero, 6, REG.t0)]), BASE, {
      console: new TerminalDevice(),
      diagnostics: (message) => diagnostics.push(message),
    });

    assert.equal(stat.instructionsRetired, 2);
    assert.deepEqual(stat.fault, {
      name: "MemoryAccessException",
      message: "Misaligned instruction address: 0x00001006",
      pc: 0x1006,
    });
    assert.deepEqual(diagnostics, [
      "[Simulator] MemoryAccessException at 0x00001006: Misaligned instruction address: 0x00001006",
    ]);
  });

  it("treats an unhandled service as a fault", () => {
    const diagnostics: string[] = [];

    const stat = simulate(program([asm.addi(REG.a7, REG.zero, 5), asm.ecall()]), BASE, {
      console: new TerminalDevice(),
      diagnostics: (message) => diagnostics.push(message),
    });

    assert.equal(stat.instructionsRetired, 1);
    assert.deepEqual(diagnostics, ["[Simulator] SyscallException at 0x00001004: Unsupported syscall service: 5"]);
  });

  it("echoes console input through the character services", () => {
    const terminal = new TerminalDevice();
    terminal.queueInput("hey");
    const memory = program([
      asm.addi(REG.a7, REG.zero, 1),
      asm.ecall(),
      asm.blt(REG.a0, REG.zero, 16),
      asm.addi(REG.a7, REG.zero, 2),
      asm.ecall(),
      asm.jal(REG.zero, -20),
      asm.addi(REG.a7, REG.zero, 3),
      asm.ecall(),
    ]);

    const stat = simulate(memory, BASE, { console: terminal });

    assert.equal(terminal.getOutput(), "hey");
    assert.equal(stat.exitReason, "exit");
    // three echo rounds of six instructions, then read, ecall, blt, exit pair
    assert.equal(stat.instructionsRetired, 3 * 6 + 5);
    assert.deepEqual(stat.notTaken, { predictions: 4, mispredictions: 1 });
  });

  it("validates configuration before running", () => {
    const memory = program([asm.ecall()]);

    assert.throws(() => simulate(memory, 0.5), /Invalid start address: 0.5/);
    assert.throws(() => simulate(memory, BASE + 2), /Misaligned start address: 0x00001002/);
    assert.throws(
      () => simulate(memory, BASE, { console: new TerminalDevice(), predictors: { gshareHistoryBits: 11 } }),
      /gshareHistoryBits must be an integer in \[0, 10\], got 11/,
    );
    assert.throws(() => simulate(memory, BASE, { disassemblyMaxLength: 0 }), /disassemblyMaxLength must be a positive integer, got 0/);
  });
});
