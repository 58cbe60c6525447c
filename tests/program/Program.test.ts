import assert from "node:assert";
import { describe, test } from "node:test";

import {
  DuplicateLabelError,
  ReservedRegisterError,
  StructuralError,
  UndefinedLabelError,
} from "../../src/core/exceptions/SequenceErrors";
import { imm, instruction, label } from "../../src/core/program/Instruction";
import { durationOf } from "../../src/core/program/InstructionSet";
import {
  buildLabelTable,
  createProgram,
  insertLines,
  parseProgram,
  replaceLine,
  validateProgram,
} from "../../src/core/program/Program";
import { assertUserRegister, phaseCycleRegister, reservedRoleOf } from "../../src/core/program/Registers";

const tables = {
  waveforms: { block: { index: 0, data: [0.5, 0.5] } },
  acquisitions: { main: { index: 0, num_bins: 1 } },
};

describe("Program", () => {
  test("labels point at the next instruction", () => {
    const program = parseProgram("first:\nnop\nsecond:\nthird:\nwait 10\nstop");
    const labels = buildLabelTable(program.lines);

    assert.deepStrictEqual([...labels.entries()], [
      ["first", 0],
      ["second", 1],
      ["third", 1],
    ]);
  });

  test("rejects duplicate and undefined labels", () => {
    assert.throws(() => validateProgram(parseProgram("a:\nnop\na:\nstop")), DuplicateLabelError);
    assert.throws(() => validateProgram(parseProgram("jmp @nowhere")), UndefinedLabelError);
  });

  test("checks table indices used by play and acquire", () => {
    validateProgram(parseProgram("play 0,0,4\nacquire 0,0,4", tables));

    assert.throws(() => validateProgram(parseProgram("play 0,1,4", tables)), {
      name: "StructuralError",
      message: "Waveform index 1 is not in the waveform table",
    });
    assert.throws(() => validateProgram(parseProgram("acquire 2,0,4", tables)), StructuralError);
  });

  test("does not share tables with its input", () => {
    const program = createProgram([], tables);
    program.waveforms.block.data[0] = 0;

    assert.strictEqual(tables.waveforms.block.data[0], 0.5);
  });

  test("insertLines and replaceLine return new arrays", () => {
    const lines = [instruction("nop"), instruction("stop")];
    const inserted = insertLines(lines, 1, label("here"));
    const replaced = replaceLine(lines, 0, instruction("wait", [imm(4)]), instruction("wait", [imm(8)]));

    assert.deepStrictEqual(
      inserted.map((line) => line.kind),
      ["instruction", "label", "instruction"],
    );
    assert.strictEqual(replaced.length, 3);
    assert.strictEqual(lines.length, 2);
    assert.throws(() => replaceLine(lines, 2), RangeError);
  });

  test("measures literal durations only", () => {
    const [play, wait, registerWait, sync] = parseProgram("play 0,0,40\nwait 12\nwait R3\nwait_sync 4").lines;

    assert.strictEqual(durationOf(play), 40);
    assert.strictEqual(durationOf(wait), 12);
    assert.strictEqual(durationOf(registerWait), 0);
    assert.strictEqual(durationOf(sync), 0);
  });
});

describe("Registers", () => {
  test("knows which registers the compiler reserves", () => {
    assert.strictEqual(reservedRoleOf(0), "averages");
    assert.strictEqual(reservedRoleOf(44), "phaseCycle");
    assert.strictEqual(reservedRoleOf(63), "dummyShots");
    assert.strictEqual(reservedRoleOf(7), null);
    assert.strictEqual(phaseCycleRegister(3), 43);
  });

  test("refuses reserved registers in user code", () => {
    assert.throws(() => assertUserRegister(51, 4), {
      name: "ReservedRegisterError",
      message: "R51 is reserved (shots)",
      line: 4,
    });
    assert.throws(() => assertUserRegister(1), ReservedRegisterError);
    assertUserRegister(10);
  });
});
