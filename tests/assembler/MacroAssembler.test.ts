import assert from "node:assert";
import { describe, test } from "node:test";

import { MacroAssembler, substituteConverterCalls } from "../../src/core/assembler/MacroAssembler";
import { SequenceRangeError, UnsupportedConstructError } from "../../src/core/exceptions/SequenceErrors";

const assemble = (source: string): string[] => new MacroAssembler().assemble(source).split("\n");

describe("MacroAssembler", () => {
  test("lowers assignments and additions", () => {
    assert.deepStrictEqual(assemble("R3 = 5\nR3 = R4 + 7\nR3 = 7 + R4\nR3 = R4 - 2"), [
      "move      5,R3",
      "add       R4,7,R3",
      "add       R4,7,R3",
      "sub       R4,2,R3",
    ]);
  });

  test("unrolls small multiplications", () => {
    assert.deepStrictEqual(assemble("R3 = R4 * 3"), ["move      R4,R3", "add       R3,R4,R3", "add       R3,R4,R3"]);
    assert.deepStrictEqual(assemble("R3 = 0 * R4"), ["move      0,R3"]);
  });

  test("turns large multiplications into a loop", () => {
    assert.deepStrictEqual(assemble("R3 = R4 * 10"), [
      "move      R4,R3",
      "move      9,R1",
      "loop_mult0:",
      "add       R3,R4,R3",
      "nop",
      "loop      R1,@loop_mult0",
    ]);
  });

  test("lowers marker and parameter helpers", () => {
    assert.deepStrictEqual(
      assemble("set_mrk(t1t2t3t4=1000)\nset_ph(90)\nset_awg_gain(0.5, -1)\nset_freq(6.8e6)"),
      ["set_mrk   1", "set_ph    250000000", "set_awg_gain 16384,-32768", "set_freq  27200000"],
    );
  });

  test("substitutes converter calls inside ordinary instructions", () => {
    assert.strictEqual(substituteConverterCalls("move to_ph(65),R5"), "move 180555556,R5");
    assert.strictEqual(substituteConverterCalls("set_awg_offs to_gain(0.5),to_gain(0)"), "set_awg_offs 16384,0");
  });

  test("keeps source line numbers and drops comments", () => {
    assert.deepStrictEqual(new MacroAssembler().lower("nop\n\nR3 = R4 * 2 # doubled"), [
      { line: 1, text: "nop" },
      { line: 3, text: "move      R4,R3" },
      { line: 3, text: "add       R3,R4,R3" },
    ]);
  });

  test("rejects constructs it cannot lower", () => {
    assert.throws(() => assemble("R3 = 2 - R4"), UnsupportedConstructError);
    assert.throws(() => assemble("R3 = R4 / 2"), UnsupportedConstructError);
    assert.throws(() => assemble("R3 = R4 * R5"), UnsupportedConstructError);
    assert.throws(() => assemble("set_ph(R3)"), UnsupportedConstructError);
    assert.throws(() => assemble("R3 = -5"), SequenceRangeError);
  });

  test("tags errors with the pass and the source line", () => {
    assert.throws(() => assemble("nop\nR0 = 3"), {
      name: "ReservedRegisterError",
      pass: "macro-assembler",
      line: 2,
    });
  });
});
