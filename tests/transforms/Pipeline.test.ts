import assert from "node:assert";
import { describe, test } from "node:test";

import { SequenceRangeError } from "../../src/core/exceptions/SequenceErrors";
import { compileSequence, parseSource } from "../../src/core/transforms/Pipeline";

const quiet = () => undefined;

const bundle = {
  program: [
    "acquire 0,0,4",
    "play 4,2,8",
    "wait 500",
    "play 5,3,16",
    "wait 500",
    "wait 983025",
  ].join("\n"),
  waveforms: {
    first_i: { index: 4, data: [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5] },
    first_q: { index: 2, data: [0, 0, 0, 0, 0, 0, 0, 0] },
    second_i: { index: 5, data: new Array<number>(16).fill(0.25) },
    second_q: { index: 3, data: new Array<number>(16).fill(0) },
  },
  acquisitions: { main: { index: 0, num_bins: 1 } },
};

describe("compileSequence", () => {
  test("protects, aligns, averages and splits long delays", () => {
    const result = compileSequence(bundle, { averages: 64, logger: quiet });

    assert.deepStrictEqual(result.text.split("\n"), [
      "move      64,R0",
      "loop_avg:",
      "reset_ph",
      "upd_param 17",
      "acquire   0,0,4",
      "set_mrk   15",
      "upd_param 250",
      "play      4,2,8",
      "wait      500",
      "play      5,3,16",
      "wait      50",
      "set_mrk   11",
      "upd_param 250",
      "set_mrk   3",
      "upd_param 150",
      "wait      50",
      "move      15,R1",
      "loop_delay1:",
      "wait      65535",
      "loop      R1,@loop_delay1",
      "loop      R0,@loop_avg",
      "stop",
    ]);
    assert.strictEqual(result.maxOnTime, 824);
  });

  test("puts dummy shots ahead of the real ones", () => {
    const result = compileSequence(
      { program: "acquire 0,0,100\nwait 1000", acquisitions: { main: { index: 0, num_bins: 1 } } },
      { shots: 3, dummyShots: 2, logger: quiet },
    );

    assert.deepStrictEqual(result.text.split("\n"), [
      "move      2,R63",
      "loop_dummy:",
      "reset_ph",
      "upd_param 20",
      "wait      100",
      "wait      1000",
      "loop      R63,@loop_dummy",
      "move      3,R51",
      "loop_shot:",
      "reset_ph",
      "upd_param 20",
      "acquire   0,0,100",
      "wait      1000",
      "loop      R51,@loop_shot",
      "stop",
    ]);
  });

  test("lowers simplified syntax and for loops", () => {
    const result = compileSequence("R5 = 3\nfor R6 in 0, 1, 2\n  wait 100\nend", { protection: false, logger: quiet });

    assert.deepStrictEqual(result.text.split("\n"), [
      "move      3,R5",
      "move      0,R6",
      "loop_for1:",
      "wait      100",
      "add       R6,1,R6",
      "nop",
      "jlt       R6,3,@loop_for1",
      "stop",
    ]);
    assert.strictEqual(result.maxOnTime, null);
  });

  test("logs when there is nothing to protect", () => {
    const messages: string[] = [];
    const result = compileSequence("wait 100", { logger: (message) => messages.push(message) });

    assert.strictEqual(result.text, "wait      100\nstop");
    assert.deepStrictEqual(messages, ["no play or chirp found, skipping protection markers"]);
  });

  test("rejects zero averages", () => {
    assert.throws(() => compileSequence("wait 100", { averages: 0, logger: quiet }), SequenceRangeError);
  });

  test("validates table references after the last pass", () => {
    assert.throws(() => compileSequence("wait 100\nplay 9,9,20\nwait 100", { protection: false, logger: quiet }), {
      name: "StructuralError",
      pass: "validate",
      line: 2,
    });
  });
});

describe("parseSource", () => {
  test("keeps the source line of lowered constructs", () => {
    const lines = parseSource("nop\nR3 = R4 * 2");

    assert.deepStrictEqual(
      lines.map((line) => line.line),
      [1, 2, 2],
    );
  });
});
