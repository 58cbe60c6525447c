import assert from "node:assert";
import { describe, test } from "node:test";

import { SequenceRangeError, StructuralError } from "../../src/core/exceptions/SequenceErrors";
import type { ChirpLine } from "../../src/core/program/Instruction";
import { parseLines } from "../../src/core/program/Parser";
import { createProgram } from "../../src/core/program/Program";
import { renderLines } from "../../src/core/program/ProgramRenderer";
import { expandChirps, planChirp } from "../../src/core/transforms/Chirps";

function chirp(source: string): ChirpLine {
  const [line] = parseLines(source);
  if (line.kind !== "chirp") {
    throw new Error(`expected a chirp, got ${line.kind}`);
  }
  return line;
}

const downSweep = "play_lg_chirp(bw=-20e6, sm=10, delta_f=100e6), 12008";

describe("planChirp", () => {
  test("derives a descending sweep", () => {
    assert.deepStrictEqual(planChirp(chirp(downSweep), 0.3), {
      points: 240,
      rampPoints: 24,
      start: 440000000,
      endRampUp: 432000000,
      endPlateau: 368000000,
      endRampDown: 360000000,
      frequencyStep: 334728,
      gainCode: 9830,
      offsetStep: 409,
      ascending: false,
    });
  });

  test("bumps the end points of an ascending sweep by one step", () => {
    const plan = planChirp(chirp("play_lg_chirp(bw=20e6, sm=10, delta_f=100e6), 12008"), 0.3);

    assert.deepStrictEqual(
      [plan.start, plan.endRampUp, plan.endPlateau, plan.endRampDown, plan.ascending],
      [360000000, 368000001, 432000001, 440000001, true],
    );
  });

  test("truncates sweep end points that fall between frequency steps", () => {
    const line: ChirpLine = {
      kind: "chirp",
      bandwidth: 20e6,
      smoothing: 10,
      centerFrequency: 100000000.375,
      step: 50,
      duration: 12008,
      line: 1,
    };
    const plan = planChirp(line, 0.3);

    assert.deepStrictEqual(
      [plan.start, plan.endRampUp, plan.endPlateau, plan.endRampDown],
      [360000001, 368000002, 432000002, 440000002],
    );
    assert.strictEqual(renderLines(expandChirps(createProgram([line])).lines).at(-4), "set_freq  400000001");
  });

  test("rejects sweeps that do not divide evenly", () => {
    assert.throws(() => planChirp(chirp("play_lg_chirp(bw=20e6, sm=10, delta_f=100e6), 12000"), 0.3), SequenceRangeError);
    assert.throws(() => planChirp(chirp("play_lg_chirp(bw=20e6, sm=7, delta_f=100e6), 12008"), 0.3), SequenceRangeError);
    assert.throws(() => planChirp(chirp("play_lg_chirp(bw=20e6, sm=10, delta_f=-1e6), 12008"), 0.3), SequenceRangeError);
    assert.throws(() => planChirp(chirp("play_lg_chirp(bw=20e6, sm=10, delta_f=5e6), 12008"), 0.3), SequenceRangeError);
  });
});

describe("expandChirps", () => {
  test("lowers a chirp into ramp, sweep and ramp-down loops", () => {
    const program = expandChirps(createProgram(parseLines(downSweep)));

    assert.deepStrictEqual(renderLines(program.lines), [
      "set_awg_gain 9830,9830",
      "move      0,R62",
      "move      440000000,R61",
      "ramp_up1:",
      "add       R62,409,R62",
      "set_freq  R61",
      "play      301,301,50",
      "sub       R61,334728,R61",
      "set_awg_offs R62,R62",
      "jge       R61,432000000,@ramp_up1",
      "sweep1:",
      "set_freq  R61",
      "sub       R61,334728,R61",
      "upd_param 50",
      "jge       R61,368000000,@sweep1",
      "set_awg_gain -9830,-9830",
      "ramp_down1:",
      "sub       R62,409,R62",
      "set_freq  R61",
      "play      301,301,50",
      "sub       R61,334728,R61",
      "set_awg_offs R62,R62",
      "jge       R61,360000000,@ramp_down1",
      "set_freq  400000000",
      "set_awg_gain 9830,9830",
      "set_awg_offs 0,0",
      "upd_param 8",
    ]);
  });

  test("adds a ramp waveform per chirp", () => {
    const program = expandChirps(createProgram(parseLines(downSweep)));
    const ramp = program.waveforms.chirpsm1;

    assert.strictEqual(ramp.index, 301);
    assert.strictEqual(ramp.data.length, 50);
    assert.deepStrictEqual(ramp.data.slice(0, 2), [0, 0.00083333]);
    assert.strictEqual(ramp.data[49], 0.04083333);
  });

  test("refuses to overwrite a waveform at the ramp index", () => {
    const program = createProgram(parseLines(downSweep), { waveforms: { taken: { index: 301, data: [0] } } });
    assert.throws(() => expandChirps(program), StructuralError);
  });
});
