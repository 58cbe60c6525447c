import assert from "node:assert";
import { describe, test } from "node:test";

import { StructuralError, UnsupportedConstructError } from "../../src/core/exceptions/SequenceErrors";
import { parseProgram, type WaveformTable } from "../../src/core/program/Program";
import { renderLines } from "../../src/core/program/ProgramRenderer";
import { foldLongWaveforms } from "../../src/core/transforms/WaveformFolding";

function pair(length: number): WaveformTable {
  return {
    long_i: { index: 0, data: new Array<number>(length).fill(0.5) },
    long_q: { index: 1, data: new Array<number>(length).fill(0) },
    short: { index: 2, data: [0.1, 0.2, 0.3, 0.4] },
  };
}

describe("foldLongWaveforms", () => {
  test("loops over one chunk and plays the remainder from a complement", () => {
    const program = foldLongWaveforms(parseProgram("play 0,1,9800\nplay 2,2,4", { waveforms: pair(9735) }), { step: 28 });

    assert.deepStrictEqual(renderLines(program.lines), [
      "move      347,R2",
      "loop_play1:",
      "play      0,1,28",
      "loop      R2,@loop_play1",
      "play      1023,1022,84",
      "play      2,2,4",
    ]);
    assert.strictEqual(program.waveforms.long_i.data.length, 28);
    assert.deepStrictEqual(
      [program.waveforms.long_i_compl.index, program.waveforms.long_i_compl.data.length],
      [1023, 19],
    );
    assert.deepStrictEqual(
      [program.waveforms.long_q_compl.index, program.waveforms.long_q_compl.data.length],
      [1022, 19],
    );
    assert.deepStrictEqual(program.waveforms.short.data, [0.1, 0.2, 0.3, 0.4]);
    assert.strictEqual(347 * program.waveforms.long_i.data.length + program.waveforms.long_i_compl.data.length, 9735);
  });

  test("needs no complement when the step divides the length", () => {
    const program = foldLongWaveforms(parseProgram("play 0,1,28000", { waveforms: pair(28000) }), { step: 28 });

    assert.deepStrictEqual(renderLines(program.lines), [
      "move      1000,R2",
      "loop_play1:",
      "play      0,1,28",
      "loop      R2,@loop_play1",
    ]);
    assert.strictEqual(program.waveforms.long_i_compl, undefined);
  });

  test("moves a too-short remainder into the complement", () => {
    const program = foldLongWaveforms(parseProgram("play 0,1,28003", { waveforms: pair(28003) }), { step: 28 });

    assert.deepStrictEqual(renderLines(program.lines).slice(0, 1), ["move      999,R2"]);
    assert.strictEqual(program.waveforms.long_i_compl.data.length, 31);
  });

  test("leaves programs without long waveforms alone", () => {
    const program = parseProgram("play 2,2,4", { waveforms: { short: { index: 2, data: [0.1, 0.2, 0.3, 0.4] } } });
    assert.strictEqual(foldLongWaveforms(program), program);
  });

  test("rejects waveforms it cannot fold", () => {
    const ramp: WaveformTable = { ramp: { index: 0, data: Array.from({ length: 2000 }, (_, i) => i / 2000) } };
    assert.throws(() => foldLongWaveforms(parseProgram("play 0,0,2000", { waveforms: ramp })), UnsupportedConstructError);
    assert.throws(
      () => foldLongWaveforms(parseProgram("play 0,1,28000", { waveforms: pair(28000) }), { step: 20 }),
      UnsupportedConstructError,
    );
  });

  test("requires both paths of a play to be folded", () => {
    assert.throws(
      () => foldLongWaveforms(parseProgram("play 0,2,28000", { waveforms: pair(28000) }), { step: 28 }),
      StructuralError,
    );
  });

  test("checks the play lasts as long as its waveform", () => {
    assert.throws(() => foldLongWaveforms(parseProgram("play 0,1,27000", { waveforms: pair(28000) })), {
      name: "TimingBudgetError",
      pass: "waveform-folding",
      line: 1,
    });
    assert.throws(() => foldLongWaveforms(parseProgram("play 0,1,28002", { waveforms: pair(28000) })), {
      name: "TimingBudgetError",
    });
  });
});
