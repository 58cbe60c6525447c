import assert from "node:assert";
import { describe, test } from "node:test";

import { SequenceSyntaxError, TimingBudgetError } from "../../src/core/exceptions/SequenceErrors";
import { parseProgram, type Program } from "../../src/core/program/Program";
import { renderLines } from "../../src/core/program/ProgramRenderer";
import { convertMarkers } from "../../src/core/transforms/MarkerShorthand";
import { insertProtectionMarkers } from "../../src/core/transforms/ProtectionMarkers";

const render = (program: Program): string[] => renderLines(program.lines);

describe("insertProtectionMarkers", () => {
  test("switches the amplifier around a single pulse and shortens the next wait", () => {
    const program = insertProtectionMarkers(parseProgram("play 5,3,40\nwait 750"));

    assert.deepStrictEqual(render(program), [
      "set_mrk   15",
      "upd_param 250",
      "play      5,3,40",
      "wait      50",
      "set_mrk   11",
      "upd_param 250",
      "set_mrk   3",
      "upd_param 150",
      "wait      300",
    ]);
  });

  test("turns the amplifier off during long gaps between pulses", () => {
    const program = insertProtectionMarkers(parseProgram("play 0,0,20\nwait 3000\nplay 0,0,20\nwait 1000"));

    assert.deepStrictEqual(render(program), [
      "set_mrk   15",
      "upd_param 250",
      "play      0,0,20",
      "wait      50",
      "set_mrk   11",
      "upd_param 4",
      "wait      2696",
      "set_mrk   15",
      "upd_param 250",
      "play      0,0,20",
      "wait      50",
      "set_mrk   11",
      "upd_param 250",
      "set_mrk   3",
      "upd_param 150",
      "wait      550",
    ]);
  });

  test("keeps the amplifier on across short gaps", () => {
    const program = insertProtectionMarkers(parseProgram("play 0,0,20\nwait 600\nplay 0,0,20\nwait 1000"));

    assert.deepStrictEqual(render(program).slice(0, 5), [
      "set_mrk   15",
      "upd_param 250",
      "play      0,0,20",
      "wait      600",
      "play      0,0,20",
    ]);
  });

  test("opens the switch first when it has its own delay", () => {
    const program = insertProtectionMarkers(parseProgram("play 0,0,20\nwait 750"), { switchOpenPostDelay: 100 });

    assert.deepStrictEqual(render(program).slice(0, 4), ["set_mrk   7", "upd_param 100", "set_mrk   15", "upd_param 250"]);
  });

  test("fails when no wait can absorb the inserted delays", () => {
    assert.throws(() => insertProtectionMarkers(parseProgram("play 0,0,20\nwait 400")), {
      name: "TimingBudgetError",
      pass: "protection-markers",
      line: 2,
    });
    assert.throws(() => insertProtectionMarkers(parseProgram("play 0,0,20")), TimingBudgetError);
  });

  test("rejects delays below the shortest instruction", () => {
    assert.throws(() => insertProtectionMarkers(parseProgram("play 0,0,20\nwait 750"), { ampOnPostDelay: 3 }), TimingBudgetError);
  });
});

describe("convertMarkers", () => {
  test("reads four-digit operands as binary", () => {
    const program = convertMarkers(parseProgram("set_mrk 0101\nset_mrk 11\nset_mrk 3"));

    assert.deepStrictEqual(render(program), ["set_mrk   5", "set_mrk   11", "set_mrk   3"]);
  });

  test("rejects malformed binary codes", () => {
    assert.throws(() => convertMarkers(parseProgram("set_mrk 0121")), SequenceSyntaxError);
    assert.throws(() => convertMarkers(parseProgram("set_mrk 00110")), SequenceSyntaxError);
  });
});
