import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { after, before, describe, test } from "node:test";

import { runCli, type CliIo } from "../src/cli";

function capture(): { io: CliIo; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { io: { stdout: (text) => out.push(text), stderr: (text) => err.push(text) }, out, err };
}

const compiledLines = [
  "move      3,R0",
  "loop_avg:",
  "reset_ph",
  "upd_param 26",
  "acquire   0,0,4",
  "set_mrk   15",
  "upd_param 250",
  "play      0,1,20",
  "wait      50",
  "set_mrk   11",
  "upd_param 250",
  "set_mrk   3",
  "upd_param 150",
  "wait      1550",
  "loop      R0,@loop_avg",
  "stop",
];

describe("cli", () => {
  let dir = "";
  let sourceFile = "";

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
    sourceFile = path.join(dir, "source.json");
    fs.writeFileSync(
      sourceFile,
      JSON.stringify({
        program: "acquire 0,0,4\nplay 0,1,20\nwait 2000",
        waveforms: {
          pulse_i: { index: 0, data: new Array<number>(20).fill(0.5) },
          pulse_q: { index: 1, data: new Array<number>(20).fill(0) },
        },
        acquisitions: { echo: { index: 0, num_bins: 1 } },
      }),
    );
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("compile prints the compiled bundle", async () => {
    const { io, out, err } = capture();
    const code = await runCli(["compile", sourceFile, "--averages", "3"], io);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(err, []);
    const compiled: unknown = JSON.parse(out.join(""));
    assert.ok(typeof compiled === "object" && compiled !== null && "program" in compiled);
    assert.strictEqual(compiled.program, compiledLines.join("\n"));
  });

  test("compile writes to a file and emulate runs it", async () => {
    const outputFile = path.join(dir, "compiled.json");
    const compile = capture();
    const compileCode = await runCli(["compile", sourceFile, "--averages", "3", "-o", outputFile], compile.io);

    assert.strictEqual(compileCode, 0);
    assert.deepStrictEqual(compile.out, [`Wrote 16 lines to ${outputFile}, longest amplifier-on window 320\n`]);

    const emulate = capture();
    const emulateCode = await runCli(["emulate", outputFile, "--max-samples", "10"], emulate.io);

    assert.strictEqual(emulateCode, 0);
    assert.deepStrictEqual(emulate.err, ["[emulator] output trace capped at 10 samples\n"]);
    assert.deepStrictEqual(JSON.parse(emulate.out.join("")), {
      status: "halted",
      time: 6900,
      steps: 41,
      samples: 10,
      truncated: true,
      markers: [
        [0, 0],
        [30, 15],
        [350, 11],
        [600, 3],
        [2330, 15],
        [2650, 11],
        [2900, 3],
        [4630, 15],
        [4950, 11],
        [5200, 3],
        [6900, 3],
      ],
      acquisitions: {
        echo: { index: 0, scopeSamples: 10, bins: { path0: [30], path1: [0], counts: [3] } },
      },
    });
  });

  test("reports sequence errors with their pass", async () => {
    const file = path.join(dir, "unprotectable.json");
    fs.writeFileSync(file, JSON.stringify({ program: "play 0,0,20", waveforms: { pulse: { index: 0, data: [0.5] } } }));
    const { io, err } = capture();

    assert.strictEqual(await runCli(["compile", file], io), 1);
    assert.deepStrictEqual(err, [
      "TimingBudgetError [protection-markers]: 450 of inserted delays after the last pulse need a following wait\n",
    ]);
  });

  test("requires --steps and --pathway together", async () => {
    const { io, err } = capture();

    assert.strictEqual(await runCli(["compile", sourceFile, "--steps", "90"], io), 1);
    assert.deepStrictEqual(err, ["--steps and --pathway go together.\n"]);
  });

  test("returns commander's exit code for bad arguments", async () => {
    const { io } = capture();
    assert.strictEqual(await runCli(["compile", sourceFile, "--averages", "lots"], io), 1);
  });

  test("prints help without failing", async () => {
    const { io, out } = capture();

    assert.strictEqual(await runCli(["--help"], io), 0);
    assert.match(out.join(""), /Usage: seqforge/);
  });
});
