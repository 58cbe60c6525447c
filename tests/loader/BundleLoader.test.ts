import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, test } from "node:test";

import { BundleValidationError, loadBundle, parseBundle, validateBundle } from "../../src/core/loader/BundleLoader";

function issuesOf(body: () => unknown): BundleValidationError["issues"] {
  try {
    body();
  } catch (error) {
    if (error instanceof BundleValidationError) return error.issues;
    throw error;
  }
  assert.fail("expected a BundleValidationError");
}

describe("BundleLoader", () => {
  test("fills in missing tables", () => {
    assert.deepStrictEqual(parseBundle('{"program": "wait 4"}'), {
      program: "wait 4",
      waveforms: {},
      weights: {},
      acquisitions: {},
    });
  });

  test("reports schema violations by JSON pointer", () => {
    assert.deepStrictEqual(issuesOf(() => validateBundle({ waveforms: {} })), [
      { path: "/", message: "must have required property 'program'" },
    ]);
    assert.deepStrictEqual(
      issuesOf(() => validateBundle({ program: "", waveforms: { pulse: { index: 0, data: [0.5, 2] } } })),
      [{ path: "/waveforms/pulse/data/1", message: "must be <= 1" }],
    );
    assert.deepStrictEqual(issuesOf(() => validateBundle({ program: "", extra: true })), [
      { path: "/", message: "must NOT have additional properties" },
    ]);
  });

  test("rejects two entries sharing an index", () => {
    const bundle = {
      program: "",
      waveforms: { first: { index: 3, data: [0] }, second: { index: 3, data: [0] } },
    };

    assert.deepStrictEqual(issuesOf(() => validateBundle(bundle)), [
      { path: "/waveforms/second/index", message: "duplicates index 3 of 'first'" },
    ]);
  });

  test("names the source in the message", () => {
    assert.throws(() => parseBundle("{", "broken.json"), (error: unknown) => {
      assert.ok(error instanceof BundleValidationError);
      assert.ok(error.message.startsWith("Invalid sequence bundle in broken.json:\n  /: not valid JSON ("));
      return true;
    });
  });

  test("loads a bundle from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bundle-"));
    const file = path.join(dir, "sequence.json");
    fs.writeFileSync(file, JSON.stringify({ program: "play 0,0,4", waveforms: { pulse: { index: 0, data: [1, 1, 1, 1] } } }));

    try {
      const bundle = loadBundle(file);
      assert.strictEqual(bundle.program, "play 0,0,4");
      assert.deepStrictEqual(bundle.waveforms.pulse, { index: 0, data: [1, 1, 1, 1] });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
