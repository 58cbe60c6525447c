import fs from "node:fs";

import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";

import bundleSchema from "../../../resources/sequence-bundle.schema.json";
import type { SequenceBundle, WaveformTable } from "../program/Program";

export interface BundleIssue {
  path: string;
  message: string;
}

export class BundleValidationError extends Error {
  readonly issues: BundleIssue[];

  constructor(issues: BundleIssue[], source: string | null = null) {
    const where = source ? ` in ${source}` : "";
    super(`Invalid sequence bundle${where}:\n${issues.map((issue) => `  ${issue.path}: ${issue.message}`).join("\n")}`);
    this.issues = issues;
    this.name = "BundleValidationError";
  }
}

/** Bundle as written on disk: only the program is mandatory. */
type BundleDocument = Pick<SequenceBundle, "program"> & Partial<SequenceBundle>;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDocument: ValidateFunction<BundleDocument> = ajv.compile<BundleDocument>(bundleSchema);

function toIssue(error: ErrorObject): BundleIssue {
  return { path: error.instancePath || "/", message: error.message ?? "is invalid" };
}

function duplicateIndices(table: Record<string, { index: number }>, pointer: string): BundleIssue[] {
  const seen = new Map<number, string>();
  const issues: BundleIssue[] = [];
  for (const [name, entry] of Object.entries(table)) {
    const previous = seen.get(entry.index);
    if (previous !== undefined) {
      issues.push({ path: `${pointer}/${name}/index`, message: `duplicates index ${entry.index} of '${previous}'` });
    } else {
      seen.set(entry.index, name);
    }
  }
  return issues;
}

/** Checks a parsed JSON value against the bundle schema and fills in empty tables. */
export function validateBundle(value: unknown, source: string | null = null): SequenceBundle {
  if (!validateDocument(value)) {
    throw new BundleValidationError((validateDocument.errors ?? []).map(toIssue), source);
  }

  const waveforms: WaveformTable = value.waveforms ?? {};
  const weights: WaveformTable = value.weights ?? {};
  const acquisitions = value.acquisitions ?? {};
  const issues = [
    ...duplicateIndices(waveforms, "/waveforms"),
    ...duplicateIndices(weights, "/weights"),
    ...duplicateIndices(acquisitions, "/acquisitions"),
  ];
  if (issues.length > 0) {
    throw new BundleValidationError(issues, source);
  }

  return { program: value.program, waveforms, weights, acquisitions };
}

export function parseBundle(contents: string, source: string | null = null): SequenceBundle {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BundleValidationError([{ path: "/", message: `not valid JSON (${message})` }], source);
  }
  return validateBundle(parsed, source);
}

export function loadBundle(filePath: string): SequenceBundle {
  return parseBundle(fs.readFileSync(filePath, "utf8"), filePath);
}
