import { SequenceSyntaxError } from "../exceptions/SequenceErrors";
import { readResource } from "../loader/Resources";
import { immediateAt, type InstructionLine, type OperandKind, type ProgramLine } from "./Instruction";

export interface InstructionSpec {
  mnemonic: string;
  /** Accepted kinds per operand position. */
  operands: OperandKind[][];
  /** Operand index holding the duration, for instructions that take time. */
  duration?: number;
  waveforms?: number[];
  acquisition?: number;
  weights?: number[];
  /** Commits queued marker/phase/gain state when executed. */
  parameterUpdate: boolean;
  summary: string;
}

export type InstructionSet = Map<string, InstructionSpec>;

const OPERAND_KINDS: readonly OperandKind[] = ["register", "immediate", "label"];

let cachedInstructionSet: InstructionSet | null = null;

export function getInstructionSet(): InstructionSet {
  if (cachedInstructionSet === null) {
    cachedInstructionSet = parseInstructionSet(readResource("InstructionSet.json"));
  }
  return cachedInstructionSet;
}

export function parseInstructionSet(contents: string): InstructionSet {
  const parsed: unknown = JSON.parse(contents);
  if (!isRecord(parsed) || !Array.isArray(parsed.instructions)) {
    throw new Error("Instruction set file must contain an 'instructions' array");
  }

  const table: InstructionSet = new Map();
  for (const entry of parsed.instructions) {
    const spec = toInstructionSpec(entry);
    if (table.has(spec.mnemonic)) {
      throw new Error(`Instruction '${spec.mnemonic}' is defined twice`);
    }
    table.set(spec.mnemonic, spec);
  }
  return table;
}

function toInstructionSpec(entry: unknown): InstructionSpec {
  if (!isRecord(entry) || typeof entry.mnemonic !== "string" || !Array.isArray(entry.operands)) {
    throw new Error(`Malformed instruction entry: ${JSON.stringify(entry)}`);
  }
  const mnemonic = entry.mnemonic;

  const operands = entry.operands.map((form: unknown) => {
    if (typeof form !== "string") {
      throw new Error(`Operand form of '${mnemonic}' must be a string`);
    }
    return form.split("|").map((kind) => {
      const known = OPERAND_KINDS.find((candidate) => candidate === kind);
      if (!known) {
        throw new Error(`Unknown operand kind '${kind}' for '${mnemonic}'`);
      }
      return known;
    });
  });

  return {
    mnemonic,
    operands,
    duration: optionalIndex(entry.duration, mnemonic),
    waveforms: optionalIndexList(entry.waveforms, mnemonic),
    acquisition: optionalIndex(entry.acquisition, mnemonic),
    weights: optionalIndexList(entry.weights, mnemonic),
    parameterUpdate: entry.parameterUpdate === true,
    summary: typeof entry.summary === "string" ? entry.summary : "",
  };
}

function optionalIndex(value: unknown, mnemonic: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`Operand index for '${mnemonic}' must be a non-negative integer`);
  }
  return value;
}

function optionalIndexList(value: unknown, mnemonic: string): number[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`Operand index list for '${mnemonic}' must be an array`);
  }
  return value.map((item: unknown) => {
    const index = optionalIndex(item, mnemonic);
    if (index === undefined) {
      throw new Error(`Operand index list for '${mnemonic}' contains an empty entry`);
    }
    return index;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks operand count and kinds against the table. Mnemonics missing from the table are
 * accepted as-is; the emulator runs them as no-ops.
 */
export function validateInstruction(line: InstructionLine, instructionSet: InstructionSet = getInstructionSet()): void {
  const spec = instructionSet.get(line.mnemonic);
  if (!spec) return;

  if (line.operands.length !== spec.operands.length) {
    throw new SequenceSyntaxError(
      `'${line.mnemonic}' expects ${spec.operands.length} operand(s), got ${line.operands.length}`,
      null,
      line.line,
    );
  }

  line.operands.forEach((operand, index) => {
    if (!spec.operands[index].includes(operand.kind)) {
      throw new SequenceSyntaxError(
        `Operand ${index + 1} of '${line.mnemonic}' must be ${spec.operands[index].join(" or ")}, got ${operand.kind}`,
        null,
        line.line,
      );
    }
  });
}

/**
 * Time taken by a line, in samples. Register-valued durations are unknown at compile time and
 * count as 0; a long chirp reports its full duration.
 */
export function durationOf(line: ProgramLine, instructionSet: InstructionSet = getInstructionSet()): number {
  if (line.kind === "chirp") return line.duration;
  if (line.kind !== "instruction") return 0;

  const spec = instructionSet.get(line.mnemonic);
  if (spec?.duration === undefined || line.mnemonic === "wait_sync") return 0;
  return immediateAt(line, spec.duration) ?? 0;
}
