import { DuplicateLabelError, StructuralError, UndefinedLabelError } from "../exceptions/SequenceErrors";
import type { InstructionLine, ProgramLine } from "./Instruction";
import { getInstructionSet, type InstructionSet } from "./InstructionSet";
import { parseLines } from "./Parser";

export const MAX_WAVEFORM_INDEX = 1023;

export interface WaveformEntry {
  index: number;
  data: number[];
}

export interface AcquisitionEntry {
  index: number;
  num_bins: number;
}

export type WaveformTable = Record<string, WaveformEntry>;
export type AcquisitionTable = Record<string, AcquisitionEntry>;

export interface ProgramTables {
  waveforms: WaveformTable;
  weights: WaveformTable;
  acquisitions: AcquisitionTable;
}

/** Program text plus the tables it references, as exchanged with loaders and backends. */
export interface SequenceBundle extends ProgramTables {
  program: string;
}

/** Immutable program value; every pass returns a new one. */
export interface Program extends ProgramTables {
  readonly lines: readonly ProgramLine[];
}

export function copyWaveformTable(table: WaveformTable): WaveformTable {
  return Object.fromEntries(Object.entries(table).map(([name, entry]) => [name, { index: entry.index, data: [...entry.data] }]));
}

export function copyAcquisitionTable(table: AcquisitionTable): AcquisitionTable {
  return Object.fromEntries(Object.entries(table).map(([name, entry]) => [name, { ...entry }]));
}

export function createProgram(lines: readonly ProgramLine[], tables: Partial<ProgramTables> = {}): Program {
  return {
    lines: [...lines],
    waveforms: copyWaveformTable(tables.waveforms ?? {}),
    weights: copyWaveformTable(tables.weights ?? {}),
    acquisitions: copyAcquisitionTable(tables.acquisitions ?? {}),
  };
}

export function parseProgram(source: string, tables: Partial<ProgramTables> = {}): Program {
  return createProgram(parseLines(source), tables);
}

export function withLines(program: Program, lines: readonly ProgramLine[]): Program {
  return { ...program, lines: [...lines] };
}

export function insertLines(lines: readonly ProgramLine[], index: number, ...inserted: ProgramLine[]): ProgramLine[] {
  if (index < 0 || index > lines.length) {
    throw new RangeError(`Insert position ${index} outside 0..${lines.length}`);
  }
  return [...lines.slice(0, index), ...inserted, ...lines.slice(index)];
}

export function replaceLine(lines: readonly ProgramLine[], index: number, ...replacement: ProgramLine[]): ProgramLine[] {
  if (index < 0 || index >= lines.length) {
    throw new RangeError(`Line position ${index} outside 0..${lines.length - 1}`);
  }
  return [...lines.slice(0, index), ...replacement, ...lines.slice(index + 1)];
}

export function removeLine(lines: readonly ProgramLine[], index: number): ProgramLine[] {
  return replaceLine(lines, index);
}

/**
 * Maps each label to the index of the next executable instruction, counting only
 * `instruction` lines.
 */
export function buildLabelTable(lines: readonly ProgramLine[]): Map<string, number> {
  const labels = new Map<string, number>();
  let instructionIndex = 0;

  for (const line of lines) {
    if (line.kind === "label") {
      if (labels.has(line.name)) {
        throw new DuplicateLabelError(line.name, line.line);
      }
      labels.set(line.name, instructionIndex);
    } else if (line.kind === "instruction") {
      instructionIndex++;
    }
  }

  return labels;
}

export function labelNames(lines: readonly ProgramLine[]): string[] {
  return lines.flatMap((line) => (line.kind === "label" ? [line.name] : []));
}

function indexOperands(line: InstructionLine, positions: number[] | undefined): number[] {
  return (positions ?? []).flatMap((position) => {
    const operand = line.operands[position];
    return operand?.kind === "immediate" ? [operand.value] : [];
  });
}

function indexSet(table: Record<string, { index: number }>): Set<number> {
  return new Set(Object.values(table).map((entry) => entry.index));
}

/**
 * Checks label uniqueness and resolution, and that literal waveform, weight and acquisition
 * indices exist in the program's tables.
 */
export function validateProgram(program: Program, instructionSet: InstructionSet = getInstructionSet()): void {
  const labels = buildLabelTable(program.lines);
  const waveformIndices = indexSet(program.waveforms);
  const weightIndices = indexSet(program.weights);
  const acquisitionIndices = indexSet(program.acquisitions);

  for (const line of program.lines) {
    if (line.kind !== "instruction") continue;

    for (const operand of line.operands) {
      if (operand.kind === "label" && !labels.has(operand.name)) {
        throw new UndefinedLabelError(operand.name, line.line);
      }
    }

    const spec = instructionSet.get(line.mnemonic);
    if (!spec) continue;

    for (const index of indexOperands(line, spec.waveforms)) {
      if (!waveformIndices.has(index)) {
        throw new StructuralError(`Waveform index ${index} is not in the waveform table`, null, line.line);
      }
    }
    for (const index of indexOperands(line, spec.weights)) {
      if (!weightIndices.has(index)) {
        throw new StructuralError(`Weight index ${index} is not in the weight table`, null, line.line);
      }
    }
    const acquisition = indexOperands(line, spec.acquisition === undefined ? undefined : [spec.acquisition]);
    for (const index of acquisition) {
      if (!acquisitionIndices.has(index)) {
        throw new StructuralError(`Acquisition index ${index} is not in the acquisition table`, null, line.line);
      }
    }
  }
}

export function findWaveformByIndex(table: WaveformTable, index: number): [string, WaveformEntry] | null {
  return Object.entries(table).find(([, entry]) => entry.index === index) ?? null;
}
