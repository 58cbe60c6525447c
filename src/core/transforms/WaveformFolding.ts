import {
  StructuralError,
  TimingBudgetError,
  UnsupportedConstructError,
} from "../exceptions/SequenceErrors";
import { imm, immediateAt, instruction, isInstruction, label, ref, reg, type ProgramLine } from "../program/Instruction";
import {
  MAX_WAVEFORM_INDEX,
  copyWaveformTable,
  withLines,
  type Program,
  type WaveformTable,
} from "../program/Program";
import { ReservedRegister } from "../program/Registers";
import { withPassContext } from "./Pass";
import { MIN_INSERTED_DELAY } from "./ProtectionMarkers";

export const WAVEFORM_FOLDING_PASS = "waveform-folding";

/** Waveforms longer than this are folded into a loop. */
export const FOLD_THRESHOLD = 1000;
/** Shorter loop bodies risk sequencer underruns. */
export const MIN_FOLD_STEP = 24;

export interface FoldingOptions {
  step: number;
}

export const DEFAULT_FOLDING_OPTIONS: FoldingOptions = { step: 28 };

interface FoldedWaveform {
  name: string;
  length: number;
  iterations: number;
  complement: { name: string; index: number; length: number } | null;
}

function isConstant(data: readonly number[]): boolean {
  return data.every((sample) => sample === data[0]);
}

function foldTable(table: WaveformTable, step: number): Map<number, FoldedWaveform> {
  const folded = new Map<number, FoldedWaveform>();
  const usedIndices = new Set(Object.values(table).map((entry) => entry.index));
  let complements = 0;

  for (const [name, entry] of Object.entries(table)) {
    const length = entry.data.length;
    if (length <= FOLD_THRESHOLD) continue;

    if (step < MIN_FOLD_STEP || step >= length / 3) {
      throw new UnsupportedConstructError(`Fold step ${step} must be at least ${MIN_FOLD_STEP} and below a third of '${name}' (${length})`);
    }
    if (!isConstant(entry.data)) {
      throw new UnsupportedConstructError(`Waveform '${name}' is longer than ${FOLD_THRESHOLD} and not constant`);
    }

    let iterations = Math.floor(length / step);
    let remainder = length % step;
    let complement: FoldedWaveform["complement"] = null;

    if (remainder > 0) {
      if (remainder < MIN_INSERTED_DELAY) {
        remainder += step;
        iterations -= 1;
      }
      const complementName = `${name}_compl`;
      const complementIndex = MAX_WAVEFORM_INDEX - complements++;
      if (complementName in table || usedIndices.has(complementIndex)) {
        throw new StructuralError(
          `Waveform '${name}' needs '${complementName}' at index ${complementIndex}; free that name and index or make its length a multiple of ${step}`,
        );
      }
      usedIndices.add(complementIndex);
      complement = { name: complementName, index: complementIndex, length: remainder };
    }

    folded.set(entry.index, { name, length, iterations, complement });
  }

  return folded;
}

/**
 * Replaces constant waveforms longer than {@link FOLD_THRESHOLD} by one `step`-long chunk
 * played in a loop, plus a complement waveform for the remainder.
 */
export function foldLongWaveforms(program: Program, options: Partial<FoldingOptions> = {}): Program {
  const { step } = { ...DEFAULT_FOLDING_OPTIONS, ...options };

  return withPassContext(WAVEFORM_FOLDING_PASS, () => {
    const folded = foldTable(program.waveforms, step);
    if (folded.size === 0) return program;

    const waveforms = copyWaveformTable(program.waveforms);
    for (const { name, complement } of folded.values()) {
      const data = waveforms[name].data;
      if (complement) {
        waveforms[complement.name] = { index: complement.index, data: data.slice(0, complement.length) };
      }
      waveforms[name] = { index: waveforms[name].index, data: data.slice(0, step) };
    }

    let loops = 0;
    const lines = program.lines.flatMap((line): ProgramLine[] => {
      if (!isInstruction(line, "play")) return [line];

      const first = immediateAt(line, 0);
      const second = immediateAt(line, 1);
      const path0 = first === null ? undefined : folded.get(first);
      const path1 = second === null ? undefined : folded.get(second);
      if (!path0 && !path1) return [line];
      if (first === null || second === null || !path0 || !path1 || path0.length !== path1.length) {
        throw new StructuralError(`Waveforms ${first} and ${second} must both be folded and equally long`, null, line.line);
      }

      const duration = immediateAt(line, 2);
      if (duration === null) {
        throw new UnsupportedConstructError("A folded play needs a literal duration", null, line.line);
      }
      const extra = duration - path0.length;
      if (extra < 0) {
        throw new TimingBudgetError(`play lasts ${duration}, shorter than its ${path0.length}-sample waveform`, null, line.line);
      }

      const scratch = reg(ReservedRegister.waveformLoop);
      const loopLabel = `loop_play${++loops}`;
      const expanded: ProgramLine[] = [
        instruction("move", [imm(path0.iterations), scratch], line.line),
        label(loopLabel, line.line),
        instruction("play", [imm(first), imm(second), imm(step)], line.line),
        instruction("loop", [scratch, ref(loopLabel)], line.line),
      ];

      if (path0.complement && path1.complement) {
        expanded.push(
          instruction(
            "play",
            [imm(path0.complement.index), imm(path1.complement.index), imm(path0.complement.length + extra)],
            line.line,
          ),
        );
      } else if (extra > 0) {
        if (extra < MIN_INSERTED_DELAY) {
          throw new TimingBudgetError(`play outlasts its waveform by ${extra}, below the shortest wait`, null, line.line);
        }
        expanded.push(instruction("wait", [imm(extra)], line.line));
      }

      return expanded;
    });

    return { ...withLines(program, lines), waveforms };
  });
}
