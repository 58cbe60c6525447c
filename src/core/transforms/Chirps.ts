import { SequenceRangeError, StructuralError } from "../exceptions/SequenceErrors";
import { imm, instruction, label, ref, reg, type ChirpLine, type ProgramLine } from "../program/Instruction";
import { copyWaveformTable, withLines, type Program, type WaveformTable } from "../program/Program";
import { ReservedRegister } from "../program/Registers";
import { gain, truncatedFrequency } from "../units/UnitConverters";
import { withPassContext } from "./Pass";
import { PHASE_UPDATE_DELAY } from "./PhaseCycling";

export const CHIRPS_PASS = "long-chirps";

/** Ramp waveforms for chirp k live at this index plus k. */
export const CHIRP_WAVEFORM_BASE = 300;

export interface ChirpOptions {
  /** Normalized amplitude of the chirp plateau. */
  gain: number;
}

export const DEFAULT_CHIRP_OPTIONS: ChirpOptions = { gain: 0.3 };

/** Derived sweep parameters, in NCO units (4 per Hz). */
export interface ChirpPlan {
  points: number;
  rampPoints: number;
  start: number;
  endRampUp: number;
  endPlateau: number;
  endRampDown: number;
  frequencyStep: number;
  gainCode: number;
  offsetStep: number;
  ascending: boolean;
}

export function planChirp(chirp: ChirpLine, chirpGain: number): ChirpPlan {
  const { bandwidth, smoothing, centerFrequency, step, line } = chirp;
  const duration = chirp.duration - PHASE_UPDATE_DELAY;

  if (!Number.isInteger(step) || step <= 0) {
    throw new SequenceRangeError(`Chirp step must be a positive integer, got ${step}`, null, line);
  }
  if (duration <= 0 || duration % step !== 0) {
    throw new SequenceRangeError(
      `Chirp duration minus ${PHASE_UPDATE_DELAY} must be a positive multiple of ${step}, got ${duration}`,
      null,
      line,
    );
  }
  if (centerFrequency < 0) {
    throw new SequenceRangeError("Chirps centered on a negative frequency are not supported", null, line);
  }

  const points = duration / step;
  const rampPoints = (points * smoothing) / 100;
  if (!Number.isInteger(rampPoints) || rampPoints <= 0) {
    throw new SequenceRangeError(`${smoothing}% of ${points} points is not a whole, positive number of ramp steps`, null, line);
  }
  if (points < 2) {
    throw new SequenceRangeError("A chirp needs at least two frequency points", null, line);
  }

  const span = Math.trunc(bandwidth * 4);
  const start = truncatedFrequency(centerFrequency - bandwidth / 2);
  const end = truncatedFrequency(centerFrequency + bandwidth / 2);
  if (start < 0 || end < 0) {
    throw new SequenceRangeError("Chirp sweeps below 0 Hz", null, line);
  }

  const ascending = bandwidth > 0;
  const bump = ascending ? 1 : 0;
  const frequencyStep = Math.trunc((4 * Math.abs(bandwidth)) / (points - 1));
  if (!ascending && end - frequencyStep < 0) {
    throw new SequenceRangeError("Chirp sweep would take the frequency register below zero", null, line);
  }

  const gainCode = gain(chirpGain);
  return {
    points,
    rampPoints,
    start,
    endRampUp: Math.trunc(start + (span * smoothing) / 100) + bump,
    endPlateau: Math.trunc(end - (span * smoothing) / 100) + bump,
    endRampDown: end + bump,
    frequencyStep,
    gainCode,
    offsetStep: Math.trunc(gainCode / rampPoints),
    ascending,
  };
}

function rampWaveform(step: number, rampPoints: number): number[] {
  return Array.from({ length: step }, (_, i) => Math.round((i / step / rampPoints) * 1e8) / 1e8);
}

function lowerChirp(chirp: ChirpLine, plan: ChirpPlan, index: number): ProgramLine[] {
  const at = chirp.line;
  const freq = reg(ReservedRegister.chirpFrequency);
  const envelope = reg(ReservedRegister.chirpEnvelope);
  const waveform = imm(CHIRP_WAVEFORM_BASE + index);
  const sweep = plan.ascending ? "add" : "sub";
  const branch = plan.ascending ? "jlt" : "jge";
  const level = plan.gainCode;

  const advance = instruction(sweep, [freq, imm(plan.frequencyStep), freq], at);
  const setFrequency = instruction("set_freq", [freq], at);
  const playRamp = instruction("play", [waveform, waveform, imm(chirp.step)], at);
  const setOffsets = instruction("set_awg_offs", [envelope, envelope], at);

  return [
    instruction("set_awg_gain", [imm(level), imm(level)], at),
    instruction("move", [imm(0), envelope], at),
    instruction("move", [imm(plan.start), freq], at),
    label(`ramp_up${index}`, at),
    instruction("add", [envelope, imm(plan.offsetStep), envelope], at),
    setFrequency,
    playRamp,
    advance,
    setOffsets,
    instruction(branch, [freq, imm(plan.endRampUp), ref(`ramp_up${index}`)], at),
    label(`sweep${index}`, at),
    setFrequency,
    advance,
    instruction("upd_param", [imm(chirp.step)], at),
    instruction(branch, [freq, imm(plan.endPlateau), ref(`sweep${index}`)], at),
    instruction("set_awg_gain", [imm(-level), imm(-level)], at),
    label(`ramp_down${index}`, at),
    instruction("sub", [envelope, imm(plan.offsetStep), envelope], at),
    setFrequency,
    playRamp,
    advance,
    setOffsets,
    instruction(branch, [freq, imm(plan.endRampDown), ref(`ramp_down${index}`)], at),
    instruction("set_freq", [imm(truncatedFrequency(chirp.centerFrequency))], at),
    instruction("set_awg_gain", [imm(level), imm(level)], at),
    instruction("set_awg_offs", [imm(0), imm(0)], at),
    instruction("upd_param", [imm(PHASE_UPDATE_DELAY)], at),
  ];
}

/**
 * Expands each `play_lg_chirp` into an NCO sweep framed by linear amplitude ramps. The ramps
 * play a short triangle over a staircase of AWG offsets; the NCO ends on the center frequency.
 */
export function expandChirps(program: Program, options: Partial<ChirpOptions> = {}): Program {
  const settings: ChirpOptions = { ...DEFAULT_CHIRP_OPTIONS, ...options };

  return withPassContext(CHIRPS_PASS, () => {
    if (!program.lines.some((line) => line.kind === "chirp")) return program;

    const waveforms: WaveformTable = copyWaveformTable(program.waveforms);
    const usedIndices = new Set(Object.values(waveforms).map((entry) => entry.index));
    let count = 0;

    const lines = program.lines.flatMap((line): ProgramLine[] => {
      if (line.kind !== "chirp") return [line];

      const index = ++count;
      const plan = planChirp(line, settings.gain);
      const name = `chirpsm${index}`;
      if (name in waveforms || usedIndices.has(CHIRP_WAVEFORM_BASE + index)) {
        throw new StructuralError(
          `Chirp ${index} needs waveform '${name}' at index ${CHIRP_WAVEFORM_BASE + index}, which is taken`,
          null,
          line.line,
        );
      }
      waveforms[name] = { index: CHIRP_WAVEFORM_BASE + index, data: rampWaveform(line.step, plan.rampPoints) };
      usedIndices.add(CHIRP_WAVEFORM_BASE + index);
      return lowerChirp(line, plan, index);
    });

    return { ...withLines(program, lines), waveforms };
  });
}
