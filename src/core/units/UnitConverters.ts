import { SequenceRangeError } from "../exceptions/SequenceErrors";

export type PhaseUnit = "deg" | "rad";

/** NCO phase steps per degree (1e9 steps per turn). */
export const PHASE_STEPS_PER_DEGREE = 2777777.777778;
export const PHASE_STEPS_PER_TURN = 1_000_000_000;

export const GAIN_POSITIVE_SCALE = 32767;
export const GAIN_NEGATIVE_SCALE = 32768;

export const MAX_FREQUENCY_HZ = 500e6;
export const FREQUENCY_STEPS_PER_HZ = 4;

/** Round to nearest, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function requireFinite(value: number, what: string): void {
  if (!Number.isFinite(value)) {
    throw new SequenceRangeError(`${what} must be a finite number, got ${value}`);
  }
}

/**
 * Converts a phase to NCO phase steps in [0, 1e9). Values wrap modulo one turn, so
 * `phase(-90)` and `phase(270)` are both 750000000.
 */
export function phase(value: number, unit: PhaseUnit = "deg"): number {
  requireFinite(value, "phase");
  const degrees = unit === "rad" ? (value * 180) / Math.PI : value;
  const wrapped = ((degrees % 360) + 360) % 360;
  return roundHalfEven(wrapped * PHASE_STEPS_PER_DEGREE) % PHASE_STEPS_PER_TURN;
}

/**
 * Converts a normalized amplitude in [-1, 1] to a signed 16-bit gain code. The scale is
 * asymmetric so that -1 maps to -32768 and +1 to +32767.
 */
export function gain(normalized: number): number {
  requireFinite(normalized, "gain");
  if (normalized < -1 || normalized > 1) {
    throw new SequenceRangeError(`gain ${normalized} out of range [-1, 1]`);
  }
  const scale = normalized >= 0 ? GAIN_POSITIVE_SCALE : GAIN_NEGATIVE_SCALE;
  return roundHalfEven(normalized * scale);
}

/** Inverse of {@link gain}: the normalized amplitude a 16-bit code stands for. */
export function gainFromCode(code: number): number {
  return code >= 0 ? code / GAIN_POSITIVE_SCALE : code / GAIN_NEGATIVE_SCALE;
}

function requireFrequency(hz: number): void {
  requireFinite(hz, "frequency");
  if (hz < -MAX_FREQUENCY_HZ || hz > MAX_FREQUENCY_HZ) {
    throw new SequenceRangeError(`frequency ${hz} Hz out of range [-500e6, 500e6]`);
  }
}

export function frequency(hz: number): number {
  requireFrequency(hz);
  return roundHalfEven(hz * FREQUENCY_STEPS_PER_HZ);
}

/** NCO frequency steps truncated toward zero, as chirp sweep end points are derived. */
export function truncatedFrequency(hz: number): number {
  requireFrequency(hz);
  return Math.trunc(hz * FREQUENCY_STEPS_PER_HZ);
}
