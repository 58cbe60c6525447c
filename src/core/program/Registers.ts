import { ReservedRegisterError } from "../exceptions/SequenceErrors";

export const REGISTER_COUNT = 64;
export const REGISTER_LIMIT = 2 ** 32;

export type ReservedRole =
  | "averages"
  | "loopScratch"
  | "waveformLoop"
  | "receiverPhase"
  | "phaseCycle"
  | "shots"
  | "chirpFrequency"
  | "chirpEnvelope"
  | "dummyShots";

/** Registers the compiler claims for the loops and accumulators it generates. */
export const ReservedRegister = {
  averages: 0,
  loopScratch: 1,
  waveformLoop: 2,
  receiverPhase: 40,
  shots: 51,
  chirpFrequency: 61,
  chirpEnvelope: 62,
  dummyShots: 63,
} as const;

export const MAX_PHASE_CYCLE_REGISTERS = 9;

export function phaseCycleRegister(position: number): number {
  if (!Number.isInteger(position) || position < 1 || position > MAX_PHASE_CYCLE_REGISTERS) {
    throw new RangeError(`Phase-cycle register position ${position} outside 1..${MAX_PHASE_CYCLE_REGISTERS}`);
  }
  return ReservedRegister.receiverPhase + position;
}

export function reservedRoleOf(index: number): ReservedRole | null {
  if (index > ReservedRegister.receiverPhase && index <= ReservedRegister.receiverPhase + MAX_PHASE_CYCLE_REGISTERS) {
    return "phaseCycle";
  }
  for (const [role, register] of Object.entries(ReservedRegister)) {
    if (register === index && isReservedRole(role)) {
      return role;
    }
  }
  return null;
}

function isReservedRole(value: string): value is ReservedRole {
  return value in ReservedRegister || value === "phaseCycle";
}

export function assertUserRegister(index: number, line: number | null = null): void {
  const role = reservedRoleOf(index);
  if (role !== null) {
    throw new ReservedRegisterError(index, role, null, line);
  }
}

export function registerName(index: number): string {
  return `R${index}`;
}
