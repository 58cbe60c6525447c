import {
  SequenceRangeError,
  StructuralError,
  TimingBudgetError,
  UnsupportedConstructError,
} from "../exceptions/SequenceErrors";
import {
  countPulses,
  imm,
  immediateAt,
  instruction,
  isAcquire,
  isInstruction,
  isPlainWait,
  isPulse,
  label,
  ref,
  reg,
  type InstructionLine,
  type Operand,
  type ProgramLine,
} from "../program/Instruction";
import { labelNames, withLines, type Program } from "../program/Program";
import {
  MAX_PHASE_CYCLE_REGISTERS,
  REGISTER_LIMIT,
  ReservedRegister,
  phaseCycleRegister,
} from "../program/Registers";
import { withPassContext } from "./Pass";
import { MIN_INSERTED_DELAY } from "./ProtectionMarkers";

export const PHASE_CYCLING_PASS = "phase-cycling";

/** Integer phase steps per degree used by the cycling loops (1e9/360, truncated). */
export const CYCLE_STEPS_PER_DEGREE = 2777777;
export const CYCLE_FULL_TURN = 360 * CYCLE_STEPS_PER_DEGREE;
/** Each inserted `set_ph` is committed by an `upd_param` of this length. */
export const PHASE_UPDATE_DELAY = 8;

export interface PhaseCycle {
  /** Phase increment in degrees per pulse; 0 keeps that pulse at phase 0. */
  steps: number[];
  /** Coherence-pathway coefficient per pulse. */
  pathway: number[];
}

function validateCycle(program: Program, cycle: PhaseCycle): void {
  const pulses = countPulses(program.lines);
  if (cycle.steps.length !== pulses || cycle.pathway.length !== pulses) {
    throw new StructuralError(
      `Phase cycling needs one step and one pathway coefficient per pulse (${pulses} pulses, ` +
        `${cycle.steps.length} steps, ${cycle.pathway.length} coefficients)`,
    );
  }
  if (labelNames(program.lines).some((name) => name.includes("loop_ph"))) {
    throw new StructuralError("Labels containing 'loop_ph' are reserved for phase cycling");
  }
  cycle.steps.forEach((step) => {
    if (!Number.isInteger(step) || step < 0) {
      throw new UnsupportedConstructError(`Phase steps must be non-negative whole degrees, got ${step}`);
    }
  });
  cycle.pathway.forEach((coefficient) => {
    if (!Number.isInteger(coefficient)) {
      throw new UnsupportedConstructError(`Pathway coefficients must be integers, got ${coefficient}`);
    }
  });
  if (cycle.steps.filter((step) => step > 0).length > MAX_PHASE_CYCLE_REGISTERS) {
    throw new UnsupportedConstructError(`At most ${MAX_PHASE_CYCLE_REGISTERS} pulses can carry a phase step`);
  }
}

/**
 * Cycles each pulse with a nonzero step through its own phase loop (first pulse outermost)
 * and sets the receiver phase to the pathway-weighted sum of the pulse phases, modulo a turn.
 */
export function insertPhaseCycling(program: Program, cycle: PhaseCycle): Program {
  return withPassContext(PHASE_CYCLING_PASS, () => {
    validateCycle(program, cycle);

    const cycled = cycle.steps.flatMap((step, pulse) => (step > 0 ? [{ step, coefficient: cycle.pathway[pulse] }] : []));
    const body = insertPhaseSets(program.lines, cycle.steps, cycled.length > 0);
    if (cycled.length === 0) {
      return withLines(program, body);
    }

    const openings: ProgramLine[] = [];
    const closings: ProgramLine[] = [];
    cycled.forEach(({ step }, position) => {
      const register = phaseCycleRegister(position + 1);
      const loopLabel = `loop_ph${position + 1}`;
      openings.push(instruction("move", [imm(0), reg(register)]), label(loopLabel));
      closings.unshift(
        instruction("add", [reg(register), imm(step * CYCLE_STEPS_PER_DEGREE), reg(register)]),
        instruction("nop"),
        instruction("jlt", [reg(register), imm(CYCLE_FULL_TURN), ref(loopLabel)]),
      );
    });

    return withLines(program, [...openings, ...receiverPhase(cycled), ...body, ...closings]);
  });
}

function insertPhaseSets(lines: readonly ProgramLine[], steps: number[], cycling: boolean): ProgramLine[] {
  const output: ProgramLine[] = [];
  let pulse = 0;
  let position = 0;

  for (const line of lines) {
    let phase: Operand | null = null;
    if (isPulse(line)) {
      phase = steps[pulse] > 0 ? reg(phaseCycleRegister(++position)) : imm(0);
      pulse++;
    } else if (isAcquire(line)) {
      phase = cycling ? reg(ReservedRegister.receiverPhase) : imm(0);
    }

    if (phase !== null) {
      borrowDelay(output, PHASE_UPDATE_DELAY, line.line);
      output.push(instruction("set_ph", [phase], line.line), instruction("upd_param", [imm(PHASE_UPDATE_DELAY)], line.line));
    }
    output.push(line);
  }

  return output;
}

/**
 * Shortens the nearest earlier plain wait or `upd_param` long enough to give up `delay`
 * and still meet the minimum instruction length.
 */
export function borrowDelay(lines: ProgramLine[], delay: number, line: number | null = null): void {
  for (let i = lines.length - 1; i >= 0; i--) {
    const candidate = lines[i];
    if (!isPlainWait(candidate) && !isInstruction(candidate, "upd_param")) continue;

    const value = immediateAt(candidate, 0);
    if (value !== null && value > delay + MIN_INSERTED_DELAY) {
      const shortened: InstructionLine = { ...candidate, operands: [imm(value - delay)] };
      lines[i] = shortened;
      return;
    }
  }
  throw new TimingBudgetError(`No earlier wait or upd_param can give up ${delay}`, null, line);
}

/** Largest value a phase-cycle register holds inside its loop. */
export function maxCycledPhase(step: number): number {
  const increment = step * CYCLE_STEPS_PER_DEGREE;
  return Math.floor((CYCLE_FULL_TURN - 1) / increment) * increment;
}

/**
 * `R40 = bias + sum(c_k * R4k)`, then reduced below a full turn. The bias is a whole number of
 * turns large enough that the value never drops below one turn before the first reduction.
 */
function receiverPhase(cycled: { step: number; coefficient: number }[]): ProgramLine[] {
  const coefficients = cycled.map((entry) => entry.coefficient);
  const reach = (sign: number): number =>
    cycled.reduce(
      (sum, { step, coefficient }) =>
        Math.sign(coefficient) === sign ? sum + Math.abs(coefficient) * maxCycledPhase(step) : sum,
      0,
    );

  const bias = (1 + Math.ceil(reach(-1) / CYCLE_FULL_TURN)) * CYCLE_FULL_TURN;
  if (bias + reach(1) >= REGISTER_LIMIT) {
    throw new SequenceRangeError(`Pathway coefficients [${coefficients.join(", ")}] overflow the receiver phase register`);
  }

  const receiver = reg(ReservedRegister.receiverPhase);
  const lines: ProgramLine[] = [instruction("move", [imm(bias), receiver]), instruction("nop")];

  coefficients.forEach((coefficient, position) => {
    const mnemonic = coefficient > 0 ? "add" : "sub";
    for (let i = 0; i < Math.abs(coefficient); i++) {
      lines.push(instruction(mnemonic, [receiver, reg(phaseCycleRegister(position + 1)), receiver]), instruction("nop"));
    }
  });

  lines.push(
    label("loop_mod360"),
    instruction("sub", [receiver, imm(CYCLE_FULL_TURN), receiver]),
    instruction("nop"),
    instruction("jge", [receiver, imm(CYCLE_FULL_TURN), ref("loop_mod360")]),
  );
  return lines;
}
