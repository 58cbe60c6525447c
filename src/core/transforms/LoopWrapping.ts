import { SequenceRangeError } from "../exceptions/SequenceErrors";
import { imm, instruction, isAcquire, label, ref, reg, type ProgramLine } from "../program/Instruction";
import { durationOf } from "../program/InstructionSet";
import { withLines, type Program } from "../program/Program";
import { REGISTER_LIMIT, ReservedRegister } from "../program/Registers";
import { withPassContext } from "./Pass";

export const GRID_PASS = "grid-alignment";
export const DUMMY_SHOTS_PASS = "dummy-shots";
export const LOOP_WRAP_PASS = "loop-wrapping";

/** Repetitions must start on this boundary so the NCO and scope stay in step. */
export const GRID_PERIOD = 20;
export const MIN_GRID_PADDING = 8;

export interface CountedLoop {
  count: number;
  register: number;
  label: string;
}

export const shotLoop = (count: number): CountedLoop => ({ count, register: ReservedRegister.shots, label: "loop_shot" });

export const averageLoop = (count: number): CountedLoop => ({
  count,
  register: ReservedRegister.averages,
  label: "loop_avg",
});

export const dummyLoop = (count: number): CountedLoop => ({
  count,
  register: ReservedRegister.dummyShots,
  label: "loop_dummy",
});

export function gridDuration(lines: readonly ProgramLine[]): number {
  return lines.reduce((total, line) => total + durationOf(line), 0);
}

export function gridPadding(duration: number): number {
  const padding = (GRID_PERIOD - (duration % GRID_PERIOD)) % GRID_PERIOD;
  return padding < MIN_GRID_PADDING ? padding + GRID_PERIOD : padding;
}

/** Prepends a phase reset and the padding that brings one repetition onto the grid. */
export function alignToGrid(program: Program): Program {
  return withPassContext(GRID_PASS, () => {
    const padding = gridPadding(gridDuration(program.lines));
    return withLines(program, [instruction("reset_ph"), instruction("upd_param", [imm(padding)]), ...program.lines]);
  });
}

export function requireRepetitions(count: number, what: string): void {
  if (!Number.isInteger(count) || count < 0 || count >= REGISTER_LIMIT) {
    throw new SequenceRangeError(`${what} must be a non-negative integer below 2^32, got ${count}`);
  }
}

/** `move n,Rx` / `label:` / body / `loop Rx,@label`; a count of 0 or 1 leaves the body alone. */
export function wrapInLoop(program: Program, loop: CountedLoop): Program {
  return withPassContext(LOOP_WRAP_PASS, () => {
    requireRepetitions(loop.count, loop.label);
    if (loop.count <= 1) return program;

    return withLines(program, [
      instruction("move", [imm(loop.count), reg(loop.register)]),
      label(loop.label),
      ...program.lines,
      instruction("loop", [reg(loop.register), ref(loop.label)]),
    ]);
  });
}

/**
 * Copy of the program that plays everything but captures nothing: each acquisition becomes
 * a wait of the same length. User labels get a `_dummy` suffix so both copies can coexist.
 */
export function buildDummyShots(program: Program, count: number): Program {
  return withPassContext(DUMMY_SHOTS_PASS, () => {
    requireRepetitions(count, "dummy shot count");

    const lines = program.lines.map((line): ProgramLine => {
      if (isAcquire(line)) {
        return instruction("wait", [imm(durationOf(line))], line.line);
      }
      if (line.kind === "label") {
        return label(`${line.name}_dummy`, line.line);
      }
      if (line.kind === "instruction" && line.operands.some((operand) => operand.kind === "label")) {
        return {
          ...line,
          operands: line.operands.map((operand) => (operand.kind === "label" ? ref(`${operand.name}_dummy`) : operand)),
        };
      }
      return line;
    });

    return wrapInLoop(withLines(program, lines), dummyLoop(count));
  });
}
