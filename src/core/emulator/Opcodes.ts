import { EmulationError, MarkerRangeError } from "../exceptions/EmulationErrors";
import type { SequencerState } from "../state/SequencerState";
import type { ExecutableInstruction, ExecutableOperand } from "./ExecutableProgram";
import type { SignalPath } from "./SignalPath";

export interface ExecutionContext {
  state: SequencerState;
  signal: SignalPath;
}

export type OpcodeHandler = (context: ExecutionContext, instruction: ExecutableInstruction) => void;

const MARKER_MAX = 15;

function operandAt(instruction: ExecutableInstruction, index: number): ExecutableOperand {
  const operand = instruction.operands[index];
  if (!operand) {
    throw new EmulationError(`'${instruction.mnemonic}' is missing operand ${index + 1}`);
  }
  return operand;
}

function registerAt(instruction: ExecutableInstruction, index: number): number {
  const operand = operandAt(instruction, index);
  if (operand.kind !== "register") {
    throw new EmulationError(`Operand ${index + 1} of '${instruction.mnemonic}' must be a register`);
  }
  return operand.index;
}

/** Unsigned value of an operand. */
function read(state: SequencerState, instruction: ExecutableInstruction, index: number): number {
  const operand = operandAt(instruction, index);
  return operand.kind === "register" ? state.getRegister(operand.index) : operand.value;
}

/** Operand read as a signed 16-bit gain or offset code. */
function readCode(state: SequencerState, instruction: ExecutableInstruction, index: number): number {
  const operand = operandAt(instruction, index);
  return operand.kind === "register" ? state.getRegisterInt16(operand.index) : operand.value;
}

function readSigned(state: SequencerState, instruction: ExecutableInstruction, index: number): number {
  const operand = operandAt(instruction, index);
  return operand.kind === "register" ? state.getRegisterInt32(operand.index) : operand.value;
}

function arithmetic(operation: (a: number, b: number) => number): OpcodeHandler {
  return ({ state }, instruction) => {
    const a = state.getRegister(registerAt(instruction, 0));
    const b = read(state, instruction, 1);
    state.setRegister(registerAt(instruction, 2), operation(a, b));
  };
}

function branch(condition: (a: number, b: number) => boolean): OpcodeHandler {
  return ({ state }, instruction) => {
    const a = state.getRegister(registerAt(instruction, 0));
    if (condition(a, read(state, instruction, 1))) {
      state.setProgramCounter(read(state, instruction, 2));
    }
  };
}

/** Commits queued parameters, then lets time run for the instruction's duration. */
function timed(durationIndex: number, before: OpcodeHandler | null = null): OpcodeHandler {
  return (context, instruction) => {
    const { state, signal } = context;
    signal.commit(state.getTime());
    before?.(context, instruction);
    elapse(context, read(state, instruction, durationIndex));
  };
}

function elapse({ state, signal }: ExecutionContext, duration: number): void {
  signal.advance(state.getTime(), duration);
  state.advanceTime(duration);
}

const bitwise = (operation: (a: number, b: number) => number) => arithmetic((a, b) => operation(a, b) >>> 0);

/**
 * Handlers run after the program counter has moved past the instruction, so a branch only
 * has to overwrite it.
 */
export const OPCODES: Record<string, OpcodeHandler> = {
  nop: () => undefined,
  stop: ({ state, signal }) => {
    signal.recordStop(state.getTime());
    state.terminate();
  },

  move: ({ state }, instruction) => state.setRegister(registerAt(instruction, 1), read(state, instruction, 0)),
  not: ({ state }, instruction) => state.setRegister(registerAt(instruction, 1), ~read(state, instruction, 0) >>> 0),
  add: arithmetic((a, b) => a + b),
  sub: arithmetic((a, b) => a - b),
  and: bitwise((a, b) => a & b),
  or: bitwise((a, b) => a | b),
  xor: bitwise((a, b) => a ^ b),
  asl: arithmetic((a, b) => a * 2 ** b),
  asr: arithmetic((a, b) => Math.floor(a / 2 ** b)),

  jmp: ({ state }, instruction) => state.setProgramCounter(read(state, instruction, 0)),
  jge: branch((a, b) => a >= b),
  jlt: branch((a, b) => a < b),
  loop: ({ state }, instruction) => {
    const counter = registerAt(instruction, 0);
    const remaining = state.getRegister(counter) - 1;
    state.setRegister(counter, remaining);
    if (remaining > 0) {
      state.setProgramCounter(read(state, instruction, 1));
    }
  },

  set_mrk: ({ state, signal }, instruction) => {
    const value = read(state, instruction, 0);
    if (!Number.isInteger(value) || value < 0 || value > MARKER_MAX) {
      throw new MarkerRangeError(value);
    }
    signal.queueMarker(value);
  },
  set_freq: ({ state, signal }, instruction) => signal.queueFrequency(readSigned(state, instruction, 0)),
  reset_ph: ({ signal }) => signal.queuePhaseReset(),
  set_ph: ({ state, signal }, instruction) => signal.queuePhase(read(state, instruction, 0)),
  set_ph_delta: ({ state, signal }, instruction) => signal.queuePhaseDelta(read(state, instruction, 0)),
  set_awg_gain: ({ state, signal }, instruction) =>
    signal.queueGain(readCode(state, instruction, 0), readCode(state, instruction, 1)),
  set_awg_offs: ({ state, signal }, instruction) =>
    signal.queueOffset(readCode(state, instruction, 0), readCode(state, instruction, 1)),

  upd_param: timed(0),
  play: timed(2, ({ state, signal }, instruction) =>
    signal.play(read(state, instruction, 0), read(state, instruction, 1), state.getTime()),
  ),
  acquire: timed(2, ({ state, signal }, instruction) =>
    signal.acquire(read(state, instruction, 0), read(state, instruction, 1), null),
  ),
  acquire_weighed: timed(4, ({ state, signal }, instruction) =>
    signal.acquire(read(state, instruction, 0), read(state, instruction, 1), [
      read(state, instruction, 2),
      read(state, instruction, 3),
    ]),
  ),
  wait: (context, instruction) => elapse(context, read(context.state, instruction, 0)),
  wait_sync: (context, instruction) => elapse(context, read(context.state, instruction, 0)),
};
