import { ExecutionLimitError, normalizeEmulationError } from "../exceptions/EmulationErrors";
import { consoleSink, type LogSink } from "../logging/LogSink";
import type { SequenceBundle } from "../program/Program";
import { SequencerState } from "../state/SequencerState";
import { loadExecutable, type ExecutableProgram } from "./ExecutableProgram";
import { OPCODES, type ExecutionContext } from "./Opcodes";
import { SignalPath, type AcquisitionRecord, type OutputSample, type Timeline } from "./SignalPath";

export type EmulatorStatus = "ready" | "running" | "halted" | "errored";

export interface EmulatorOptions {
  /** Instructions executed by `run()` before it gives up. */
  maxSteps: number;
  /** Samples kept in the output traces and each scope buffer. */
  maxTraceSamples: number;
  scopeLength: number;
  integrationLength: number;
  /** Receives every output sample, including those past the trace cap. */
  onSample: ((sample: OutputSample) => void) | null;
  logger: LogSink;
}

export const DEFAULT_EMULATOR_OPTIONS: EmulatorOptions = {
  maxSteps: 50_000_000,
  maxTraceSamples: 10_000_000,
  scopeLength: 16384,
  integrationLength: 1024,
  onSample: null,
  logger: consoleSink("emulator"),
};

export interface EmulationResult {
  status: EmulatorStatus;
  time: number;
  steps: number;
  path0: number[];
  path1: number[];
  truncated: boolean;
  markers: Timeline;
  phases: Timeline;
  frequencies: Timeline;
  acquisitions: Record<string, AcquisitionRecord>;
  registers: number[];
}

/** Runs compiled sequencer programs against a simulated register file and signal path. */
export class Emulator {
  private readonly options: EmulatorOptions;
  private readonly program: ExecutableProgram;
  private readonly state: SequencerState;
  private readonly signal: SignalPath;
  private status: EmulatorStatus = "ready";
  private steps = 0;

  constructor(bundle: SequenceBundle, options: Partial<EmulatorOptions> = {}) {
    this.options = { ...DEFAULT_EMULATOR_OPTIONS, ...options };
    this.program = loadExecutable(bundle);
    this.state = new SequencerState();
    this.signal = new SignalPath(bundle, this.options);
  }

  getStatus(): EmulatorStatus {
    return this.status;
  }

  getState(): SequencerState {
    return this.state;
  }

  getProgram(): ExecutableProgram {
    return this.program;
  }

  /** Executes one instruction. Returns false once the sequencer has halted. */
  step(): boolean {
    if (this.status === "halted" || this.status === "errored") return false;
    this.status = "running";

    const pc = this.state.getProgramCounter();
    const instruction = this.program.instructions[pc];
    if (!instruction) {
      // Running past the last instruction behaves like `stop`.
      this.signal.recordStop(this.state.getTime());
      this.state.terminate();
      this.status = "halted";
      return false;
    }

    try {
      this.state.incrementProgramCounter();
      const context: ExecutionContext = { state: this.state, signal: this.signal };
      OPCODES[instruction.mnemonic]?.(context, instruction);
      this.steps++;
    } catch (error) {
      this.status = "errored";
      throw normalizeEmulationError(error, pc);
    }

    if (this.state.isTerminated()) {
      this.status = "halted";
      return false;
    }
    return true;
  }

  run(): EmulationResult {
    while (this.step()) {
      if (this.steps >= this.options.maxSteps) {
        this.status = "errored";
        throw new ExecutionLimitError(this.steps, this.state.getProgramCounter());
      }
    }
    return this.getResult();
  }

  getResult(): EmulationResult {
    return {
      status: this.status,
      time: this.state.getTime(),
      steps: this.steps,
      path0: this.signal.path0,
      path1: this.signal.path1,
      truncated: this.signal.isTruncated(),
      markers: this.signal.markers,
      phases: this.signal.phases,
      frequencies: this.signal.frequencies,
      acquisitions: this.signal.acquisitions,
      registers: this.state.getRegisters(),
    };
  }
}

export function createEmulator(bundle: SequenceBundle, options: Partial<EmulatorOptions> = {}): Emulator {
  return new Emulator(bundle, options);
}
