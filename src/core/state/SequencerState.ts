import { RegisterRangeError } from "../exceptions/EmulationErrors";
import { REGISTER_COUNT, REGISTER_LIMIT } from "../program/Registers";

const INT16_RANGE = 2 ** 16;
const INT32_RANGE = 2 ** 32;

/**
 * Register file, program counter and sample clock of one sequencer. Registers hold unsigned
 * 32-bit values; a write outside [0, 2^32) is an error rather than a wrap.
 */
export class SequencerState {
  static readonly REGISTER_COUNT = REGISTER_COUNT;

  private readonly registers: Float64Array;
  private programCounter: number;
  private time: number;
  private terminated: boolean;

  constructor() {
    this.registers = new Float64Array(SequencerState.REGISTER_COUNT);
    this.programCounter = 0;
    this.time = 0;
    this.terminated = false;
  }

  reset(): void {
    this.registers.fill(0);
    this.programCounter = 0;
    this.time = 0;
    this.terminated = false;
  }

  getRegister(index: number): number {
    this.validateRegisterIndex(index);
    return this.registers[index];
  }

  setRegister(index: number, value: number): void {
    this.validateRegisterIndex(index);
    if (!Number.isInteger(value) || value < 0 || value >= REGISTER_LIMIT) {
      throw new RegisterRangeError(index, value);
    }
    this.registers[index] = value;
  }

  /** Low 16 bits as a two's-complement value, the way gain and offset codes are read. */
  getRegisterInt16(index: number): number {
    const low = this.getRegister(index) % INT16_RANGE;
    return low >= INT16_RANGE / 2 ? low - INT16_RANGE : low;
  }

  getRegisterInt32(index: number): number {
    const value = this.getRegister(index);
    return value >= INT32_RANGE / 2 ? value - INT32_RANGE : value;
  }

  getRegisters(): number[] {
    return Array.from(this.registers);
  }

  getProgramCounter(): number {
    return this.programCounter;
  }

  setProgramCounter(value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Program counter out of bounds: ${value}`);
    }
    this.programCounter = value;
  }

  incrementProgramCounter(delta = 1): void {
    this.setProgramCounter(this.programCounter + delta);
  }

  getTime(): number {
    return this.time;
  }

  advanceTime(samples: number): void {
    this.time += samples;
  }

  terminate(): void {
    this.terminated = true;
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  private validateRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= SequencerState.REGISTER_COUNT) {
      throw new RangeError(`Register index out of bounds: ${index}`);
    }
  }
}
