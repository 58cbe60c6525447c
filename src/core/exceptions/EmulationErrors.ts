export class EmulationError extends Error {
  pc: number | null;

  constructor(message: string, pc: number | null = null) {
    super(message);
    this.pc = pc;
    this.name = "EmulationError";
  }

  withPc(pc: number): this {
    if (this.pc === null) {
      this.pc = pc;
    }
    return this;
  }
}

export class RegisterRangeError extends EmulationError {
  readonly register: number;
  readonly value: number;

  constructor(register: number, value: number, pc: number | null = null) {
    super(`R${register} cannot hold ${value} (unsigned 32-bit)`, pc);
    this.register = register;
    this.value = value;
    this.name = "RegisterRangeError";
  }
}

export class MarkerRangeError extends EmulationError {
  readonly value: number;

  constructor(value: number, pc: number | null = null) {
    super(`Marker value ${value} outside [0, 15]`, pc);
    this.value = value;
    this.name = "MarkerRangeError";
  }
}

export class ExecutionLimitError extends EmulationError {
  readonly steps: number;

  constructor(steps: number, pc: number | null = null) {
    super(`Execution stopped after ${steps} steps without reaching stop`, pc);
    this.steps = steps;
    this.name = "ExecutionLimitError";
  }
}

export function normalizeEmulationError(error: unknown, pc: number): Error {
  if (error instanceof EmulationError) {
    return error.withPc(pc);
  }

  if (error instanceof Error) {
    return error;
  }

  return new EmulationError("Unknown emulation error", pc);
}
