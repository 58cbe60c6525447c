export class SequenceError extends Error {
  pass: string | null;
  line: number | null;

  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message);
    this.pass = pass;
    this.line = line;
    this.name = "SequenceError";
  }

  withContext(pass: string, line: number | null = null): this {
    if (this.pass === null) {
      this.pass = pass;
    }
    if (this.line === null && line !== null) {
      this.line = line;
    }
    return this;
  }

  /** Message prefixed with whatever location is known, e.g. `[phase-cycling] line 4: ...`. */
  describe(): string {
    const where = [this.pass ? `[${this.pass}]` : null, this.line !== null ? `line ${this.line}` : null]
      .filter((part): part is string => part !== null)
      .join(" ");
    return where ? `${where}: ${this.message}` : this.message;
  }
}

/** A value lies outside the legal domain of a converter, register or marker. */
export class SequenceRangeError extends SequenceError {
  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message, pass, line);
    this.name = "SequenceRangeError";
  }
}

export class UnsupportedConstructError extends SequenceError {
  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message, pass, line);
    this.name = "UnsupportedConstructError";
  }
}

export class ReservedRegisterError extends SequenceError {
  readonly register: number;

  constructor(register: number, role: string, pass: string | null = null, line: number | null = null) {
    super(`R${register} is reserved (${role})`, pass, line);
    this.register = register;
    this.name = "ReservedRegisterError";
  }
}

export class TimingBudgetError extends SequenceError {
  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message, pass, line);
    this.name = "TimingBudgetError";
  }
}

export class StructuralError extends SequenceError {
  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message, pass, line);
    this.name = "StructuralError";
  }
}

export class SequenceSyntaxError extends StructuralError {
  constructor(message: string, pass: string | null = null, line: number | null = null) {
    super(message, pass, line);
    this.name = "SequenceSyntaxError";
  }
}

export class DuplicateLabelError extends StructuralError {
  readonly label: string;

  constructor(label: string, line: number | null = null) {
    super(`Duplicate label '${label}'`, null, line);
    this.label = label;
    this.name = "DuplicateLabelError";
  }
}

export class UndefinedLabelError extends StructuralError {
  readonly label: string;

  constructor(label: string, line: number | null = null) {
    super(`Undefined label '${label}'`, null, line);
    this.label = label;
    this.name = "UndefinedLabelError";
  }
}

export function normalizeSequenceError(error: unknown, pass: string, line: number | null = null): Error {
  if (error instanceof SequenceError) {
    return error.withContext(pass, line);
  }

  if (error instanceof RangeError) {
    return new SequenceRangeError(error.message, pass, line);
  }

  if (error instanceof Error) {
    return error;
  }

  return new SequenceError("Unknown sequence error", pass, line);
}
