export type Operand =
  | { kind: "register"; index: number }
  | { kind: "immediate"; value: number; raw: string }
  | { kind: "label"; name: string };

export type OperandKind = Operand["kind"];

export interface InstructionLine {
  kind: "instruction";
  mnemonic: string;
  operands: readonly Operand[];
  /** 1-based source line, or the line of the construct that generated it. */
  line: number | null;
}

export interface LabelLine {
  kind: "label";
  name: string;
  line: number | null;
}

/** `for Rn in start, step, stop` header; lowered into a counted loop. */
export interface ForLine {
  kind: "for";
  register: number;
  start: number;
  step: number;
  stop: number;
  line: number | null;
}

export interface EndLine {
  kind: "end";
  line: number | null;
}

/** Long linear frequency sweep, expanded into ramp-up / sweep / ramp-down microcode. */
export interface ChirpLine {
  kind: "chirp";
  /** Sweep bandwidth in Hz; the sign gives the sweep direction. */
  bandwidth: number;
  /** Share of the duration, in percent, spent on each amplitude ramp. */
  smoothing: number;
  centerFrequency: number;
  step: number;
  /** Total duration including the trailing parameter update. */
  duration: number;
  line: number | null;
}

export type ProgramLine = InstructionLine | LabelLine | ForLine | EndLine | ChirpLine;

export const reg = (index: number): Operand => ({ kind: "register", index });

export const imm = (value: number): Operand => ({ kind: "immediate", value, raw: String(value) });

export const ref = (name: string): Operand => ({ kind: "label", name });

export function instruction(mnemonic: string, operands: Operand[] = [], line: number | null = null): InstructionLine {
  return { kind: "instruction", mnemonic, operands, line };
}

export function label(name: string, line: number | null = null): LabelLine {
  return { kind: "label", name, line };
}

export function isInstruction(line: ProgramLine, mnemonic?: string): line is InstructionLine {
  return line.kind === "instruction" && (mnemonic === undefined || line.mnemonic === mnemonic);
}

export function immediateAt(line: InstructionLine, index: number): number | null {
  const operand = line.operands[index];
  return operand?.kind === "immediate" ? operand.value : null;
}

/** A `wait` with a literal duration; register waits and `wait_sync` do not count. */
export function isPlainWait(line: ProgramLine): line is InstructionLine {
  return isInstruction(line, "wait") && immediateAt(line, 0) !== null;
}

/** Lines that drive the output: `play` and the long-chirp pseudo-instruction. */
export function isPulse(line: ProgramLine): boolean {
  return isInstruction(line, "play") || line.kind === "chirp";
}

export function isAcquire(line: ProgramLine): boolean {
  return isInstruction(line, "acquire") || isInstruction(line, "acquire_weighed");
}

export function countPulses(lines: readonly ProgramLine[]): number {
  return lines.filter(isPulse).length;
}
