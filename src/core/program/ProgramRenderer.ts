import type { Operand, ProgramLine } from "./Instruction";
import { CHIRP_MNEMONIC } from "./Parser";

const MNEMONIC_COLUMN = 10;

export function renderOperand(operand: Operand): string {
  switch (operand.kind) {
    case "register":
      return `R${operand.index}`;
    case "immediate":
      return String(operand.value);
    case "label":
      return `@${operand.name}`;
  }
}

/** `move      64,R0`: mnemonic padded to a fixed column, operands joined by commas. */
export function formatInstruction(mnemonic: string, operands: readonly string[] = []): string {
  if (operands.length === 0) return mnemonic;
  return `${mnemonic.padEnd(MNEMONIC_COLUMN - 1)} ${operands.join(",")}`;
}

export function renderLine(line: ProgramLine): string {
  switch (line.kind) {
    case "instruction":
      return formatInstruction(line.mnemonic, line.operands.map(renderOperand));
    case "label":
      return `${line.name}:`;
    case "for":
      return `for R${line.register} in ${line.start}, ${line.step}, ${line.stop}`;
    case "end":
      return "end";
    case "chirp":
      return (
        `${CHIRP_MNEMONIC}(bw=${line.bandwidth}, sm=${line.smoothing}, delta_f=${line.centerFrequency}, ` +
        `step=${line.step}), ${line.duration}`
      );
  }
}

export function renderLines(lines: readonly ProgramLine[]): string[] {
  return lines.map(renderLine);
}

export function renderProgram(program: { lines: readonly ProgramLine[] }): string {
  return renderLines(program.lines).join("\n");
}
