import { SequenceSyntaxError } from "../exceptions/SequenceErrors";
import { imm, isInstruction, type ProgramLine } from "../program/Instruction";
import { withLines, type Program } from "../program/Program";
import { withPassContext } from "./Pass";

export const MARKER_SHORTHAND_PASS = "marker-shorthand";

/**
 * Rewrites `set_mrk 0100` (four binary digits, written as-is) to `set_mrk 4`. Operands of
 * one or two characters are already decimal codes.
 */
export function convertMarkers(program: Program): Program {
  return withPassContext(MARKER_SHORTHAND_PASS, () => withLines(program, program.lines.map(convertLine)));
}

function convertLine(line: ProgramLine): ProgramLine {
  if (!isInstruction(line, "set_mrk")) return line;

  const operand = line.operands[0];
  if (operand?.kind !== "immediate" || operand.raw.length <= 2) return line;

  if (!/^[01]{4}$/.test(operand.raw)) {
    throw new SequenceSyntaxError(`Binary marker code must be 4 digits of 0/1, got '${operand.raw}'`, null, line.line);
  }
  return { ...line, operands: [imm(Number.parseInt(operand.raw, 2))] };
}
