import { StructuralError, UndefinedLabelError } from "../exceptions/SequenceErrors";
import type { Operand } from "../program/Instruction";
import { getInstructionSet, type InstructionSet } from "../program/InstructionSet";
import { parseLines } from "../program/Parser";
import { buildLabelTable, createProgram, validateProgram, type SequenceBundle } from "../program/Program";

/** Operand after label resolution: jump targets become instruction indices. */
export type ExecutableOperand = Exclude<Operand, { kind: "label" }>;

export interface ExecutableInstruction {
  mnemonic: string;
  operands: readonly ExecutableOperand[];
  line: number | null;
}

export interface ExecutableProgram {
  instructions: ExecutableInstruction[];
  labels: Map<string, number>;
}

/**
 * Parses assembly text and resolves every label to the index of the instruction after it.
 * Compiler-only constructs (`for`, `end`, long chirps) must have been lowered already.
 */
export function loadExecutable(
  bundle: SequenceBundle,
  instructionSet: InstructionSet = getInstructionSet(),
): ExecutableProgram {
  const program = createProgram(parseLines(bundle.program, instructionSet), bundle);
  validateProgram(program, instructionSet);
  const labels = buildLabelTable(program.lines);

  const instructions: ExecutableInstruction[] = [];
  for (const line of program.lines) {
    if (line.kind === "label") continue;
    if (line.kind !== "instruction") {
      throw new StructuralError(`'${line.kind}' blocks must be compiled before they can run`, null, line.line);
    }

    instructions.push({
      mnemonic: line.mnemonic,
      line: line.line,
      operands: line.operands.map((operand): ExecutableOperand => {
        if (operand.kind !== "label") return operand;
        const target = labels.get(operand.name);
        if (target === undefined) {
          throw new UndefinedLabelError(operand.name, line.line);
        }
        return { kind: "immediate", value: target, raw: `@${operand.name}` };
      }),
    });
  }

  return { instructions, labels };
}
