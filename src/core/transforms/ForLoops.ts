import { SequenceRangeError, StructuralError, UnsupportedConstructError } from "../exceptions/SequenceErrors";
import { imm, instruction, label, ref, reg, type ForLine, type ProgramLine } from "../program/Instruction";
import { withLines, type Program } from "../program/Program";
import { REGISTER_LIMIT } from "../program/Registers";
import { withPassContext } from "./Pass";

export const FOR_LOOPS_PASS = "for-loops";

interface OpenLoop {
  header: ForLine;
  label: string;
}

function checkBounds(header: ForLine): void {
  const { start, step, stop, line } = header;
  if (start < 0 || stop < 0) {
    throw new UnsupportedConstructError("Negative loop bounds are not supported", null, line);
  }
  if (step <= 0) {
    throw new UnsupportedConstructError("Loop step must be positive; the direction comes from start and stop", null, line);
  }
  if (start >= REGISTER_LIMIT || stop + 1 >= REGISTER_LIMIT) {
    throw new SequenceRangeError("Loop bounds do not fit in a register", null, line);
  }
  if (start > stop) {
    const last = start - Math.floor((start - stop) / step) * step;
    if (last - step < 0) {
      throw new SequenceRangeError(
        `Counting down from ${start} by ${step} to ${stop} takes R${header.register} below zero`,
        null,
        line,
      );
    }
  }
}

function closeLoop(open: OpenLoop): ProgramLine[] {
  const { register, start, step, stop, line } = open.header;
  if (start === stop) return [];

  const counter = reg(register);
  if (start < stop) {
    return [
      instruction("add", [counter, imm(step), counter], line),
      instruction("nop", [], line),
      instruction("jlt", [counter, imm(stop + 1), ref(open.label)], line),
    ];
  }
  return [
    instruction("sub", [counter, imm(step), counter], line),
    instruction("nop", [], line),
    instruction("jge", [counter, imm(stop), ref(open.label)], line),
  ];
}

/**
 * Lowers `for Rn in start, step, stop` ... `end` blocks to counted loops. The counter runs
 * from start towards stop inclusive; nested loops close innermost first.
 */
export function lowerForLoops(program: Program): Program {
  return withPassContext(FOR_LOOPS_PASS, () => {
    const output: ProgramLine[] = [];
    const open: OpenLoop[] = [];
    let counter = 0;

    for (const line of program.lines) {
      if (line.kind === "for") {
        checkBounds(line);
        const loopLabel = `loop_for${++counter}`;
        open.push({ header: line, label: loopLabel });
        output.push(instruction("move", [imm(line.start), reg(line.register)], line.line), label(loopLabel, line.line));
        continue;
      }

      if (line.kind === "end") {
        const loop = open.pop();
        if (!loop) {
          throw new StructuralError("'end' without a matching 'for'", null, line.line);
        }
        output.push(...closeLoop(loop));
        continue;
      }

      output.push(line);
    }

    const unclosed = open.pop();
    if (unclosed) {
      throw new StructuralError("'for' without a matching 'end'", null, unclosed.header.line);
    }

    return withLines(program, output);
  });
}
