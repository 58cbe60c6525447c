import {
  SequenceRangeError,
  SequenceSyntaxError,
  UnsupportedConstructError,
  normalizeSequenceError,
} from "../exceptions/SequenceErrors";
import { stripComment } from "../program/Lexer";
import { formatInstruction } from "../program/ProgramRenderer";
import { ReservedRegister, assertUserRegister } from "../program/Registers";
import { frequency, gain, phase, type PhaseUnit } from "../units/UnitConverters";

export const MACRO_ASSEMBLER_PASS = "macro-assembler";

/** Multiplications by factors up to this size unroll into additions instead of a loop. */
export const MAX_UNROLLED_ADDITIONS = 4;

export interface AssembledLine {
  /** Source line the text was lowered from. */
  line: number;
  text: string;
}

type Converter = (args: string[]) => number;

const CONVERTERS: Record<string, Converter> = {
  to_ph: (args) => {
    expectArgumentCount("to_ph", args, 1, 2);
    return phase(parseNumber(args[0]), parsePhaseUnit(args[1]));
  },
  to_gain: (args) => {
    expectArgumentCount("to_gain", args, 1, 1);
    return gain(parseNumber(args[0]));
  },
  to_freq: (args) => {
    expectArgumentCount("to_freq", args, 1, 1);
    return frequency(parseNumber(args[0]));
  },
};

const REGISTER = /^R\d+$/;
const INTEGER = /^[+-]?\d+$/;
const ASSIGNMENT = /^(\w+)\s*=\s*([+-]?\w+)$/;
const ARITHMETIC = /^(\w+)\s*=\s*(R\d+|[+-]?\d+)\s*([+\-*/])\s*(R\d+|[+-]?\d+)$/;
const MARKER_SHORTHAND = /^set_mrk\(\s*t1t2t3t4\s*=\s*([^)]*?)\s*\)$/;
const HELPER_CALL = /^(set_ph|set_ph_delta|set_awg_gain|set_awg_offs|set_freq)\((.*)\)$/;

/**
 * Lowers the simplified syntax (assignments, arithmetic, unit conversion calls, marker and
 * parameter helpers) into assembly lines. Lines it does not recognise pass through trimmed.
 */
export class MacroAssembler {
  private multiplyLoops = 0;

  lower(source: string): AssembledLine[] {
    this.multiplyLoops = 0;
    const output: AssembledLine[] = [];

    source.split(/\r?\n/).forEach((raw, index) => {
      const line = index + 1;
      try {
        for (const text of this.lowerLine(stripComment(raw).trim())) {
          output.push({ line, text });
        }
      } catch (error) {
        throw normalizeSequenceError(error, MACRO_ASSEMBLER_PASS, line);
      }
    });

    return output;
  }

  assemble(source: string): string {
    return this.lower(source)
      .map((line) => line.text)
      .join("\n");
  }

  private lowerLine(text: string): string[] {
    if (text === "") return [];

    checkReservedRegisters(text);
    const line = substituteConverterCalls(text);

    const assignment = ASSIGNMENT.exec(line);
    if (assignment) {
      return [lowerAssignment(assignment[1], assignment[2])];
    }

    const arithmetic = ARITHMETIC.exec(line);
    if (arithmetic) {
      return this.lowerArithmetic(arithmetic[1], arithmetic[2], arithmetic[3], arithmetic[4]);
    }

    if (/^\w+\s*=[^=]/.test(line)) {
      throw new SequenceSyntaxError(`Unsupported expression '${line}'`);
    }

    const marker = MARKER_SHORTHAND.exec(line);
    if (marker) {
      return [formatInstruction("set_mrk", [String(markerShorthand(marker[1]))])];
    }

    const helper = HELPER_CALL.exec(line);
    if (helper) {
      return [lowerHelper(helper[1], splitArguments(helper[2]))];
    }

    return [line];
  }

  private lowerArithmetic(dest: string, left: string, operator: string, right: string): string[] {
    requireRegister(dest, "destination");
    const leftIsRegister = REGISTER.test(left);
    const rightIsRegister = REGISTER.test(right);

    switch (operator) {
      case "+":
        if (!leftIsRegister && !rightIsRegister) {
          throw new UnsupportedConstructError(`Adding two immediates (${left} + ${right}); use the constant`);
        }
        return leftIsRegister
          ? [formatInstruction("add", [left, right, dest])]
          : [formatInstruction("add", [right, left, dest])];
      case "-":
        if (!leftIsRegister && !rightIsRegister) {
          throw new UnsupportedConstructError(`Subtracting two immediates (${left} - ${right}); use the constant`);
        }
        if (!leftIsRegister) {
          throw new UnsupportedConstructError(`An immediate minus a register (${left} - ${right}) has no direct form`);
        }
        return [formatInstruction("sub", [left, right, dest])];
      case "*":
        return this.lowerMultiplication(dest, left, right, leftIsRegister, rightIsRegister);
      default:
        throw new UnsupportedConstructError("Division is not supported");
    }
  }

  private lowerMultiplication(
    dest: string,
    left: string,
    right: string,
    leftIsRegister: boolean,
    rightIsRegister: boolean,
  ): string[] {
    if (!leftIsRegister && !rightIsRegister) {
      throw new UnsupportedConstructError(`Multiplying two immediates (${left} * ${right}); use the constant`);
    }
    if (leftIsRegister && rightIsRegister) {
      throw new UnsupportedConstructError(`Multiplying two registers (${left} * ${right}) is not supported`);
    }

    const source = leftIsRegister ? left : right;
    const factor = Number(leftIsRegister ? right : left);
    if (source === dest) {
      throw new UnsupportedConstructError(`Multiplying ${dest} into itself is not supported`);
    }
    if (factor < 0) {
      throw new UnsupportedConstructError(`Negative multiplier ${factor} is not supported`);
    }
    if (factor === 0) {
      return [formatInstruction("move", ["0", dest])];
    }

    const additions = factor - 1;
    const lines = [formatInstruction("move", [source, dest])];
    if (additions <= MAX_UNROLLED_ADDITIONS) {
      for (let i = 0; i < additions; i++) {
        lines.push(formatInstruction("add", [dest, source, dest]));
      }
      return lines;
    }

    const loopLabel = `loop_mult${this.multiplyLoops++}`;
    const counter = `R${ReservedRegister.loopScratch}`;
    lines.push(
      formatInstruction("move", [String(additions), counter]),
      `${loopLabel}:`,
      formatInstruction("add", [dest, source, dest]),
      "nop",
      formatInstruction("loop", [counter, `@${loopLabel}`]),
    );
    return lines;
  }
}

function checkReservedRegisters(text: string): void {
  for (const match of text.matchAll(/\bR(\d+)\b/g)) {
    assertUserRegister(Number(match[1]));
  }
}

function requireRegister(value: string, role: string): void {
  if (!REGISTER.test(value)) {
    throw new SequenceSyntaxError(`The ${role} must be a register, got '${value}'`);
  }
}

function lowerAssignment(dest: string, source: string): string {
  requireRegister(dest, "destination");
  if (REGISTER.test(source)) {
    return formatInstruction("move", [source, dest]);
  }
  if (!INTEGER.test(source)) {
    throw new SequenceSyntaxError(`Cannot assign '${source}' to ${dest}`);
  }
  if (Number(source) < 0) {
    throw new SequenceRangeError(`Registers hold unsigned values, cannot assign ${source}`);
  }
  return formatInstruction("move", [String(Number(source)), dest]);
}

/** `t1t2t3t4=1010` names the outputs in module order; the instruction wants them reversed. */
function markerShorthand(bits: string): number {
  if (!/^[01]{4}$/.test(bits)) {
    throw new SequenceSyntaxError(`Marker shorthand needs exactly 4 binary digits, got '${bits}'`);
  }
  return Number.parseInt([...bits].reverse().join(""), 2);
}

function lowerHelper(name: string, args: string[]): string {
  args.forEach(rejectRegisterArgument(name));

  switch (name) {
    case "set_ph":
    case "set_ph_delta":
      expectArgumentCount(name, args, 1, 2);
      return formatInstruction(name, [String(phase(parseNumber(args[0]), parsePhaseUnit(args[1])))]);
    case "set_awg_gain":
    case "set_awg_offs":
      expectArgumentCount(name, args, 2, 2);
      return formatInstruction(name, [String(gain(parseNumber(args[0]))), String(gain(parseNumber(args[1])))]);
    default:
      expectArgumentCount(name, args, 1, 1);
      return formatInstruction("set_freq", [String(frequency(parseNumber(args[0])))]);
  }
}

function rejectRegisterArgument(name: string): (arg: string) => void {
  return (arg) => {
    if (REGISTER.test(arg)) {
      throw new UnsupportedConstructError(
        `${name}() takes literal values only; use '${name} ${arg}' for a register operand`,
      );
    }
  };
}

/** Replaces every `to_ph(...)`, `to_gain(...)` and `to_freq(...)` call with its value. */
export function substituteConverterCalls(text: string): string {
  let result = "";
  let i = 0;

  while (i < text.length) {
    const call = /\b(to_ph|to_gain|to_freq)\(/g;
    call.lastIndex = i;
    const match = call.exec(text);
    if (!match) {
      result += text.slice(i);
      break;
    }

    result += text.slice(i, match.index);
    const open = match.index + match[0].length;
    const close = findClosingParen(text, open);
    const args = splitArguments(text.slice(open, close));
    args.forEach(rejectRegisterArgument(match[1]));
    result += String(CONVERTERS[match[1]](args));
    i = close + 1;
  }

  return result;
}

function findClosingParen(text: string, start: number): number {
  let depth = 1;
  for (let i = start; i < text.length; i++) {
    if (text[i] === "(") depth++;
    if (text[i] === ")") depth--;
    if (depth === 0) return i;
  }
  throw new SequenceSyntaxError(`Unmatched '(' in '${text}'`);
}

function splitArguments(text: string): string[] {
  const trimmed = text.trim();
  return trimmed === "" ? [] : trimmed.split(",").map((arg) => arg.trim());
}

function expectArgumentCount(name: string, args: string[], min: number, max: number): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new SequenceSyntaxError(`${name}() takes ${expected} argument(s), got ${args.length}`);
  }
}

function parseNumber(text: string): number {
  const value = Number(text);
  if (text === "" || !Number.isFinite(value)) {
    throw new SequenceSyntaxError(`Expected a number, got '${text}'`);
  }
  return value;
}

function parsePhaseUnit(text: string | undefined): PhaseUnit {
  if (text === undefined || text === "deg") return "deg";
  if (text === "rad") return "rad";
  throw new SequenceSyntaxError(`Phase unit must be 'deg' or 'rad', got '${text}'`);
}
