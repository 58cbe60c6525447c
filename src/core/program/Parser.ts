import { SequenceSyntaxError, UnsupportedConstructError } from "../exceptions/SequenceErrors";
import type { ChirpLine, ForLine, InstructionLine, Operand, ProgramLine } from "./Instruction";
import { getInstructionSet, validateInstruction, type InstructionSet } from "./InstructionSet";
import { Lexer, type LexedLine, type Token } from "./Lexer";
import { REGISTER_COUNT } from "./Registers";

export const CHIRP_MNEMONIC = "play_lg_chirp";
export const DEFAULT_CHIRP_STEP = 50;

const CHIRP_KEYS = ["bw", "sm", "delta_f", "step"] as const;
type ChirpKey = (typeof CHIRP_KEYS)[number];

export class Parser {
  private readonly instructionSet: InstructionSet;

  constructor(instructionSet: InstructionSet = getInstructionSet()) {
    this.instructionSet = instructionSet;
  }

  parse(lines: LexedLine[]): ProgramLine[] {
    const nodes: ProgramLine[] = [];

    for (const line of lines) {
      let index = 0;
      const tokens = line.tokens;

      // Labels at the start of the line, possibly chained.
      while (index + 1 < tokens.length && tokens[index].type === "identifier" && tokens[index + 1].type === "colon") {
        nodes.push({ kind: "label", name: String(tokens[index].value), line: line.line });
        index += 2;
      }

      if (index >= tokens.length) {
        continue;
      }

      const rest = tokens.slice(index);
      const first = rest[0];
      if (first.type !== "identifier") {
        throw new SequenceSyntaxError(`Unexpected token '${first.raw}'`, null, line.line);
      }

      if (first.value === "for") {
        nodes.push(this.parseFor(rest, line.line));
      } else if (first.value === "end" && rest.length === 1) {
        nodes.push({ kind: "end", line: line.line });
      } else if (first.value === CHIRP_MNEMONIC) {
        nodes.push(this.parseChirp(rest, line.line));
      } else {
        nodes.push(this.parseInstruction(rest, line.line));
      }
    }

    return nodes;
  }

  private parseInstruction(tokens: Token[], line: number): InstructionLine {
    const mnemonic = String(tokens[0].value);
    const operands = tokens
      .slice(1)
      .filter((token) => token.type !== "comma")
      .map((token) => this.parseOperand(token, line));

    const instruction: InstructionLine = { kind: "instruction", mnemonic, operands, line };
    validateInstruction(instruction, this.instructionSet);
    return instruction;
  }

  private parseOperand(token: Token, line: number): Operand {
    switch (token.type) {
      case "register":
        return { kind: "register", index: parseRegister(token.raw, line) };
      case "number":
        return { kind: "immediate", value: requireInteger(token, line), raw: token.raw };
      case "labelRef":
        return { kind: "label", name: String(token.value) };
      default:
        throw new SequenceSyntaxError(`Unable to parse operand '${token.raw}'`, null, line);
    }
  }

  private parseFor(tokens: Token[], line: number): ForLine {
    if (tokens[tokens.length - 1].type === "colon") {
      throw new SequenceSyntaxError("A for header does not end with ':'", null, line);
    }

    const register = tokens[1];
    const keyword = tokens[2];
    if (register?.type !== "register" || keyword?.type !== "identifier" || keyword.value !== "in") {
      throw new SequenceSyntaxError("Expected 'for Rn in start, step, stop'", null, line);
    }

    const bounds = tokens.slice(3).filter((token) => token.type !== "comma");
    if (bounds.length !== 3 || bounds.some((token) => token.type !== "number")) {
      throw new SequenceSyntaxError("A for loop takes three numeric bounds: start, step, stop", null, line);
    }

    const [start, step, stop] = bounds.map((token) => requireInteger(token, line));
    return { kind: "for", register: parseRegister(register.raw, line), start, step, stop, line };
  }

  /** `play_lg_chirp(bw=..., sm=..., delta_f=...[, step=...]), duration` */
  private parseChirp(tokens: Token[], line: number): ChirpLine {
    const close = tokens.findIndex((token) => token.type === "rparen");
    if (tokens[1]?.type !== "lparen" || close === -1) {
      throw new SequenceSyntaxError(`Expected '${CHIRP_MNEMONIC}(key=value, ...), duration'`, null, line);
    }

    const values = new Map<ChirpKey, number>();
    const inner = tokens.slice(2, close).filter((token) => token.type !== "comma");
    for (let i = 0; i < inner.length; i += 3) {
      const [key, equals, value] = inner.slice(i, i + 3);
      const known = CHIRP_KEYS.find((candidate) => candidate === key?.value);
      if (!known || key.type !== "identifier" || equals?.type !== "equals" || value?.type !== "number") {
        throw new SequenceSyntaxError(`Malformed ${CHIRP_MNEMONIC} argument near '${key?.raw ?? ")"}'`, null, line);
      }
      values.set(known, Number(value.value));
    }

    const trailing = tokens.slice(close + 1).filter((token) => token.type !== "comma");
    if (trailing.length !== 1 || trailing[0].type !== "number") {
      throw new SequenceSyntaxError(`${CHIRP_MNEMONIC} needs a single total duration after its arguments`, null, line);
    }

    const required = (key: ChirpKey): number => {
      const value = values.get(key);
      if (value === undefined) {
        throw new UnsupportedConstructError(`${CHIRP_MNEMONIC} is missing '${key}'`, null, line);
      }
      return value;
    };

    return {
      kind: "chirp",
      bandwidth: required("bw"),
      smoothing: required("sm"),
      centerFrequency: required("delta_f"),
      step: values.get("step") ?? DEFAULT_CHIRP_STEP,
      duration: requireInteger(trailing[0], line),
      line,
    };
  }
}

function parseRegister(raw: string, line: number): number {
  const index = Number.parseInt(raw.slice(1), 10);
  if (index < 0 || index >= REGISTER_COUNT) {
    throw new SequenceSyntaxError(`Register ${raw} does not exist (R0..R${REGISTER_COUNT - 1})`, null, line);
  }
  return index;
}

function requireInteger(token: Token, line: number): number {
  const value = Number(token.value);
  if (!Number.isInteger(value)) {
    throw new SequenceSyntaxError(`Expected an integer, got '${token.raw}'`, null, line);
  }
  return value;
}

/** Lexes and parses assembly text into program lines. */
export function parseLines(source: string, instructionSet?: InstructionSet): ProgramLine[] {
  return new Parser(instructionSet).parse(new Lexer().tokenize(source));
}
