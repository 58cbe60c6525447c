import { SequenceSyntaxError } from "../exceptions/SequenceErrors";

export type TokenType =
  | "identifier"
  | "register"
  | "number"
  | "labelRef"
  | "comma"
  | "colon"
  | "equals"
  | "lparen"
  | "rparen";

export interface Token {
  type: TokenType;
  value: string | number;
  line: number;
  column: number;
  raw: string;
}

export interface LexedLine {
  line: number;
  tokens: Token[];
}

const PUNCTUATION: Record<string, TokenType> = {
  ",": "comma",
  ":": "colon",
  "=": "equals",
  "(": "lparen",
  ")": "rparen",
};

export class Lexer {
  tokenize(source: string): LexedLine[] {
    return source.split(/\r?\n/).map((text, index) => ({
      line: index + 1,
      tokens: this.tokenizeLine(text, index + 1),
    }));
  }

  tokenizeLine(text: string, lineNumber: number): Token[] {
    const cleaned = stripComment(text);
    const tokens: Token[] = [];

    let i = 0;
    while (i < cleaned.length) {
      const char = cleaned[i];
      if (/\s/.test(char)) {
        i++;
        continue;
      }

      const column = i + 1;

      const punctuation = PUNCTUATION[char];
      if (punctuation) {
        tokens.push({ type: punctuation, value: char, line: lineNumber, column, raw: char });
        i++;
        continue;
      }

      if (char === "@") {
        const { word, length } = readWord(cleaned, i + 1);
        if (length === 0) {
          throw new SequenceSyntaxError(`Missing label name after '@' (column ${column})`, null, lineNumber);
        }
        tokens.push({ type: "labelRef", value: word, line: lineNumber, column, raw: `@${word}` });
        i += length + 1;
        continue;
      }

      if (/[0-9+\-.]/.test(char)) {
        const { token, length } = this.readNumber(cleaned, i, lineNumber, column);
        tokens.push(token);
        i += length;
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        const { word, length } = readWord(cleaned, i);
        const type = /^R\d+$/.test(word) ? "register" : "identifier";
        tokens.push({ type, value: word, line: lineNumber, column, raw: word });
        i += length;
        continue;
      }

      throw new SequenceSyntaxError(`Unexpected character '${char}' (column ${column})`, null, lineNumber);
    }

    return tokens;
  }

  private readNumber(text: string, start: number, line: number, column: number): { token: Token; length: number } {
    const match = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(text.slice(start));
    if (!match) {
      throw new SequenceSyntaxError(`Invalid number near '${text.slice(start)}' (column ${column})`, null, line);
    }

    const raw = match[0];
    return {
      token: { type: "number", value: Number(raw), line, column, raw },
      length: raw.length,
    };
  }
}

export function stripComment(text: string): string {
  const index = text.indexOf("#");
  return index === -1 ? text : text.slice(0, index);
}

function readWord(text: string, start: number): { word: string; length: number } {
  let i = start;
  while (i < text.length && /[A-Za-z0-9_]/.test(text[i])) i++;
  return { word: text.slice(start, i), length: i - start };
}
