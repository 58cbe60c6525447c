import { normalizeSequenceError } from "../exceptions/SequenceErrors";
import type { Program } from "../program/Program";

export type ProgramPass = (program: Program) => Program;

/** Runs `body`, tagging any error it throws with the pass name. */
export function withPassContext<T>(pass: string, body: () => T): T {
  try {
    return body();
  } catch (error) {
    throw normalizeSequenceError(error, pass);
  }
}
