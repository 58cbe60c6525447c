import { imm, immediateAt, instruction, isPlainWait, label, ref, reg, type ProgramLine } from "../program/Instruction";
import { withLines, type Program } from "../program/Program";
import { ReservedRegister } from "../program/Registers";
import { withPassContext } from "./Pass";
import { MIN_INSERTED_DELAY } from "./ProtectionMarkers";

export const LONG_DELAYS_PASS = "long-delays";

/** Largest immediate a single `wait` accepts. */
export const MAX_WAIT = 65535;
/** Below this many full waits the delay is unrolled instead of looped. */
export const MIN_DELAY_LOOP = 5;

/**
 * Splits one delay into waits of at most {@link MAX_WAIT}. Returns the lines and whether a
 * `loop_delay{index}` loop was used.
 */
export function splitDelay(delay: number, index: number, line: number | null = null): { lines: ProgramLine[]; looped: boolean } {
  if (delay < MAX_WAIT) {
    return { lines: [instruction("wait", [imm(delay)], line)], looped: false };
  }

  let full = Math.floor(delay / MAX_WAIT);
  let remainder = delay % MAX_WAIT;
  const lines: ProgramLine[] = [];
  let tail: number[] = remainder > 0 ? [remainder] : [];

  if (remainder > 0 && remainder < MIN_INSERTED_DELAY) {
    // Borrow from one full wait so both pieces stay above the minimum.
    full -= 1;
    remainder += MIN_INSERTED_DELAY;
    tail = [MAX_WAIT - MIN_INSERTED_DELAY, remainder];
  }

  const looped = full >= MIN_DELAY_LOOP;
  if (looped) {
    const scratch = reg(ReservedRegister.loopScratch);
    const loopLabel = `loop_delay${index}`;
    lines.push(
      instruction("move", [imm(full), scratch], line),
      label(loopLabel, line),
      instruction("wait", [imm(MAX_WAIT)], line),
      instruction("loop", [scratch, ref(loopLabel)], line),
    );
  } else {
    for (let i = 0; i < full; i++) {
      lines.push(instruction("wait", [imm(MAX_WAIT)], line));
    }
  }

  lines.push(...tail.map((value) => instruction("wait", [imm(value)], line)));
  return { lines, looped };
}

export function expandLongDelays(program: Program): Program {
  return withPassContext(LONG_DELAYS_PASS, () => {
    let loops = 0;
    const lines = program.lines.flatMap((line): ProgramLine[] => {
      if (!isPlainWait(line)) return [line];

      const delay = immediateAt(line, 0) ?? 0;
      const { lines: expanded, looped } = splitDelay(delay, loops + 1, line.line);
      if (looped) loops++;
      return expanded;
    });
    return withLines(program, lines);
  });
}
