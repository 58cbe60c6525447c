import { TimingBudgetError, UnsupportedConstructError } from "../exceptions/SequenceErrors";
import { isInstruction } from "../program/Instruction";
import { durationOf } from "../program/InstructionSet";
import type { Program } from "../program/Program";
import { withPassContext } from "./Pass";
import { MarkerCode } from "./ProtectionMarkers";

export const OVERTRIGGER_PASS = "overtrigger-check";

export interface OvertriggerOptions {
  /** Longest continuous amplifier-on window allowed, exclusive. */
  maxOnTime: number;
  amplifierOnCode: number;
}

export const DEFAULT_OVERTRIGGER_OPTIONS: OvertriggerOptions = {
  maxOnTime: 5000,
  amplifierOnCode: MarkerCode.amplifierOn,
};

/**
 * Replays the marker changes and returns the longest continuous amplifier-on window.
 * Throws when a window reaches the limit or the program ends with the amplifier on.
 */
export function checkOvertrigger(program: Program, options: Partial<OvertriggerOptions> = {}): number {
  const { maxOnTime, amplifierOnCode } = { ...DEFAULT_OVERTRIGGER_OPTIONS, ...options };

  return withPassContext(OVERTRIGGER_PASS, () => {
    let amplifierOn = false;
    let onTime = 0;
    let longest = 0;
    let longestEndLine: number | null = null;

    for (const line of program.lines) {
      if (isInstruction(line, "set_mrk")) {
        const operand = line.operands[0];
        if (operand?.kind !== "immediate") {
          throw new UnsupportedConstructError("Marker states set from a register cannot be checked", null, line.line);
        }

        if (operand.value === amplifierOnCode) {
          amplifierOn = true;
          continue;
        }

        if (amplifierOn && onTime > longest) {
          longest = onTime;
          longestEndLine = line.line;
        }
        amplifierOn = false;
        onTime = 0;
        continue;
      }

      if (amplifierOn) {
        onTime += durationOf(line);
      }
    }

    if (amplifierOn) {
      throw new TimingBudgetError("The amplifier is still on at the end of the program");
    }
    if (longest >= maxOnTime) {
      throw new TimingBudgetError(`Amplifier on for ${longest}, limit is below ${maxOnTime}`, null, longestEndLine);
    }
    return longest;
  });
}
