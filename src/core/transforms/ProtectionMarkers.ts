import { TimingBudgetError } from "../exceptions/SequenceErrors";
import {
  countPulses,
  imm,
  immediateAt,
  instruction,
  isPlainWait,
  isPulse,
  type InstructionLine,
  type ProgramLine,
} from "../program/Instruction";
import { withLines, type Program } from "../program/Program";
import { withPassContext } from "./Pass";

export const PROTECTION_PASS = "protection-markers";

/** Marker output codes driving the amplifier and the protection switch. */
export const MarkerCode = {
  switchOpen: 7,
  amplifierOn: 15,
  amplifierOff: 11,
  closed: 3,
} as const;

/** Smallest delay an inserted `wait`/`upd_param` may carry. */
export const MIN_INSERTED_DELAY = 4;

export interface ProtectionOptions {
  switchOpenPostDelay: number;
  ampOnPostDelay: number;
  ampOffPreDelay: number;
  ampOffPostDelay: number;
  switchClosedPostDelay: number;
  /** Waits between pulses longer than this switch the amplifier off and back on. */
  interPulseThreshold: number;
}

export const DEFAULT_PROTECTION_OPTIONS: ProtectionOptions = {
  switchOpenPostDelay: 0,
  ampOnPostDelay: 250,
  ampOffPreDelay: 50,
  ampOffPostDelay: 250,
  switchClosedPostDelay: 150,
  interPulseThreshold: 1000,
};

const DELAY_KEYS = [
  "switchOpenPostDelay",
  "ampOnPostDelay",
  "ampOffPreDelay",
  "ampOffPostDelay",
  "switchClosedPostDelay",
] as const;

function validateDelays(options: ProtectionOptions): void {
  for (const key of DELAY_KEYS) {
    const value = options[key];
    if (!Number.isInteger(value) || (value !== 0 && value <= MIN_INSERTED_DELAY)) {
      throw new TimingBudgetError(`${key} must be 0 or an integer above ${MIN_INSERTED_DELAY}, got ${value}`);
    }
  }
}

const setMarker = (code: number, line: number | null): InstructionLine => instruction("set_mrk", [imm(code)], line);
const update = (delay: number, line: number | null): InstructionLine => instruction("upd_param", [imm(delay)], line);
const wait = (delay: number, line: number | null): InstructionLine => instruction("wait", [imm(delay)], line);

/**
 * Wraps the pulses in amplifier and switch markers. Time spent in inserted instructions
 * after a pulse is taken back from the next plain wait.
 */
export function insertProtectionMarkers(program: Program, options: Partial<ProtectionOptions> = {}): Program {
  const settings: ProtectionOptions = { ...DEFAULT_PROTECTION_OPTIONS, ...options };

  return withPassContext(PROTECTION_PASS, () => {
    validateDelays(settings);

    const total = countPulses(program.lines);
    const output: ProgramLine[] = [];
    let amplifierOn = false;
    let switchOpen = false;
    let pulses = 0;
    let owed = 0;

    for (const line of program.lines) {
      if (isPlainWait(line)) {
        let duration = immediateAt(line, 0) ?? 0;

        if (amplifierOn && pulses >= 1 && pulses < total && duration > settings.interPulseThreshold) {
          if (settings.ampOffPreDelay > MIN_INSERTED_DELAY) {
            output.push(wait(settings.ampOffPreDelay, line.line));
            owed += settings.ampOffPreDelay;
          }
          output.push(setMarker(MarkerCode.amplifierOff, line.line), update(MIN_INSERTED_DELAY, line.line));
          // The next pulse re-arms the amplifier inside this same wait.
          owed += MIN_INSERTED_DELAY + settings.ampOnPostDelay;
          amplifierOn = false;
        }

        if (owed > 0) {
          if (duration - owed <= 0) {
            throw new TimingBudgetError(`wait ${duration} cannot absorb ${owed} of inserted marker delays`, null, line.line);
          }
          duration -= owed;
          owed = 0;
        }

        output.push(wait(duration, line.line));
        continue;
      }

      if (isPulse(line)) {
        pulses++;

        if (!switchOpen && settings.switchOpenPostDelay > 0) {
          output.push(setMarker(MarkerCode.switchOpen, line.line), update(settings.switchOpenPostDelay, line.line));
          switchOpen = true;
        }
        if (!amplifierOn) {
          output.push(setMarker(MarkerCode.amplifierOn, line.line));
          if (settings.ampOnPostDelay > 0) {
            output.push(update(settings.ampOnPostDelay, line.line));
          }
          amplifierOn = true;
          switchOpen = true;
        }

        output.push(line);

        if (pulses === total) {
          if (owed > 0) {
            throw new TimingBudgetError(`${owed} of inserted delays were not absorbed before the last pulse`, null, line.line);
          }
          owed = closeAfterLastPulse(output, settings, line.line);
          amplifierOn = false;
          switchOpen = false;
        }
        continue;
      }

      if (line.kind === "end" && owed > 0) {
        throw new TimingBudgetError(`Loop ends while ${owed} of inserted delays are still owed`, null, line.line);
      }
      output.push(line);
    }

    if (owed > 0) {
      throw new TimingBudgetError(`${owed} of inserted delays after the last pulse need a following wait`);
    }

    return withLines(program, output);
  });
}

function closeAfterLastPulse(output: ProgramLine[], settings: ProtectionOptions, line: number | null): number {
  let owed = 0;
  const { ampOffPreDelay, ampOffPostDelay, switchClosedPostDelay } = settings;

  if (ampOffPreDelay > MIN_INSERTED_DELAY) {
    output.push(wait(ampOffPreDelay, line));
    owed += ampOffPreDelay;
  }
  if (ampOffPreDelay > MIN_INSERTED_DELAY || ampOffPostDelay > MIN_INSERTED_DELAY) {
    output.push(setMarker(MarkerCode.amplifierOff, line));
  }
  if (ampOffPostDelay > MIN_INSERTED_DELAY) {
    output.push(update(ampOffPostDelay, line));
    owed += ampOffPostDelay;
  }
  output.push(setMarker(MarkerCode.closed, line));
  if (switchClosedPostDelay > MIN_INSERTED_DELAY) {
    output.push(update(switchClosedPostDelay, line));
    owed += switchClosedPostDelay;
  }
  return owed;
}
