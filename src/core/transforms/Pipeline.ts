import { MacroAssembler, type AssembledLine } from "../assembler/MacroAssembler";
import { SequenceRangeError } from "../exceptions/SequenceErrors";
import { consoleSink, type LogSink } from "../logging/LogSink";
import { instruction, isPulse, isAcquire, type ProgramLine } from "../program/Instruction";
import { getInstructionSet, type InstructionSet } from "../program/InstructionSet";
import { Lexer, type LexedLine } from "../program/Lexer";
import { Parser } from "../program/Parser";
import { createProgram, validateProgram, withLines, type Program, type ProgramTables, type WaveformTable } from "../program/Program";
import { renderProgram } from "../program/ProgramRenderer";
import { expandChirps } from "./Chirps";
import { lowerForLoops } from "./ForLoops";
import { expandLongDelays } from "./LongDelays";
import { alignToGrid, averageLoop, buildDummyShots, requireRepetitions, shotLoop, wrapInLoop } from "./LoopWrapping";
import { convertMarkers } from "./MarkerShorthand";
import { checkOvertrigger, type OvertriggerOptions } from "./Overtrigger";
import { withPassContext } from "./Pass";
import { insertPhaseCycling, type PhaseCycle } from "./PhaseCycling";
import { insertProtectionMarkers, type ProtectionOptions } from "./ProtectionMarkers";
import { foldLongWaveforms } from "./WaveformFolding";

export const PARSE_PASS = "parse";
export const VALIDATE_PASS = "validate";

export interface CompileOptions {
  averages: number;
  shots: number;
  dummyShots: number;
  phaseCycle: PhaseCycle | null;
  /** Amplifier and switch markers around the pulses, followed by the overtrigger check. */
  protection: boolean;
  protectionDelays: Partial<ProtectionOptions>;
  overtrigger: Partial<OvertriggerOptions>;
  /** Loop body length for folded waveforms; `null` leaves long waveforms alone. */
  foldStep: number | null;
  chirpGain: number;
  logger: LogSink;
}

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
  averages: 1,
  shots: 1,
  dummyShots: 0,
  phaseCycle: null,
  protection: true,
  protectionDelays: {},
  overtrigger: {},
  foldStep: 32,
  chirpGain: 0.3,
  logger: consoleSink("pipeline"),
};

export interface CompileInput extends Partial<ProgramTables> {
  program: string;
}

export interface CompileResult {
  text: string;
  program: Program;
  waveforms: WaveformTable;
  /** Longest amplifier-on window, or `null` when protection is off. */
  maxOnTime: number | null;
}

/** Runs the macro assembler and parses its output, keeping the source line of every node. */
export function parseSource(source: string, instructionSet: InstructionSet = getInstructionSet()): ProgramLine[] {
  const assembled = new MacroAssembler().lower(source);
  return withPassContext(PARSE_PASS, () => {
    const lexer = new Lexer();
    const lexed: LexedLine[] = assembled.flatMap((chunk: AssembledLine) =>
      chunk.text.split("\n").map((text) => ({ line: chunk.line, tokens: lexer.tokenizeLine(text, chunk.line) })),
    );
    return new Parser(instructionSet).parse(lexed);
  });
}

/**
 * Compiles simplified source (or a bundle carrying it) into assembly for the sequencer. Passes
 * run in a fixed order; each returns a new program.
 */
export function compileSequence(input: string | CompileInput, options: Partial<CompileOptions> = {}): CompileResult {
  const settings: CompileOptions = { ...DEFAULT_COMPILE_OPTIONS, ...options };
  const { averages, shots, dummyShots, phaseCycle, logger } = settings;
  requireRepetitions(averages, "averages");
  requireRepetitions(shots, "shots");
  requireRepetitions(dummyShots, "dummy shots");
  if (averages < 1 || shots < 1) {
    throw new SequenceRangeError("averages and shots must be at least 1");
  }

  const bundle: CompileInput = typeof input === "string" ? { program: input } : input;
  let program = createProgram(parseSource(bundle.program), bundle);

  program = convertMarkers(program);

  let maxOnTime: number | null = null;
  const hasPulses = program.lines.some(isPulse);
  if (settings.protection && hasPulses) {
    program = insertProtectionMarkers(program, settings.protectionDelays);
    maxOnTime = checkOvertrigger(program, settings.overtrigger);
  } else if (settings.protection) {
    logger("no play or chirp found, skipping protection markers");
  }

  if (averages > 1 || shots > 1 || dummyShots > 0 || phaseCycle !== null) {
    program = alignToGrid(program);
  }

  const dummy = dummyShots > 0 ? buildDummyShots(program, dummyShots) : null;

  if (phaseCycle !== null) {
    if (!program.lines.some(isAcquire)) {
      logger("phase cycling a program without acquisitions; the receiver phase is never used");
    }
    program = insertPhaseCycling(program, phaseCycle);
  }

  program = wrapInLoop(program, shotLoop(shots));
  program = wrapInLoop(program, averageLoop(averages));
  if (dummy) {
    program = withLines(program, [...dummy.lines, ...program.lines]);
  }

  program = lowerForLoops(program);
  program = expandLongDelays(program);
  if (settings.foldStep !== null) {
    program = foldLongWaveforms(program, { step: settings.foldStep });
  }
  program = expandChirps(program, { gain: settings.chirpGain });
  program = withLines(program, [...program.lines, instruction("stop")]);

  const compiled = program;
  withPassContext(VALIDATE_PASS, () => validateProgram(compiled));

  return {
    text: renderProgram(program),
    program,
    waveforms: program.waveforms,
    maxOnTime,
  };
}
