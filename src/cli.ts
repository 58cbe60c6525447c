#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";

import { Command, CommanderError, InvalidArgumentError } from "commander";

import { Emulator } from "./core/emulator/Emulator";
import { SequenceError } from "./core/exceptions/SequenceErrors";
import { loadBundle } from "./core/loader/BundleLoader";
import type { SequenceBundle } from "./core/program/Program";
import { compileSequence } from "./core/transforms/Pipeline";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface CompileCommandOptions {
  averages: number;
  shots: number;
  dummy: number;
  steps?: number[];
  pathway?: number[];
  protection: boolean;
  foldStep: number;
  output?: string;
}

interface EmulateCommandOptions {
  maxSamples?: number;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parseList(value: string): number[] {
  return value.split(",").map((item) => {
    const parsed = Number(item.trim());
    if (item.trim() === "" || !Number.isFinite(parsed)) {
      throw new InvalidArgumentError(`'${item}' is not a number.`);
    }
    return parsed;
  });
}

function describeError(error: unknown): string {
  if (error instanceof SequenceError) return `${error.name} ${error.describe()}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

function compileCommand(file: string, options: CompileCommandOptions, io: CliIo): void {
  const bundle = loadBundle(file);
  if ((options.steps === undefined) !== (options.pathway === undefined)) {
    throw new Error("--steps and --pathway go together.");
  }

  const result = compileSequence(bundle, {
    averages: options.averages,
    shots: options.shots,
    dummyShots: options.dummy,
    phaseCycle: options.steps && options.pathway ? { steps: options.steps, pathway: options.pathway } : null,
    protection: options.protection,
    foldStep: options.foldStep === 0 ? null : options.foldStep,
    logger: (message) => io.stderr(`[pipeline] ${message}\n`),
  });

  const compiled: SequenceBundle = {
    program: result.text,
    waveforms: result.waveforms,
    weights: bundle.weights,
    acquisitions: bundle.acquisitions,
  };
  const json = `${JSON.stringify(compiled, null, 2)}\n`;

  if (options.output) {
    fs.writeFileSync(path.resolve(options.output), json);
    const onTime = result.maxOnTime === null ? "" : `, longest amplifier-on window ${result.maxOnTime}`;
    io.stdout(`Wrote ${result.program.lines.length} lines to ${options.output}${onTime}\n`);
  } else {
    io.stdout(json);
  }
}

function emulateCommand(file: string, options: EmulateCommandOptions, io: CliIo): void {
  const bundle = loadBundle(file);
  const emulator = new Emulator(bundle, {
    ...(options.maxSamples === undefined ? {} : { maxTraceSamples: options.maxSamples }),
    logger: (message) => io.stderr(`[emulator] ${message}\n`),
  });
  const result = emulator.run();

  const summary = {
    status: result.status,
    time: result.time,
    steps: result.steps,
    samples: result.path0.length,
    truncated: result.truncated,
    markers: result.markers,
    acquisitions: Object.fromEntries(
      Object.entries(result.acquisitions).map(([name, record]) => [
        name,
        { index: record.index, scopeSamples: record.scope.path0.length, bins: record.bins },
      ]),
    ),
  };
  io.stdout(`${JSON.stringify(summary, null, 2)}\n`);
}

export function createCli(io: CliIo = processIo): Command {
  const program = new Command();
  program
    .name("seqforge")
    .description("Compile and emulate pulse sequencer programs")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command("compile")
    .description("Compile a sequence bundle into sequencer assembly")
    .argument("<bundle>", "sequence bundle JSON file")
    .option("--averages <n>", "repetitions averaged by the outer loop", parseCount, 1)
    .option("--shots <n>", "shots per average", parseCount, 1)
    .option("--dummy <n>", "dummy shots played before the real ones", parseCount, 0)
    .option("--steps <list>", "phase step per pulse, in degrees", parseList)
    .option("--pathway <list>", "coherence-pathway coefficient per pulse", parseList)
    .option("--no-protection", "leave out amplifier and switch markers")
    .option("--fold-step <n>", "loop body length for long constant waveforms, 0 to disable", parseCount, 32)
    .option("-o, --output <file>", "write the compiled bundle here instead of stdout")
    .action((file: string, options: CompileCommandOptions) => compileCommand(file, options, io));

  program
    .command("emulate")
    .description("Run a compiled bundle in the emulator and print a summary")
    .argument("<bundle>", "compiled bundle JSON file")
    .option("--max-samples <n>", "cap on stored output samples", parseCount)
    .action((file: string, options: EmulateCommandOptions) => emulateCommand(file, options, io));

  return program;
}

/** Runs one command line and returns its exit code. */
export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    await createCli(io).parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr(`${describeError(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
