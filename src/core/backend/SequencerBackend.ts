import { Emulator, type EmulatorOptions } from "../emulator/Emulator";
import type { AcquisitionRecord } from "../emulator/SignalPath";
import type { SequenceBundle } from "../program/Program";

export interface AcquisitionResult {
  acquisitions: Record<string, AcquisitionRecord>;
  /** Sequencer time, in samples, when the program stopped. */
  duration: number;
}

/**
 * Something that can run a compiled bundle and hand back what it captured. Instrument
 * drivers implement this outside the package; the emulator stands in for them in tests.
 */
export interface SequencerBackend {
  readonly name: string;
  run(bundle: SequenceBundle): Promise<AcquisitionResult>;
}

export class EmulatorBackend implements SequencerBackend {
  readonly name = "emulator";
  private readonly options: Partial<EmulatorOptions>;

  constructor(options: Partial<EmulatorOptions> = {}) {
    this.options = options;
  }

  async run(bundle: SequenceBundle): Promise<AcquisitionResult> {
    const result = new Emulator(bundle, this.options).run();
    return { acquisitions: result.acquisitions, duration: result.time };
  }
}
