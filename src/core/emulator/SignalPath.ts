import { EmulationError } from "../exceptions/EmulationErrors";
import type { LogSink } from "../logging/LogSink";
import { findWaveformByIndex, type AcquisitionTable, type WaveformTable } from "../program/Program";
import { gainFromCode } from "../units/UnitConverters";

export const GAIN_CODE_MIN = -32768;
export const GAIN_CODE_MAX = 32767;
export const PHASE_RANGE = 1_000_000_000;

export type Timeline = Array<[number, number]>;

export interface OutputSample {
  time: number;
  path0: number;
  path1: number;
}

export interface AcquisitionRecord {
  index: number;
  num_bins: number;
  scope: { path0: number[]; path1: number[] };
  /** Integrated I/Q per bin and how many windows each bin received. */
  bins: { path0: number[]; path1: number[]; counts: number[] };
}

export interface SignalPathOptions {
  scopeLength: number;
  integrationLength: number;
  maxTraceSamples: number;
  onSample: ((sample: OutputSample) => void) | null;
  logger: LogSink;
}

interface ActiveWaveform {
  data: readonly number[];
  start: number;
}

interface IntegrationWindow {
  channel: AcquisitionRecord;
  bin: number;
  remaining: number;
  offset: number;
  weights: [readonly number[], readonly number[]] | null;
  sum0: number;
  sum1: number;
}

interface ScopeWindow {
  channel: AcquisitionRecord;
  remaining: number;
}

type Pair = [number, number];

/** Queued output parameters; each one takes effect at the next parameter update. */
interface PendingParameters {
  marker: number | null;
  gain: Pair | null;
  offset: Pair | null;
  phase: number | null;
  phaseDelta: number | null;
  frequency: number | null;
}

const NOTHING_PENDING: PendingParameters = {
  marker: null,
  gain: null,
  offset: null,
  phase: null,
  phaseDelta: null,
  frequency: null,
};

function requireGainCode(value: number, what: string): number {
  if (!Number.isInteger(value) || value < GAIN_CODE_MIN || value > GAIN_CODE_MAX) {
    throw new EmulationError(`${what} code ${value} outside [${GAIN_CODE_MIN}, ${GAIN_CODE_MAX}]`);
  }
  return value;
}

const wrapPhase = (value: number): number => ((value % PHASE_RANGE) + PHASE_RANGE) % PHASE_RANGE;

/**
 * AWG outputs, marker outputs, NCO settings and acquisition capture of one sequencer.
 * Time advances one sample at a time while anything observable is happening, and jumps
 * otherwise.
 */
export class SignalPath {
  readonly path0: number[] = [];
  readonly path1: number[] = [];
  readonly markers: Timeline = [[0, 0]];
  readonly phases: Timeline = [[0, 0]];
  readonly frequencies: Timeline = [[0, 0]];
  readonly acquisitions: Record<string, AcquisitionRecord>;

  private readonly options: SignalPathOptions;
  private readonly waveforms: WaveformTable;
  private readonly weights: WaveformTable;

  private pending: PendingParameters = { ...NOTHING_PENDING };
  private marker = 0;
  private gain: Pair = [GAIN_CODE_MAX, GAIN_CODE_MAX];
  private offset: Pair = [0, 0];
  private phase = 0;
  private phaseDelta = 0;
  private frequency = 0;

  private wave0: ActiveWaveform | null = null;
  private wave1: ActiveWaveform | null = null;
  private scope: ScopeWindow | null = null;
  private integration: IntegrationWindow | null = null;
  private truncated = false;

  constructor(tables: { waveforms: WaveformTable; weights: WaveformTable; acquisitions: AcquisitionTable }, options: SignalPathOptions) {
    this.options = options;
    this.waveforms = tables.waveforms;
    this.weights = tables.weights;
    this.acquisitions = Object.fromEntries(
      Object.entries(tables.acquisitions).map(([name, entry]) => [
        name,
        {
          index: entry.index,
          num_bins: entry.num_bins,
          scope: { path0: [], path1: [] },
          bins: {
            path0: new Array<number>(entry.num_bins).fill(0),
            path1: new Array<number>(entry.num_bins).fill(0),
            counts: new Array<number>(entry.num_bins).fill(0),
          },
        },
      ]),
    );
  }

  isTruncated(): boolean {
    return this.truncated;
  }

  queueMarker(value: number): void {
    this.pending.marker = value;
  }

  queueGain(path0: number, path1: number): void {
    this.pending.gain = [requireGainCode(path0, "Gain"), requireGainCode(path1, "Gain")];
  }

  queueOffset(path0: number, path1: number): void {
    this.pending.offset = [requireGainCode(path0, "Offset"), requireGainCode(path1, "Offset")];
  }

  queuePhase(value: number): void {
    this.pending.phase = wrapPhase(value);
  }

  queuePhaseDelta(value: number): void {
    this.pending.phaseDelta = wrapPhase(value);
  }

  queuePhaseReset(): void {
    this.pending.phase = 0;
    this.pending.phaseDelta = 0;
  }

  queueFrequency(value: number): void {
    this.pending.frequency = value;
  }

  /** Applies everything queued since the last update and records timeline changes. */
  commit(time: number): void {
    const { marker, gain, offset, phase, phaseDelta, frequency } = this.pending;
    this.pending = { ...NOTHING_PENDING };

    if (marker !== null && marker !== this.marker) {
      this.marker = marker;
      this.markers.push([time, marker]);
    }
    if (gain) this.gain = gain;
    if (offset) this.offset = offset;

    const previousPhase = wrapPhase(this.phase + this.phaseDelta);
    if (phase !== null) this.phase = phase;
    if (phaseDelta !== null) this.phaseDelta = phaseDelta;
    const nextPhase = wrapPhase(this.phase + this.phaseDelta);
    if (nextPhase !== previousPhase) {
      this.phases.push([time, nextPhase]);
    }

    if (frequency !== null && frequency !== this.frequency) {
      this.frequency = frequency;
      this.frequencies.push([time, frequency]);
    }
  }

  /** Final marker entry at stop, recorded even when the state is unchanged. */
  recordStop(time: number): void {
    this.markers.push([time, this.marker]);
    this.flushIntegration();
  }

  play(path0Index: number, path1Index: number, time: number): void {
    this.wave0 = { data: this.lookup(this.waveforms, path0Index, "Waveform"), start: time };
    this.wave1 = { data: this.lookup(this.waveforms, path1Index, "Waveform"), start: time };
  }

  acquire(acquisitionIndex: number, bin: number, weightIndices: Pair | null): void {
    const channel = Object.values(this.acquisitions).find((entry) => entry.index === acquisitionIndex);
    if (!channel) {
      throw new EmulationError(`Acquisition index ${acquisitionIndex} is not in the acquisition table`);
    }
    if (!Number.isInteger(bin) || bin < 0 || bin >= channel.num_bins) {
      throw new EmulationError(`Bin ${bin} outside the ${channel.num_bins} bins of acquisition ${acquisitionIndex}`);
    }

    this.flushIntegration();
    const weights: IntegrationWindow["weights"] = weightIndices
      ? [this.lookup(this.weights, weightIndices[0], "Weight"), this.lookup(this.weights, weightIndices[1], "Weight")]
      : null;
    const length = weights
      ? Math.min(this.options.integrationLength, weights[0].length, weights[1].length)
      : this.options.integrationLength;

    // The scope records scopeLength samples whatever the acquire instruction's own duration.
    this.scope = { channel, remaining: this.options.scopeLength };
    this.integration = { channel, bin, remaining: length, offset: 0, weights, sum0: 0, sum1: 0 };
  }

  /** Produces `duration` samples starting at `time`. */
  advance(time: number, duration: number): void {
    for (let t = time; t < time + duration; t++) {
      if (this.isIdle(t)) {
        return;
      }
      this.emit(t);
    }
  }

  private isIdle(time: number): boolean {
    if (this.path0.length < this.options.maxTraceSamples) return false;
    this.markTruncated();
    return (
      this.options.onSample === null &&
      this.scope === null &&
      this.integration === null &&
      !this.playing(this.wave0, time) &&
      !this.playing(this.wave1, time)
    );
  }

  private markTruncated(): void {
    if (this.truncated) return;
    this.truncated = true;
    this.options.logger(`output trace capped at ${this.options.maxTraceSamples} samples`);
  }

  private playing(wave: ActiveWaveform | null, time: number): boolean {
    return wave !== null && time - wave.start < wave.data.length;
  }

  private sample(wave: ActiveWaveform | null, time: number): number {
    if (wave === null) return 0;
    const index = time - wave.start;
    return index >= 0 && index < wave.data.length ? wave.data[index] : 0;
  }

  private emit(time: number): void {
    const value0 = gainFromCode(this.gain[0]) * this.sample(this.wave0, time) + gainFromCode(this.offset[0]);
    const value1 = gainFromCode(this.gain[1]) * this.sample(this.wave1, time) + gainFromCode(this.offset[1]);

    if (this.path0.length < this.options.maxTraceSamples) {
      this.path0.push(value0);
      this.path1.push(value1);
    } else {
      this.markTruncated();
    }

    if (this.scope) {
      const { scope } = this.scope.channel;
      if (scope.path0.length < this.options.maxTraceSamples) {
        scope.path0.push(value0);
        scope.path1.push(value1);
      }
      if (--this.scope.remaining <= 0) this.scope = null;
    }

    if (this.integration) {
      const window = this.integration;
      const weight0 = window.weights ? window.weights[0][window.offset] : 1;
      const weight1 = window.weights ? window.weights[1][window.offset] : 1;
      window.sum0 += value0 * weight0;
      window.sum1 += value1 * weight1;
      window.offset++;
      if (--window.remaining <= 0) this.flushIntegration();
    }

    this.options.onSample?.({ time, path0: value0, path1: value1 });
  }

  private flushIntegration(): void {
    const window = this.integration;
    if (!window) return;
    this.integration = null;
    if (window.offset === 0) return;

    const { bins } = window.channel;
    bins.path0[window.bin] += window.sum0;
    bins.path1[window.bin] += window.sum1;
    bins.counts[window.bin] += 1;
  }

  private lookup(table: WaveformTable, index: number, what: string): readonly number[] {
    const found = findWaveformByIndex(table, index);
    if (!found) {
      throw new EmulationError(`${what} index ${index} is not in the table`);
    }
    return found[1].data;
  }
}
