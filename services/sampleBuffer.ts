import { estimateHeartRate, HEART_RATE_UNAVAILABLE } from './heartRate.ts';

export interface SampleBufferOptions {
  sampleRateHz: number;
  capacity: number;
  liveWindowSize: number;
  heartRateWindowSize: number;
}

/**
 * Accumulates the voltage samples of one recording.
 *
 * The full record is kept for persistence up to `capacity`; anything past the
 * capacity is refused rather than overwriting older samples. Non-finite
 * readings are dropped, and `append` reports how many samples it took. Display code reads `liveWindow()`, which
 * is bounded independently.
 */
export class SampleBuffer {
  private samples: number[] = [];
  private readonly options: SampleBufferOptions;

  constructor(options: SampleBufferOptions) {
    if (options.sampleRateHz <= 0) throw new RangeError('sampleRateHz must be positive');
    if (options.capacity <= 0) throw new RangeError('capacity must be positive');
    this.options = options;
  }

  get length(): number {
    return this.samples.length;
  }

  get remaining(): number {
    return this.options.capacity - this.samples.length;
  }

  get isFull(): boolean {
    return this.remaining <= 0;
  }

  append(batch: readonly number[]): number {
    let accepted = 0;
    for (const sample of batch) {
      if (this.isFull) break;
      if (!Number.isFinite(sample)) continue;
      this.samples.push(sample);
      accepted++;
    }
    return accepted;
  }

  /** The most recent `heartRateWindowSize` samples. */
  analysisWindow(): number[] {
    return this.samples.slice(-this.options.heartRateWindowSize);
  }

  currentHeartRate(): number {
    // No reading until two seconds of signal exist.
    if (this.samples.length < this.options.sampleRateHz * 2) return HEART_RATE_UNAVAILABLE;
    return estimateHeartRate(this.analysisWindow(), this.options.sampleRateHz);
  }

  liveWindow(): number[] {
    return this.samples.slice(-this.options.liveWindowSize);
  }

  snapshot(): readonly number[] {
    return Object.freeze([...this.samples]);
  }

  reset(): void {
    this.samples = [];
  }
}
