import type { HeartRateVariability, SignalQuality } from '../types.ts';
import { detectPeaks } from './heartRate.ts';

const BASELINE_WINDOW = 100;

const round1 = (value: number) => Math.round(value * 10) / 10;
const clampScore = (value: number) => Math.max(0, Math.min(100, value));

const mean = (values: readonly number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

export const rrIntervalsMs = (peaks: readonly number[], sampleRateHz: number): number[] => {
  const intervals: number[] = [];
  for (let i = 1; i < peaks.length; i++) {
    intervals.push(((peaks[i] - peaks[i - 1]) * 1000) / sampleRateHz);
  }
  return intervals;
};

/** Share of successive RR intervals that differ by more than 20% of the mean interval. */
const irregularityRatio = (rr: readonly number[], meanRr: number): number => {
  let irregular = 0;
  for (let i = 1; i < rr.length; i++) {
    if (Math.abs(rr[i] - rr[i - 1]) > meanRr * 0.2) irregular++;
  }
  return irregular / rr.length;
};

/**
 * Time-domain HRV over the R-peaks of a window. Needs at least three peaks
 * (two RR intervals); returns null otherwise.
 */
export const heartRateVariability = (
  signal: readonly number[],
  sampleRateHz: number,
): HeartRateVariability | null => {
  const rr = rrIntervalsMs(detectPeaks(signal, sampleRateHz), sampleRateHz);
  if (rr.length < 2) return null;

  const meanRr = mean(rr);
  const sdnn = Math.sqrt(mean(rr.map((interval) => (interval - meanRr) ** 2)));

  let squaredDiffs = 0;
  for (let i = 1; i < rr.length; i++) {
    squaredDiffs += (rr[i] - rr[i - 1]) ** 2;
  }
  const rmssd = Math.sqrt(squaredDiffs / (rr.length - 1));

  const irregularity = irregularityRatio(rr, meanRr);
  let arrhythmiaScore = 100;
  if (rr.length >= 3) {
    if (irregularity > 0.3) arrhythmiaScore -= 30;
    else if (irregularity > 0.15) arrhythmiaScore -= 15;
  }
  const regularity = 100 - (sdnn / meanRr) * 1000;

  return {
    meanRrMs: round1(meanRr),
    sdnnMs: round1(sdnn),
    rmssdMs: round1(rmssd),
    irregularityRatio: round1(irregularity * 100) / 100,
    rhythmStability: round1(clampScore((regularity + arrhythmiaScore) / 2)),
  };
};

/** Signal power against the power of sample-to-sample differences, in dB. */
export const signalToNoiseDb = (signal: readonly number[]): number => {
  if (signal.length < 2) return 0;
  const signalPower = mean(signal.map((value) => value * value));

  let noisePower = 0;
  for (let i = 1; i < signal.length; i++) {
    noisePower += (signal[i] - signal[i - 1]) ** 2;
  }
  noisePower /= signal.length - 1;

  if (noisePower === 0) return 50;
  if (signalPower === 0) return -50;
  return 10 * Math.log10(signalPower / noisePower);
};

/** 100 minus the largest jump (×100) between the means of consecutive 100-sample windows. */
export const baselineStability = (signal: readonly number[]): number => {
  const baselines: number[] = [];
  for (let i = 0; i + BASELINE_WINDOW < signal.length; i += BASELINE_WINDOW) {
    baselines.push(mean(signal.slice(i, i + BASELINE_WINDOW)));
  }
  if (baselines.length < 2) return 100;

  let maxDrift = 0;
  for (let i = 1; i < baselines.length; i++) {
    maxDrift = Math.max(maxDrift, Math.abs(baselines[i] - baselines[i - 1]));
  }
  return clampScore(100 - maxDrift * 100);
};

/** Penalizes sample-to-sample jumps larger than twice the mean absolute amplitude. */
export const artifactScore = (signal: readonly number[]): number => {
  if (signal.length === 0) return 100;
  const limit = mean(signal.map(Math.abs)) * 2;

  let artifacts = 0;
  for (let i = 1; i < signal.length; i++) {
    if (Math.abs(signal[i] - signal[i - 1]) > limit) artifacts++;
  }
  return clampScore(100 - (artifacts / signal.length) * 200);
};

export const assessSignalQuality = (signal: readonly number[]): SignalQuality | null => {
  if (signal.length < 2) return null;

  const snrDb = signalToNoiseDb(signal);
  const baseline = baselineStability(signal);
  const artifacts = artifactScore(signal);

  let score = 100;
  if (snrDb < 10) score -= 30;
  else if (snrDb < 20) score -= 15;
  score = (score + baseline) / 2;
  score = (score + artifacts) / 2;

  return {
    score: round1(clampScore(score)),
    snrDb: round1(snrDb),
    baselineStability: round1(baseline),
    artifactScore: round1(artifacts),
  };
};
