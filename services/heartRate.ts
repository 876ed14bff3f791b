export const HEART_RATE_UNAVAILABLE = 0;

const MIN_BPM = 40;
const MAX_BPM = 200;
const REFRACTORY_MS = 250;

/**
 * Finds R-peak candidates: local maxima above a threshold halfway between the
 * window mean and its maximum. Within the refractory period only the tallest
 * candidate is kept.
 */
export const detectPeaks = (signal: readonly number[], sampleRateHz: number): number[] => {
  if (signal.length < 3) return [];

  let sum = 0;
  let max = -Infinity;
  for (const value of signal) {
    sum += value;
    if (value > max) max = value;
  }
  const mean = sum / signal.length;
  if (max - mean <= 1e-9) return []; // flat line

  const threshold = mean + (max - mean) / 2;
  const refractory = Math.max(1, Math.round((REFRACTORY_MS / 1000) * sampleRateHz));
  const peaks: number[] = [];

  for (let i = 1; i < signal.length - 1; i++) {
    const value = signal[i];
    if (value < threshold || value <= signal[i - 1] || value < signal[i + 1]) continue;

    const last = peaks.length - 1;
    if (last < 0 || i - peaks[last] >= refractory) {
      peaks.push(i);
    } else if (value > signal[peaks[last]]) {
      peaks[last] = i;
    }
  }

  return peaks;
};

export const estimateHeartRate = (signal: readonly number[], sampleRateHz: number): number => {
  const peaks = detectPeaks(signal, sampleRateHz);
  if (peaks.length < 2) return HEART_RATE_UNAVAILABLE;

  const meanInterval = (peaks[peaks.length - 1] - peaks[0]) / (peaks.length - 1);
  const bpm = (60 * sampleRateHz) / meanInterval;
  const clamped = Math.min(MAX_BPM, Math.max(MIN_BPM, bpm));
  return Math.round(clamped * 10) / 10;
};
