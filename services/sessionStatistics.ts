import type {
  HeartRateStatus,
  HeartRateSummary,
  SessionStatistics,
  SessionStatisticsEntry,
  SessionSummary,
  SessionTrend,
} from '../types.ts';

export const summarizeHeartRates = (readings: readonly number[]): HeartRateSummary => {
  if (readings.length === 0) return { average: 0, min: 0, max: 0 };

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const bpm of readings) {
    sum += bpm;
    if (bpm < min) min = bpm;
    if (bpm > max) max = bpm;
  }
  return { average: Math.round((sum / readings.length) * 10) / 10, min, max };
};

export const classifyHeartRate = (averageBpm: number): HeartRateStatus => {
  if (averageBpm <= 0) return 'Noise';
  if (averageBpm < 60) return 'Bradycardia';
  if (averageBpm > 100) return 'Tachycardia';
  return 'Normal';
};

export const assessSessionQuality = (averageBpm: number, durationSeconds: number, sampleCount: number): string => {
  if (durationSeconds < 10) return 'Short duration';
  if (sampleCount < 100) return 'Limited data';
  if (averageBpm < 50 || averageBpm > 120) return 'Irregular heart rate detected';
  return 'Good quality data';
};

export const overallAssessment = (averageBpm: number): string => {
  const abnormalities: string[] = [];
  if (averageBpm > 0 && averageBpm < 60) abnormalities.push('Bradycardia');
  if (averageBpm > 100) abnormalities.push('Tachycardia');
  if (averageBpm <= 0) abnormalities.push('No heart rate detected');

  return abnormalities.length === 0 ? 'Normal ECG' : `Abnormal ECG: ${abnormalities.join(', ')}`;
};

const isoDate = (epochMs: number) => new Date(epochMs).toISOString().slice(0, 10);

const buildTrend = (ordered: SessionSummary[]): SessionTrend | null => {
  if (ordered.length < 2) return null;
  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  const base = first.heartRate.average;
  const changePercent = base > 0 ? Math.round(((last.heartRate.average - base) / base) * 1000) / 10 : 0;
  return { changePercent, from: isoDate(first.startedAt), to: isoDate(last.startedAt) };
};

/** Aggregates stored sessions, oldest first, into the input of the AI summary. */
export const buildSessionStatistics = (summaries: readonly SessionSummary[]): SessionStatistics => {
  const ordered = [...summaries].sort((a, b) => a.startedAt - b.startedAt);

  const sessions: SessionStatisticsEntry[] = ordered.map((session, i) => ({
    index: i + 1,
    date: isoDate(session.startedAt),
    averageBpm: Math.round(session.heartRate.average),
    minBpm: Math.round(session.heartRate.min),
    maxBpm: Math.round(session.heartRate.max),
    rhythm: session.rhythm,
    status: session.status,
    durationSeconds: session.durationSeconds,
    sampleCount: session.sampleCount,
    quality: assessSessionQuality(session.heartRate.average, session.durationSeconds, session.sampleCount),
  }));

  return { sessionCount: sessions.length, sessions, trend: buildTrend(ordered) };
};
