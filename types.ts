import type { AppError, DeviceError } from './errors.ts';

export interface ECGDataPoint {
  time: number;
  voltage: number;
}

export enum ConnectionStatus {
  DISCONNECTED = 'DISCONNECTED',
  SCANNING = 'SCANNING',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  ERROR = 'ERROR',
}

export enum RecordingState {
  IDLE = 'IDLE',
  COUNTDOWN = 'COUNTDOWN',
  RECORDING = 'RECORDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
}

export interface Device {
  id: string;
  name: string;
  rssi?: number;
  discoveredAt: number; // ms epoch
}

export type HeartRateStatus = 'Normal' | 'Bradycardia' | 'Tachycardia' | 'Noise';

export interface HeartRateSummary {
  average: number;
  min: number;
  max: number;
}

export interface HeartRateVariability {
  meanRrMs: number;
  sdnnMs: number;
  rmssdMs: number;
  irregularityRatio: number; // 0 to 1
  rhythmStability: number; // 0 to 100
}

export interface SignalQuality {
  score: number; // 0 to 100
  snrDb: number;
  baselineStability: number;
  artifactScore: number;
}

export type SessionStatus = 'completed' | 'aborted';

export interface Session {
  readonly id: string;
  readonly userId: string;
  readonly deviceId: string;
  readonly name: string;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationSeconds: number;
  readonly sampleRateHz: number;
  readonly samples: readonly number[]; // voltage readings in arrival order
  readonly sampleCount: number;
  readonly heartRates: readonly number[]; // bpm readings taken while recording
  readonly heartRate: HeartRateSummary;
  readonly rhythm: HeartRateStatus;
  readonly heartRateVariability: HeartRateVariability | null;
  readonly signalQuality: SignalQuality | null;
  readonly status: SessionStatus;
  readonly sealed: true;
}

export interface StoredSession extends Session {
  readonly sessionNumber: number;
}

export type SessionSummary = Omit<StoredSession, 'samples' | 'heartRates'>;

export interface SessionStatisticsEntry {
  index: number;
  date: string; // YYYY-MM-DD
  averageBpm: number;
  minBpm: number;
  maxBpm: number;
  rhythm: HeartRateStatus;
  status: SessionStatus;
  durationSeconds: number;
  sampleCount: number;
  quality: string;
}

export interface SessionTrend {
  changePercent: number;
  from: string;
  to: string;
}

export interface SessionStatistics {
  sessionCount: number;
  sessions: SessionStatisticsEntry[];
  trend: SessionTrend | null;
}

export interface AiSummary {
  summary: string;
  observations: string;
  suggestions: string[];
  source: 'model' | 'fallback';
}

export interface SimulationConfig {
  bpm: number;
  noiseLevel: number; // 0 to 1
  sampleRateHz: number;
  batchIntervalMs: number;
  seed?: number;
}

export type TransportEvent =
  | { type: 'discovered'; devices: Device[] }
  | { type: 'connectionChanged'; deviceId: string; connected: boolean }
  | { type: 'samples'; deviceId: string; samples: number[] }
  | { type: 'error'; error: DeviceError };

export type TransportListener = (event: TransportEvent) => void;

export interface CoordinatorSnapshot {
  connection: ConnectionStatus;
  recording: RecordingState;
  device: Device | null;
  discoveredDevices: readonly Device[];
  statusMessage: string;
  durationSeconds: number;
  countdown: number;
  remainingSeconds: number;
  currentHeartRate: number;
  heartRateHistory: readonly number[];
  heartRateVariability: HeartRateVariability | null;
  signalQuality: SignalQuality | null;
  sampleCount: number;
  activeSessionId: string | null;
  lastSession: Session | null;
  lastSavedSessionId: string | null;
  lastError: AppError | null;
}

export type CoordinatorNotice =
  | { type: 'stateChanged'; state: CoordinatorSnapshot }
  | { type: 'sessionCompleted'; session: Session }
  | { type: 'sessionAborted'; sessionId: string; reason: DeviceError; retained: Session | null }
  | { type: 'sessionSaved'; sessionId: string; storedId: string }
  | { type: 'error'; error: AppError };

export type CoordinatorListener = (notice: CoordinatorNotice) => void;
