import { DeviceError } from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { Device, ECGDataPoint, SimulationConfig } from '../types.ts';
import { BaseDeviceTransport } from './deviceTransport.ts';

// Mulberry32: small seeded PRNG so simulated recordings are reproducible.
export const mulberry32 = (seed: number): (() => number) => {
  let state = seed;
  return () => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

// Mathematical simulation of a PQRST complex using Gaussian functions
export const generateECGSignal = (
  timeMs: number,
  bpm: number = 60,
  noiseLevel: number = 0.05,
  random: () => number = Math.random,
): number => {
  const beatDuration = 60000 / bpm;
  const t = (timeMs % beatDuration) / beatDuration; // Normalized time 0 to 1 within a beat

  // P wave
  const pWave = 0.15 * Math.exp(-Math.pow((t - 0.2) / 0.03, 2));

  // QRS Complex
  const qWave = -0.15 * Math.exp(-Math.pow((t - 0.38) / 0.02, 2));
  const rWave = 1.0 * Math.exp(-Math.pow((t - 0.4) / 0.02, 2));
  const sWave = -0.25 * Math.exp(-Math.pow((t - 0.42) / 0.02, 2));

  // T wave
  const tWave = 0.3 * Math.exp(-Math.pow((t - 0.7) / 0.08, 2));

  // Baseline drift and high frequency noise
  const noise = noiseLevel === 0 ? 0 : (random() - 0.5) * noiseLevel;
  const drift = 0.05 * Math.sin(timeMs / 2000);

  return pWave + qWave + rWave + sWave + tWave + noise + drift;
};

export const DEFAULT_SIMULATION: SimulationConfig = {
  bpm: 72,
  noiseLevel: 0.05,
  sampleRateHz: 250,
  batchIntervalMs: 100,
};

export const SIMULATED_DEVICE_ID = 'sim-ecg-01';

/**
 * Produces consecutive samples of the synthetic signal at a fixed rate,
 * tracking its own time base so batches line up with no gaps.
 */
export class ECGSimulator {
  private elapsedMs = 0;
  private readonly config: SimulationConfig;
  private readonly random: () => number;

  constructor(config: Partial<SimulationConfig> = {}) {
    this.config = { ...DEFAULT_SIMULATION, ...config };
    this.random = this.config.seed === undefined ? Math.random : mulberry32(this.config.seed);
  }

  setBPM(bpm: number) {
    this.config.bpm = bpm;
  }

  reset() {
    this.elapsedMs = 0;
  }

  nextBatch(count: number): ECGDataPoint[] {
    const stepMs = 1000 / this.config.sampleRateHz;
    const points: ECGDataPoint[] = [];
    for (let i = 0; i < count; i++) {
      const voltage = generateECGSignal(this.elapsedMs, this.config.bpm, this.config.noiseLevel, this.random);
      points.push({ time: this.elapsedMs, voltage });
      this.elapsedMs += stepMs;
    }
    return points;
  }
}

/**
 * A transport backed by the simulator, for demos and for running the session
 * pipeline without hardware.
 */
export class SimulatedEcgTransport extends BaseDeviceTransport {
  private readonly config: SimulationConfig;
  private readonly simulator: ECGSimulator;
  private streamTimer: ReturnType<typeof setInterval> | null = null;
  private connectedId: string | null = null;
  readonly device: Device;

  constructor(logger: Logger, config: Partial<SimulationConfig> = {}) {
    super(logger);
    this.config = { ...DEFAULT_SIMULATION, ...config };
    this.simulator = new ECGSimulator(this.config);
    this.device = { id: SIMULATED_DEVICE_ID, name: 'BioAmp ECG Simulator', rssi: -40, discoveredAt: Date.now() };
  }

  async startScan(): Promise<void> {
    this.emit({ type: 'discovered', devices: [{ ...this.device, discoveredAt: Date.now() }] });
  }

  async stopScan(): Promise<void> {
    // The simulated device is advertised once per scan.
  }

  async connect(deviceId: string): Promise<Device> {
    if (deviceId !== this.device.id) {
      throw new DeviceError('not-found', `Device ${deviceId} is not available`);
    }
    if (this.connectedId) return this.device;

    this.connectedId = deviceId;
    this.simulator.reset();
    this.emit({ type: 'connectionChanged', deviceId, connected: true });

    const batchSize = Math.max(1, Math.round((this.config.sampleRateHz * this.config.batchIntervalMs) / 1000));
    this.streamTimer = setInterval(() => {
      const samples = this.simulator.nextBatch(batchSize).map((point) => point.voltage);
      this.emit({ type: 'samples', deviceId, samples });
    }, this.config.batchIntervalMs);

    this.logger.info(`Connected to ${this.device.name}`);
    return this.device;
  }

  async disconnect(): Promise<void> {
    if (!this.connectedId) return;
    const deviceId = this.connectedId;
    this.stopStreaming();
    this.logger.info(`Device ${this.device.name} is disconnected.`);
    this.emit({ type: 'connectionChanged', deviceId, connected: false });
  }

  /** Drops the connection as if the sensor went out of range. */
  simulateConnectionLoss(): void {
    if (!this.connectedId) return;
    const deviceId = this.connectedId;
    this.stopStreaming();
    this.logger.warn(`Lost connection to ${this.device.name}`);
    this.emit({ type: 'connectionChanged', deviceId, connected: false });
  }

  private stopStreaming() {
    if (this.streamTimer) clearInterval(this.streamTimer);
    this.streamTimer = null;
    this.connectedId = null;
  }
}
