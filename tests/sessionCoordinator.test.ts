import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RecordingConfig } from '../config.ts';
import { DeviceError, InvalidStateError, PersistenceError } from '../errors.ts';
import { silentLogger } from '../logger.ts';
import { BaseDeviceTransport, StreamDeviceTransport } from '../services/deviceTransport.ts';
import { mulberry32 } from '../services/ecgSimulator.ts';
import { SessionCoordinator } from '../services/sessionCoordinator.ts';
import { InMemorySessionStore, type SessionRepository } from '../services/sessionStore.ts';
import {
  ConnectionStatus,
  RecordingState,
  type CoordinatorNotice,
  type Device,
  type Session,
} from '../types.ts';

class FakeTransport extends BaseDeviceTransport {
  devices: Device[] = [
    { id: 'dev-1', name: 'BioAmp ECG', discoveredAt: 0 },
    { id: 'dev-2', name: 'Kitchen Speaker', discoveredAt: 0 },
  ];
  failConnect = false;
  disconnectCalls = 0;

  constructor() {
    super(silentLogger);
  }

  async startScan(): Promise<void> {
    this.emit({ type: 'discovered', devices: this.devices });
  }

  async stopScan(): Promise<void> {}

  async connect(deviceId: string): Promise<Device> {
    const device = this.devices.find((candidate) => candidate.id === deviceId);
    if (!device) throw new DeviceError('not-found', `Device ${deviceId} is not available`);
    if (this.failConnect) throw new DeviceError('connection-failed', 'Out of range');
    return device;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  push(samples: number[], deviceId = 'dev-1'): void {
    this.emit({ type: 'samples', deviceId, samples });
  }

  drop(deviceId = 'dev-1'): void {
    this.emit({ type: 'connectionChanged', deviceId, connected: false });
  }

  fault(error: DeviceError): void {
    this.emit({ type: 'error', error });
  }
}

const baseConfig: RecordingConfig = {
  sampleRateHz: 250,
  countdownSeconds: 3,
  defaultDurationSeconds: 30,
  minDurationSeconds: 10,
  maxDurationSeconds: 600,
  liveWindowSize: 5000,
  heartRateWindowSize: 1000,
  maxSessionSamples: 300_000,
  scanTimeoutMs: 30_000,
  partialSessions: 'discard',
  sampleEncoding: 'voltage',
  minSignalQuality: 30,
  poorSignalSeconds: 5,
};

// One spike per second at 250 Hz: 60 bpm.
const spikeBatch = (offset: number, count = 250): number[] =>
  Array.from({ length: count }, (_, i) => ((offset + i) % 250 === 100 ? 1 : 0));

interface Harness {
  transport: FakeTransport;
  store: InMemorySessionStore;
  coordinator: SessionCoordinator;
  notices: CoordinatorNotice[];
}

const createHarness = (config: Partial<RecordingConfig> = {}, store?: SessionRepository): Harness => {
  const transport = new FakeTransport();
  const memoryStore = new InMemorySessionStore();
  let nextId = 0;
  const coordinator = new SessionCoordinator({
    transport,
    config: { ...baseConfig, ...config },
    userId: 'user-1',
    logger: silentLogger,
    store: store ?? memoryStore,
    createId: () => `session-${++nextId}`,
  });
  const notices: CoordinatorNotice[] = [];
  coordinator.subscribe((notice) => notices.push(notice));
  return { transport, store: memoryStore, coordinator, notices };
};

const connected = async (config: Partial<RecordingConfig> = {}, store?: SessionRepository): Promise<Harness> => {
  const harness = createHarness(config, store);
  await harness.coordinator.connect('dev-1');
  harness.notices.length = 0;
  return harness;
};

const startRecording = (harness: Harness, durationSeconds?: number) => {
  harness.coordinator.start(durationSeconds);
  vi.advanceTimersByTime(3000);
};

const recordingStates = (notices: CoordinatorNotice[]): RecordingState[] => {
  const states: RecordingState[] = [];
  for (const notice of notices) {
    if (notice.type !== 'stateChanged') continue;
    if (states[states.length - 1] !== notice.state.recording) states.push(notice.state.recording);
  }
  return states;
};

const completedSessions = (notices: CoordinatorNotice[]): Session[] =>
  notices.flatMap((notice) => (notice.type === 'sessionCompleted' ? [notice.session] : []));

describe('SessionCoordinator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('recording lifecycle', () => {
    it('records a 30 second session of 250-sample batches into one sealed session', async () => {
      const harness = await connected();
      const { coordinator, transport, notices, store } = harness;

      startRecording(harness, 30);
      expect(coordinator.getState().recording).toBe(RecordingState.RECORDING);

      for (let second = 0; second < 30; second++) {
        transport.push(spikeBatch(second * 250));
        vi.advanceTimersByTime(1000);
      }

      expect(recordingStates(notices)).toEqual([
        RecordingState.IDLE,
        RecordingState.COUNTDOWN,
        RecordingState.RECORDING,
        RecordingState.PROCESSING,
        RecordingState.COMPLETED,
      ]);

      const sessions = completedSessions(notices);
      expect(sessions).toHaveLength(1);
      const [session] = sessions;
      expect(session.id).toBe('session-1');
      expect(session.sampleCount).toBe(7500);
      expect(session.samples).toHaveLength(7500);
      expect(session.durationSeconds).toBe(30);
      expect(session.heartRates).toHaveLength(29);
      expect(session.heartRate).toEqual({ average: 60, min: 60, max: 60 });
      expect(session.rhythm).toBe('Normal');
      expect(session.heartRateVariability).toEqual({
        meanRrMs: 1000,
        sdnnMs: 0,
        rmssdMs: 0,
        irregularityRatio: 0,
        rhythmStability: 100,
      });
      expect(session.signalQuality).toMatchObject({ snrDb: -3, baselineStability: 99, artifactScore: 98.4 });
      expect(session.signalQuality?.score).toBeGreaterThan(90);
      expect(session.status).toBe('completed');
      expect(session.sealed).toBe(true);
      expect(Object.isFrozen(session)).toBe(true);

      await coordinator.flush();
      const state = coordinator.getState();
      expect(state.recording).toBe(RecordingState.COMPLETED);
      expect(state.lastSession).toBe(session);
      expect(state.lastSavedSessionId).toBe('session-1');
      expect(state.heartRateHistory).toHaveLength(29);
      expect(notices.filter((notice) => notice.type === 'sessionSaved')).toEqual([
        { type: 'sessionSaved', sessionId: 'session-1', storedId: 'session-1' },
      ]);

      const stored = await store.listSessions('user-1');
      expect(stored.map((summary) => [summary.id, summary.sessionNumber, summary.sampleCount])).toEqual([
        ['session-1', 1, 7500],
      ]);
    });

    it('counts the countdown down before opening a session', async () => {
      const { coordinator } = await connected();

      coordinator.start(20);
      expect(coordinator.getState()).toMatchObject({ recording: RecordingState.COUNTDOWN, countdown: 3 });

      vi.advanceTimersByTime(1000);
      expect(coordinator.getState()).toMatchObject({ countdown: 2, activeSessionId: null });

      vi.advanceTimersByTime(2000);
      expect(coordinator.getState()).toMatchObject({
        recording: RecordingState.RECORDING,
        remainingSeconds: 20,
        activeSessionId: 'session-1',
      });
    });

    it('starts recording immediately when the countdown is disabled', async () => {
      const { coordinator } = await connected({ countdownSeconds: 0 });
      coordinator.start();
      expect(coordinator.getState()).toMatchObject({
        recording: RecordingState.RECORDING,
        remainingSeconds: 30,
      });
    });

    it('clamps the requested duration to the configured range', async () => {
      const { coordinator } = await connected();

      coordinator.start(5);
      expect(coordinator.getState().durationSeconds).toBe(10);
      coordinator.stop();

      coordinator.start(10_000);
      expect(coordinator.getState().durationSeconds).toBe(600);
    });

    it('rejects a non-finite duration', async () => {
      const { coordinator } = await connected();
      expect(() => coordinator.start(Number.NaN)).toThrow(RangeError);
      expect(coordinator.getState().recording).toBe(RecordingState.IDLE);
    });

    it('ends the recording early on stop and seals what was captured', async () => {
      const harness = await connected();
      startRecording(harness);
      harness.transport.push(spikeBatch(0));
      harness.transport.push(spikeBatch(250));

      harness.coordinator.stop();

      const [session] = completedSessions(harness.notices);
      expect(session.sampleCount).toBe(500);
      expect(harness.coordinator.getState()).toMatchObject({
        recording: RecordingState.COMPLETED,
        activeSessionId: null,
        statusMessage: 'ECG recording completed',
      });
    });

    it('returns to idle on reset and can record again', async () => {
      const harness = await connected();
      startRecording(harness);
      harness.coordinator.stop();

      harness.coordinator.reset();
      expect(harness.coordinator.getState()).toMatchObject({
        recording: RecordingState.IDLE,
        statusMessage: 'Ready to record',
      });

      startRecording(harness);
      expect(harness.coordinator.getState().activeSessionId).toBe('session-2');
    });
  });

  describe('invalid requests', () => {
    it('refuses to start without a connected device', () => {
      const { coordinator } = createHarness();
      expect(() => coordinator.start()).toThrow(InvalidStateError);
      expect(coordinator.getState().recording).toBe(RecordingState.IDLE);
    });

    it('refuses to start a second recording while one is active', async () => {
      const harness = await connected();
      startRecording(harness);

      expect(() => harness.coordinator.start()).toThrow('Cannot start recording while connected and recording');
      expect(harness.coordinator.getState().activeSessionId).toBe('session-1');
    });

    it('requires reset before starting after a completed session', async () => {
      const harness = await connected();
      startRecording(harness);
      harness.coordinator.stop();

      expect(() => harness.coordinator.start()).toThrow(InvalidStateError);
    });

    it('treats stop while idle as a no-op', async () => {
      const { coordinator, notices } = await connected();
      const before = coordinator.getState();

      coordinator.stop();

      expect(coordinator.getState()).toBe(before);
      expect(notices).toEqual([]);
    });

    it('refuses to scan while connected', async () => {
      const { coordinator } = await connected();
      await expect(coordinator.scan()).rejects.toBeInstanceOf(InvalidStateError);
      expect(coordinator.getState().connection).toBe(ConnectionStatus.CONNECTED);
    });
  });

  describe('countdown cancellation', () => {
    it('cancels the countdown on stop without opening a session', async () => {
      const { coordinator, notices } = await connected();

      coordinator.start();
      vi.advanceTimersByTime(1000);
      coordinator.stop();

      expect(coordinator.getState()).toMatchObject({
        recording: RecordingState.IDLE,
        statusMessage: 'Recording cancelled',
        activeSessionId: null,
      });

      vi.advanceTimersByTime(10_000);
      expect(coordinator.getState().recording).toBe(RecordingState.IDLE);
      expect(completedSessions(notices)).toEqual([]);
    });

    it('ignores ticks from a cancelled countdown after a restart', async () => {
      const { coordinator } = await connected();

      coordinator.start();
      vi.advanceTimersByTime(2500);
      coordinator.stop();
      coordinator.start();

      vi.advanceTimersByTime(1000);
      expect(coordinator.getState()).toMatchObject({ recording: RecordingState.COUNTDOWN, countdown: 2 });
      vi.advanceTimersByTime(2000);
      expect(coordinator.getState().recording).toBe(RecordingState.RECORDING);
    });
  });

  describe('samples', () => {
    it('ignores samples outside a recording', async () => {
      const { coordinator, transport } = await connected();

      transport.push(spikeBatch(0));
      coordinator.start();
      transport.push(spikeBatch(0));

      expect(coordinator.getState().sampleCount).toBe(0);
    });

    it('ignores samples from a device other than the connected one', async () => {
      const harness = await connected();
      startRecording(harness);

      harness.transport.push(spikeBatch(0), 'dev-2');
      expect(harness.coordinator.getState().sampleCount).toBe(0);
    });

    it('reports the live heart rate once two seconds of signal exist', async () => {
      const harness = await connected();
      startRecording(harness);

      harness.transport.push(spikeBatch(0));
      expect(harness.coordinator.getState().currentHeartRate).toBe(0);

      harness.transport.push(spikeBatch(250));
      expect(harness.coordinator.getState()).toMatchObject({ currentHeartRate: 60, heartRateHistory: [60] });
      expect(harness.coordinator.liveWindow()).toHaveLength(500);
    });

    it('publishes live variability and signal quality over the heart rate window', async () => {
      const harness = await connected();
      startRecording(harness);

      harness.transport.push(spikeBatch(0));
      expect(harness.coordinator.getState().signalQuality).toBeNull();

      harness.transport.push(spikeBatch(250));
      // Two peaks give one RR interval: not enough for variability yet.
      expect(harness.coordinator.getState().heartRateVariability).toBeNull();
      expect(harness.coordinator.getState().signalQuality?.baselineStability).toBe(99);

      harness.transport.push(spikeBatch(500));
      harness.transport.push(spikeBatch(750));
      expect(harness.coordinator.getState().heartRateVariability).toEqual({
        meanRrMs: 1000,
        sdnnMs: 0,
        rmssdMs: 0,
        irregularityRatio: 0,
        rhythmStability: 100,
      });
    });

    it('drops non-finite readings without ending the recording', async () => {
      const harness = await connected();
      startRecording(harness);

      harness.transport.push([0.1, Number.POSITIVE_INFINITY, Number.NaN, 0.2]);

      expect(harness.coordinator.getState()).toMatchObject({ recording: RecordingState.RECORDING, sampleCount: 2 });
      harness.coordinator.stop();
      expect(completedSessions(harness.notices)[0].samples).toEqual([0.1, 0.2]);
    });

    it('aborts the recording when the signal stays poor', async () => {
      const harness = await connected({ minSignalQuality: 95, poorSignalSeconds: 2 });
      startRecording(harness);

      harness.transport.push(spikeBatch(0));
      harness.transport.push(spikeBatch(250));
      expect(harness.coordinator.getState().recording).toBe(RecordingState.RECORDING);

      harness.transport.push(spikeBatch(500));

      const state = harness.coordinator.getState();
      expect(state).toMatchObject({
        connection: ConnectionStatus.CONNECTED,
        recording: RecordingState.IDLE,
        activeSessionId: null,
        signalQuality: null,
      });
      expect(state.lastError).toHaveProperty('kind', 'signal-poor');
      const aborted = harness.notices.find((notice) => notice.type === 'sessionAborted');
      expect(aborted?.type === 'sessionAborted' && aborted.reason.kind).toBe('signal-poor');
    });

    it('stops automatically when the session sample limit is reached', async () => {
      const harness = await connected({ maxSessionSamples: 600 });
      startRecording(harness);

      harness.transport.push(spikeBatch(0));
      harness.transport.push(spikeBatch(250));
      harness.transport.push(spikeBatch(500));

      const [session] = completedSessions(harness.notices);
      expect(session.sampleCount).toBe(600);
      expect(harness.coordinator.getState()).toMatchObject({
        recording: RecordingState.COMPLETED,
        statusMessage: 'ECG recording completed (sample limit reached)',
      });
    });
  });

  describe('device loss', () => {
    it('aborts the recording and discards the partial session by default', async () => {
      const harness = await connected();
      startRecording(harness);
      harness.transport.push(spikeBatch(0));

      harness.transport.drop();

      const state = harness.coordinator.getState();
      expect(state).toMatchObject({
        connection: ConnectionStatus.DISCONNECTED,
        recording: RecordingState.IDLE,
        device: null,
        activeSessionId: null,
        sampleCount: 0,
      });
      expect(state.lastError).toBeInstanceOf(DeviceError);
      expect(state.lastError?.code).toBe('device/connection-lost');

      const aborted = harness.notices.find((notice) => notice.type === 'sessionAborted');
      expect(aborted).toMatchObject({ sessionId: 'session-1', retained: null });
      expect(completedSessions(harness.notices)).toEqual([]);

      await harness.coordinator.flush();
      expect(await harness.store.listSessions('user-1')).toEqual([]);
    });

    it('keeps and stores the partial session when configured to', async () => {
      const harness = await connected({ partialSessions: 'keep' });
      startRecording(harness);
      harness.transport.push(spikeBatch(0));
      harness.transport.push(spikeBatch(250));

      harness.transport.drop();

      const aborted = harness.notices.find((notice) => notice.type === 'sessionAborted');
      expect(aborted?.type === 'sessionAborted' && aborted.retained?.status).toBe('aborted');
      expect(harness.coordinator.getState().lastSession?.sampleCount).toBe(500);

      await harness.coordinator.flush();
      const stored = await harness.store.listSessions('user-1');
      expect(stored.map((summary) => [summary.id, summary.status, summary.sampleCount])).toEqual([
        ['session-1', 'aborted', 500],
      ]);
    });

    it('cancels a countdown when the device drops', async () => {
      const { coordinator, transport, notices } = await connected();

      coordinator.start();
      transport.drop();
      vi.advanceTimersByTime(5000);

      expect(coordinator.getState().recording).toBe(RecordingState.IDLE);
      expect(notices.some((notice) => notice.type === 'sessionAborted')).toBe(false);
      expect(coordinator.getState().lastError?.code).toBe('device/connection-lost');
    });

    it('aborts on a device fault but stays connected', async () => {
      const harness = await connected();
      startRecording(harness);

      harness.transport.fault(new DeviceError('signal-poor', 'Electrode contact lost'));

      expect(harness.coordinator.getState()).toMatchObject({
        connection: ConnectionStatus.CONNECTED,
        recording: RecordingState.IDLE,
        statusMessage: 'Electrode contact lost',
      });
      expect(harness.notices.some((notice) => notice.type === 'sessionAborted')).toBe(true);
    });

    it('does not flag an error on a requested disconnect while idle', async () => {
      const { coordinator, transport, notices } = await connected();

      await coordinator.disconnect();

      expect(transport.disconnectCalls).toBe(1);
      expect(coordinator.getState()).toMatchObject({ connection: ConnectionStatus.DISCONNECTED, lastError: null });
      expect(notices.some((notice) => notice.type === 'error')).toBe(false);
    });
  });

  describe('scanning and connecting', () => {
    it('lists only devices that look like ECG sensors', async () => {
      const { coordinator } = createHarness();

      await coordinator.scan();

      expect(coordinator.getState()).toMatchObject({
        connection: ConnectionStatus.SCANNING,
        statusMessage: '1 ECG device(s) found',
      });
      expect(coordinator.getState().discoveredDevices.map((device) => device.id)).toEqual(['dev-1']);
    });

    it('stops scanning after the scan timeout', async () => {
      const { coordinator } = createHarness();
      await coordinator.scan();

      await vi.advanceTimersByTimeAsync(30_000);

      expect(coordinator.getState()).toMatchObject({
        connection: ConnectionStatus.DISCONNECTED,
        statusMessage: 'Scan completed',
      });
    });

    it('connects to a discovered device', async () => {
      const { coordinator } = createHarness();
      await coordinator.scan();

      const device = await coordinator.connect('dev-1');

      expect(device.name).toBe('BioAmp ECG');
      expect(coordinator.getState()).toMatchObject({
        connection: ConnectionStatus.CONNECTED,
        statusMessage: 'Connected to BioAmp ECG',
      });
    });

    it('closes a device that finishes opening after the connection was cancelled', async () => {
      let release: (stream: PassThrough) => void = () => {};
      const transport = new StreamDeviceTransport({
        devices: [{ id: 'port-1', name: 'HM-10 ECG', discoveredAt: 0 }],
        open: () =>
          new Promise<PassThrough>((resolve) => {
            release = resolve;
          }),
        logger: silentLogger,
      });
      const coordinator = new SessionCoordinator({
        transport,
        config: baseConfig,
        userId: 'user-1',
        logger: silentLogger,
      });

      const pending = coordinator.connect('port-1');
      const outcome = expect(pending).rejects.toThrow('Connection cancelled');
      await coordinator.disconnect();
      expect(coordinator.getState()).toMatchObject({
        connection: ConnectionStatus.DISCONNECTED,
        statusMessage: 'Connection cancelled',
      });

      const stream = new PassThrough();
      release(stream);
      await outcome;

      expect(stream.destroyed).toBe(true);
      expect(coordinator.getState()).toMatchObject({ connection: ConnectionStatus.DISCONNECTED, device: null });
    });

    it('reports a failed connection', async () => {
      const { coordinator, transport, notices } = createHarness();
      transport.failConnect = true;

      await expect(coordinator.connect('dev-1')).rejects.toThrow('Out of range');

      expect(coordinator.getState()).toMatchObject({ connection: ConnectionStatus.ERROR, device: null });
      expect(coordinator.getState().lastError?.code).toBe('device/connection-failed');
      expect(notices.some((notice) => notice.type === 'error')).toBe(true);
    });
  });

  describe('persistence and listeners', () => {
    it('surfaces a failed save as an error notice', async () => {
      const failingStore: SessionRepository = {
        saveSession: () => Promise.reject(new Error('disk full')),
        listSessions: async () => [],
        getSession: async () => undefined,
        renameSession: async () => {},
        deleteSession: async () => {},
      };
      const harness = await connected({}, failingStore);
      startRecording(harness);
      harness.coordinator.stop();

      await harness.coordinator.flush();

      const state = harness.coordinator.getState();
      expect(state.recording).toBe(RecordingState.COMPLETED);
      expect(state.lastSavedSessionId).toBeNull();
      expect(state.lastError).toBeInstanceOf(PersistenceError);
      expect(state.lastError?.message).toBe('Failed to save session: disk full');
    });

    it('keeps notifying other listeners when one throws', async () => {
      const harness = await connected();
      harness.coordinator.subscribe(() => {
        throw new Error('listener failure');
      });

      startRecording(harness);

      expect(harness.coordinator.getState().recording).toBe(RecordingState.RECORDING);
      expect(recordingStates(harness.notices)).toContain(RecordingState.RECORDING);
    });

    it('stops delivering notices after dispose', async () => {
      const harness = await connected();
      startRecording(harness);
      const delivered = harness.notices.length;

      harness.coordinator.dispose();
      harness.transport.push(spikeBatch(0));
      vi.advanceTimersByTime(5000);

      expect(harness.notices).toHaveLength(delivered);
    });
  });

  describe('random operation sequences', () => {
    const recordingStatesAll = Object.values(RecordingState);

    it.each([1, 7, 42, 2024, 9001])('keeps its invariants for seed %i', async (seed) => {
      const random = mulberry32(seed);
      const harness = createHarness({ maxSessionSamples: 2000 });
      const { coordinator, transport, notices } = harness;
      await coordinator.connect('dev-1');
      let offset = 0;

      for (let step = 0; step < 300; step++) {
        switch (Math.floor(random() * 9)) {
          case 0:
            try {
              coordinator.start(10);
            } catch (error) {
              if (!(error instanceof InvalidStateError)) throw error;
            }
            break;
          case 1:
            coordinator.stop();
            break;
          case 2:
            coordinator.reset();
            break;
          case 3:
            transport.drop();
            break;
          case 4:
            if (coordinator.getState().connection === ConnectionStatus.DISCONNECTED) {
              await coordinator.connect('dev-1');
            }
            break;
          case 5:
            await coordinator.disconnect();
            break;
          case 6:
            transport.fault(new DeviceError('signal-poor', 'Electrode contact lost'));
            break;
          case 7:
            transport.push(spikeBatch(offset));
            offset += 250;
            break;
          default:
            vi.advanceTimersByTime(Math.floor(random() * 3000));
        }

        const opened = new Set<string>();
        const finished: string[] = [];
        for (const notice of notices) {
          if (notice.type === 'stateChanged' && notice.state.activeSessionId) opened.add(notice.state.activeSessionId);
          if (notice.type === 'sessionCompleted') finished.push(notice.session.id);
          if (notice.type === 'sessionAborted') finished.push(notice.sessionId);
        }

        expect(recordingStatesAll).toContain(coordinator.getState().recording);
        expect(finished.length).toBeLessThanOrEqual(opened.size);
        expect(new Set(finished).size).toBe(finished.length);
        for (const id of finished) expect(opened.has(id)).toBe(true);
      }
    });
  });
});
