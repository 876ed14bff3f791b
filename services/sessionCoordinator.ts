import { v4 as uuidv4 } from 'uuid';
import type { RecordingConfig } from '../config.ts';
import { AppError, DeviceError, InvalidStateError, PersistenceError, toAppError, toErrorMessage } from '../errors.ts';
import type { DeviceErrorKind } from '../errors.ts';
import type { Logger } from '../logger.ts';
import {
  ConnectionStatus,
  RecordingState,
  type CoordinatorListener,
  type CoordinatorNotice,
  type CoordinatorSnapshot,
  type Device,
  type Session,
  type SessionStatus,
  type TransportEvent,
} from '../types.ts';
import { isLikelyEcgDevice, type DeviceTransport } from './deviceTransport.ts';
import { SampleBuffer } from './sampleBuffer.ts';
import type { SessionRepository } from './sessionStore.ts';
import { classifyHeartRate, summarizeHeartRates } from './sessionStatistics.ts';
import { assessSignalQuality, heartRateVariability } from './signalMetrics.ts';

const HEART_RATE_HISTORY_LIMIT = 100;
const TICK_MS = 1000;

type StopReason = 'user' | 'elapsed' | 'capacity';

type CoordinatorEvent =
  | { type: 'scanStarted' }
  | { type: 'scanStopped' }
  | { type: 'scanFailed'; error: DeviceError }
  | { type: 'devicesDiscovered'; devices: Device[] }
  | { type: 'connectRequested'; deviceId: string }
  | { type: 'deviceConnected'; device: Device }
  | { type: 'connectFailed'; error: DeviceError }
  | { type: 'connectCancelled' }
  | { type: 'deviceDisconnected'; deviceId: string; expected: boolean }
  | { type: 'deviceFault'; error: DeviceError }
  | { type: 'startRequested'; durationSeconds?: number }
  | { type: 'stopRequested'; reason: StopReason }
  | { type: 'resetRequested' }
  | { type: 'countdownTick'; generation: number }
  | { type: 'recordingTick'; generation: number }
  | { type: 'samplesReceived'; samples: number[] }
  | { type: 'sessionPersisted'; sessionId: string; storedId: string }
  | { type: 'persistenceFailed'; sessionId: string; error: AppError };

interface OpenSession {
  id: string;
  deviceId: string;
  startedAt: number;
}

export interface SessionCoordinatorOptions {
  transport: DeviceTransport;
  config: RecordingConfig;
  userId: string;
  logger: Logger;
  store?: SessionRepository;
  now?: () => number;
  createId?: () => string;
}

const toDeviceError = (error: unknown, kind: DeviceErrorKind): DeviceError =>
  error instanceof DeviceError ? error : new DeviceError(kind, toErrorMessage(error), error);

const initialState = (config: RecordingConfig): CoordinatorSnapshot => ({
  connection: ConnectionStatus.DISCONNECTED,
  recording: RecordingState.IDLE,
  device: null,
  discoveredDevices: [],
  statusMessage: 'Ready to scan for ECG devices',
  durationSeconds: config.defaultDurationSeconds,
  countdown: config.countdownSeconds,
  remainingSeconds: 0,
  currentHeartRate: 0,
  heartRateHistory: [],
  heartRateVariability: null,
  signalQuality: null,
  sampleCount: 0,
  activeSessionId: null,
  lastSession: null,
  lastSavedSessionId: null,
  lastError: null,
});

/**
 * Owns one ECG capture at a time: device discovery and connection, the
 * countdown, the recording itself and the hand-off of the sealed session to
 * the store.
 *
 * Every input (public calls, timer ticks, transport events, store results) is
 * turned into a CoordinatorEvent and applied from a queue, one event at a
 * time. Events raised while a transition runs are applied after it, and
 * listeners are notified only once the queue is empty.
 */
export class SessionCoordinator {
  private state: CoordinatorSnapshot;
  private readonly transport: DeviceTransport;
  private readonly config: RecordingConfig;
  private readonly userId: string;
  private readonly logger: Logger;
  private readonly store: SessionRepository | null;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly buffer: SampleBuffer;
  private readonly unsubscribeTransport: () => void;

  private listeners = new Set<CoordinatorListener>();
  private queue: CoordinatorEvent[] = [];
  private outbox: CoordinatorNotice[] = [];
  private draining = false;
  private flushing = false;
  private disposed = false;

  private activeSession: OpenSession | null = null;
  private sessionHeartRates: number[] = [];
  private poorSignalSamples = 0;
  private pendingSaves = new Set<Promise<void>>();

  // Bumped whenever timers are cancelled, so a tick already in flight is ignored.
  private generation = 0;
  private countdownTimer: ReturnType<typeof setInterval> | null = null;
  private recordingTimer: ReturnType<typeof setInterval> | null = null;
  private scanTimer: ReturnType<typeof setTimeout> | null = null;
  private connectAttempt = 0;

  constructor(options: SessionCoordinatorOptions) {
    this.transport = options.transport;
    this.config = options.config;
    this.userId = options.userId;
    this.logger = options.logger;
    this.store = options.store ?? null;
    this.now = options.now ?? (() => Date.now());
    this.createId = options.createId ?? (() => uuidv4());
    this.state = initialState(options.config);
    this.buffer = new SampleBuffer({
      sampleRateHz: options.config.sampleRateHz,
      capacity: options.config.maxSessionSamples,
      liveWindowSize: options.config.liveWindowSize,
      heartRateWindowSize: options.config.heartRateWindowSize,
    });
    this.unsubscribeTransport = this.transport.subscribe((event) => this.onTransportEvent(event));
  }

  getState(): CoordinatorSnapshot {
    return this.state;
  }

  /** The most recent samples of the current (or last) recording, for display. */
  liveWindow(): number[] {
    return this.buffer.liveWindow();
  }

  subscribe(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async scan(): Promise<void> {
    if (this.state.connection === ConnectionStatus.SCANNING) return;
    this.dispatch({ type: 'scanStarted' });

    try {
      await this.transport.startScan();
    } catch (error) {
      const deviceError = toDeviceError(error, 'not-found');
      this.dispatch({ type: 'scanFailed', error: deviceError });
      throw deviceError;
    }
  }

  async stopScan(): Promise<void> {
    if (this.state.connection !== ConnectionStatus.SCANNING) return;
    this.dispatch({ type: 'scanStopped' });

    try {
      await this.transport.stopScan();
    } catch (error) {
      // A failed stop leaves nothing to undo on our side.
      this.logger.warn('Failed to stop ECG scan', error);
    }
  }

  /** Connects to a discovered device. Rejects with a DeviceError when the connection fails. */
  async connect(deviceId: string): Promise<Device> {
    const wasScanning = this.state.connection === ConnectionStatus.SCANNING;
    this.dispatch({ type: 'connectRequested', deviceId });
    const attempt = ++this.connectAttempt;

    if (wasScanning) {
      try {
        await this.transport.stopScan();
      } catch (error) {
        this.logger.warn('Failed to stop ECG scan before connecting', error);
      }
    }

    let device: Device;
    try {
      device = await this.transport.connect(deviceId);
    } catch (error) {
      const deviceError = toDeviceError(error, 'connection-failed');
      if (attempt === this.connectAttempt) this.dispatch({ type: 'connectFailed', error: deviceError });
      throw deviceError;
    }

    if (attempt !== this.connectAttempt) {
      // Cancelled by disconnect() while the transport was opening.
      const { connection } = this.state;
      if (connection !== ConnectionStatus.CONNECTING && connection !== ConnectionStatus.CONNECTED) {
        await this.transport.disconnect();
      }
      this.logger.debug(`Connection to ${device.name} cancelled`);
      throw new DeviceError('connection-failed', 'Connection cancelled');
    }
    this.dispatch({ type: 'deviceConnected', device });
    return device;
  }

  async disconnect(): Promise<void> {
    const device = this.state.device;
    this.connectAttempt++;
    if (device) this.dispatch({ type: 'deviceDisconnected', deviceId: device.id, expected: true });
    else this.dispatch({ type: 'connectCancelled' });
    await this.transport.disconnect();
  }

  /**
   * Begins the countdown for a new recording. The duration is clamped to the
   * configured range. Requires a connected device and an idle recorder.
   */
  start(durationSeconds?: number): void {
    this.dispatch({ type: 'startRequested', durationSeconds });
  }

  /** Ends the recording (or cancels the countdown). A no-op when nothing is in progress. */
  stop(): void {
    this.dispatch({ type: 'stopRequested', reason: 'user' });
  }

  /** Returns a completed recorder to idle so the next recording can start. */
  reset(): void {
    this.dispatch({ type: 'resetRequested' });
  }

  /** Waits for sessions already handed to the store. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingSaves]);
  }

  dispose(): void {
    if (this.disposed) return;
    if (this.activeSession) {
      this.logger.warn(`Coordinator disposed while recording; session ${this.activeSession.id} discarded`);
    }
    this.cancelTimers();
    this.clearScanTimer();
    this.unsubscribeTransport();
    this.activeSession = null;
    this.buffer.reset();
    this.queue = [];
    this.outbox = [];
    this.listeners.clear();
    this.disposed = true;
  }

  private onTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case 'discovered': {
        const devices = event.devices.filter((device) => isLikelyEcgDevice(device.name));
        if (devices.length > 0) this.dispatch({ type: 'devicesDiscovered', devices });
        break;
      }
      case 'connectionChanged':
        // Connections are confirmed by connect(); only drops are events here.
        if (!event.connected) this.dispatch({ type: 'deviceDisconnected', deviceId: event.deviceId, expected: false });
        break;
      case 'samples':
        if (event.deviceId === this.state.device?.id) this.dispatch({ type: 'samplesReceived', samples: event.samples });
        break;
      case 'error':
        this.dispatch({ type: 'deviceFault', error: event.error });
        break;
    }
  }

  private dispatch(event: CoordinatorEvent): void {
    if (this.disposed) return;
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    let failure: InvalidStateError | null = null;
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        try {
          this.apply(next);
        } catch (error) {
          if (!(error instanceof InvalidStateError)) throw error;
          if (next === event) {
            failure = error;
          } else {
            this.logger.error('Queued request rejected', error);
            this.notify({ type: 'error', error });
          }
        }
      }
    } finally {
      this.draining = false;
    }

    this.flushNotices();
    if (failure) throw failure;
  }

  private apply(event: CoordinatorEvent): void {
    switch (event.type) {
      case 'scanStarted':
        return this.onScanStarted();
      case 'scanStopped':
        return this.onScanStopped();
      case 'scanFailed':
        return this.onScanFailed(event.error);
      case 'devicesDiscovered':
        return this.onDevicesDiscovered(event.devices);
      case 'connectRequested':
        return this.onConnectRequested(event.deviceId);
      case 'deviceConnected':
        return this.onDeviceConnected(event.device);
      case 'connectFailed':
        return this.onConnectFailed(event.error);
      case 'connectCancelled':
        return this.onConnectCancelled();
      case 'deviceDisconnected':
        return this.onDeviceDisconnected(event.deviceId, event.expected);
      case 'deviceFault':
        return this.onDeviceFault(event.error);
      case 'startRequested':
        return this.onStartRequested(event.durationSeconds);
      case 'stopRequested':
        return this.onStopRequested(event.reason);
      case 'resetRequested':
        return this.onResetRequested();
      case 'countdownTick':
        return this.onCountdownTick(event.generation);
      case 'recordingTick':
        return this.onRecordingTick(event.generation);
      case 'samplesReceived':
        return this.onSamplesReceived(event.samples);
      case 'sessionPersisted':
        return this.onSessionPersisted(event.sessionId, event.storedId);
      case 'persistenceFailed':
        return this.onPersistenceFailed(event.sessionId, event.error);
    }
  }

  // Connection lifecycle

  private onScanStarted(): void {
    const { connection } = this.state;
    if (connection === ConnectionStatus.CONNECTED || connection === ConnectionStatus.CONNECTING) {
      throw new InvalidStateError('scan', this.describe(), 'Disconnect the current device before scanning');
    }
    this.logger.debug('Starting ECG device scan...');
    this.setState({
      connection: ConnectionStatus.SCANNING,
      discoveredDevices: [],
      statusMessage: 'Scanning for ECG devices...',
    });

    this.clearScanTimer();
    this.scanTimer = setTimeout(() => {
      this.scanTimer = null;
      void this.stopScan();
    }, this.config.scanTimeoutMs);
  }

  private onScanStopped(): void {
    if (this.state.connection !== ConnectionStatus.SCANNING) return;
    this.clearScanTimer();
    this.setState({
      connection: ConnectionStatus.DISCONNECTED,
      statusMessage: this.state.discoveredDevices.length === 0 ? 'No ECG devices found' : 'Scan completed',
    });
  }

  private onScanFailed(error: DeviceError): void {
    this.clearScanTimer();
    this.logger.error('Failed to start ECG scan', error);
    this.setState({ connection: ConnectionStatus.ERROR, statusMessage: error.message, lastError: error });
    this.notify({ type: 'error', error });
  }

  private onDevicesDiscovered(devices: Device[]): void {
    const merged = new Map(this.state.discoveredDevices.map((device) => [device.id, device]));
    for (const device of devices) merged.set(device.id, device);
    const discoveredDevices = [...merged.values()];

    this.setState({
      discoveredDevices,
      statusMessage:
        this.state.connection === ConnectionStatus.SCANNING
          ? `${discoveredDevices.length} ECG device(s) found`
          : this.state.statusMessage,
    });
  }

  private onConnectRequested(deviceId: string): void {
    const { connection } = this.state;
    if (connection === ConnectionStatus.CONNECTED || connection === ConnectionStatus.CONNECTING) {
      throw new InvalidStateError('connect', this.describe());
    }
    const known = this.state.discoveredDevices.find((device) => device.id === deviceId);
    this.clearScanTimer();
    this.logger.debug(`Connecting to ECG device: ${known?.name ?? deviceId}`);
    this.setState({
      connection: ConnectionStatus.CONNECTING,
      statusMessage: `Connecting to ${known?.name ?? deviceId}...`,
      lastError: null,
    });
  }

  private onDeviceConnected(device: Device): void {
    if (this.state.connection !== ConnectionStatus.CONNECTING) return;
    this.logger.info(`ECG device connected: ${device.name}`);
    this.setState({
      connection: ConnectionStatus.CONNECTED,
      device,
      statusMessage: `Connected to ${device.name}`,
    });
  }

  private onConnectFailed(error: DeviceError): void {
    if (this.state.connection !== ConnectionStatus.CONNECTING) return;
    this.logger.error('Failed to connect to ECG device', error);
    this.setState({
      connection: ConnectionStatus.ERROR,
      device: null,
      statusMessage: error.message,
      lastError: error,
    });
    this.notify({ type: 'error', error });
  }

  private onConnectCancelled(): void {
    if (this.state.connection !== ConnectionStatus.CONNECTING) return;
    this.setState({ connection: ConnectionStatus.DISCONNECTED, statusMessage: 'Connection cancelled' });
  }

  private onDeviceDisconnected(deviceId: string, expected: boolean): void {
    const device = this.state.device;
    if (!device || device.id !== deviceId) return;

    const reason = new DeviceError(
      'connection-lost',
      expected ? `Disconnected from ${device.name}` : `Lost connection to ${device.name}`,
    );
    const wasActive = this.abortActiveRecording(reason);
    const signalError = wasActive || !expected;
    if (signalError) this.logger.warn(reason.message);
    else this.logger.debug(reason.message);

    this.setState({
      connection: ConnectionStatus.DISCONNECTED,
      recording: RecordingState.IDLE,
      device: null,
      countdown: this.config.countdownSeconds,
      remainingSeconds: 0,
      currentHeartRate: 0,
      heartRateVariability: null,
      signalQuality: null,
      statusMessage: 'Disconnected',
      lastError: signalError ? reason : this.state.lastError,
    });
    if (signalError) this.notify({ type: 'error', error: reason });
  }

  private onDeviceFault(error: DeviceError): void {
    this.logger.error('ECG device error', error);
    const wasActive = this.abortActiveRecording(error);
    this.setState({
      ...(wasActive
        ? {
            recording: RecordingState.IDLE,
            countdown: this.config.countdownSeconds,
            remainingSeconds: 0,
            currentHeartRate: 0,
            heartRateVariability: null,
            signalQuality: null,
          }
        : {}),
      statusMessage: error.message,
      lastError: error,
    });
    this.notify({ type: 'error', error });
  }

  // Recording lifecycle

  private onStartRequested(requested: number | undefined): void {
    const { connection, recording } = this.state;
    if (connection !== ConnectionStatus.CONNECTED || recording !== RecordingState.IDLE) {
      throw new InvalidStateError('start recording', this.describe());
    }
    const duration = this.resolveDuration(requested);
    this.logger.debug(`Starting ECG recording (${duration}s)...`);

    this.cancelTimers();
    this.setState({
      durationSeconds: duration,
      currentHeartRate: 0,
      heartRateHistory: [],
      heartRateVariability: null,
      signalQuality: null,
      sampleCount: 0,
      lastError: null,
    });

    if (this.config.countdownSeconds === 0) {
      this.beginRecording();
      return;
    }

    this.setState({
      recording: RecordingState.COUNTDOWN,
      countdown: this.config.countdownSeconds,
      statusMessage: `Get ready... Recording starts in ${this.config.countdownSeconds} seconds`,
    });
    const generation = this.generation;
    this.countdownTimer = setInterval(() => this.dispatch({ type: 'countdownTick', generation }), TICK_MS);
  }

  private onCountdownTick(generation: number): void {
    if (generation !== this.generation || this.state.recording !== RecordingState.COUNTDOWN) return;

    const countdown = this.state.countdown - 1;
    if (countdown > 0) {
      this.setState({ countdown, statusMessage: `Get ready... Recording starts in ${countdown}s` });
      return;
    }
    this.cancelTimers();
    this.beginRecording();
  }

  private beginRecording(): void {
    const device = this.state.device;
    if (!device) throw new InvalidStateError('begin recording', this.describe(), 'No device connected');
    if (this.activeSession) {
      throw new InvalidStateError('open a session', this.describe(), `Session ${this.activeSession.id} is still open`);
    }

    this.buffer.reset();
    this.sessionHeartRates = [];
    this.poorSignalSamples = 0;
    this.activeSession = { id: this.createId(), deviceId: device.id, startedAt: this.now() };

    const duration = this.state.durationSeconds;
    this.setState({
      recording: RecordingState.RECORDING,
      countdown: 0,
      remainingSeconds: duration,
      activeSessionId: this.activeSession.id,
      statusMessage: `Recording ECG... ${duration}s remaining`,
    });
    this.logger.info(`Recording session ${this.activeSession.id} started`);

    const generation = this.generation;
    this.recordingTimer = setInterval(() => this.dispatch({ type: 'recordingTick', generation }), TICK_MS);
  }

  private onRecordingTick(generation: number): void {
    if (generation !== this.generation || this.state.recording !== RecordingState.RECORDING) return;

    const remainingSeconds = this.state.remainingSeconds - 1;
    if (remainingSeconds > 0) {
      this.setState({ remainingSeconds, statusMessage: `Recording ECG... ${remainingSeconds}s remaining` });
      return;
    }
    this.setState({ remainingSeconds: 0 });
    this.dispatch({ type: 'stopRequested', reason: 'elapsed' });
  }

  private onSamplesReceived(samples: number[]): void {
    if (this.state.recording !== RecordingState.RECORDING) return;

    const accepted = this.buffer.append(samples);
    if (accepted < samples.length && !this.buffer.isFull) {
      this.logger.warn(`Dropped ${samples.length - accepted} non-finite sample(s)`);
    }
    const heartRate = this.buffer.currentHeartRate();
    let heartRateHistory = this.state.heartRateHistory;
    if (heartRate > 0) {
      this.sessionHeartRates.push(heartRate);
      heartRateHistory = [...heartRateHistory, heartRate].slice(-HEART_RATE_HISTORY_LIMIT);
    }

    const { sampleRateHz } = this.config;
    let variability = this.state.heartRateVariability;
    let quality = this.state.signalQuality;
    if (this.buffer.length >= sampleRateHz * 2) {
      const window = this.buffer.analysisWindow();
      variability = heartRateVariability(window, sampleRateHz);
      quality = assessSignalQuality(window);
    }
    this.setState({
      sampleCount: this.buffer.length,
      currentHeartRate: heartRate,
      heartRateHistory,
      heartRateVariability: variability,
      signalQuality: quality,
    });

    if (this.buffer.isFull) {
      this.logger.warn(`Session sample limit of ${this.config.maxSessionSamples} reached; ending recording`);
      this.dispatch({ type: 'stopRequested', reason: 'capacity' });
      return;
    }
    this.checkSignalQuality(quality, accepted);
  }

  /** Raises a signal-poor fault once the score has stayed under the minimum for `poorSignalSeconds`. */
  private checkSignalQuality(quality: CoordinatorSnapshot['signalQuality'], accepted: number): void {
    const { minSignalQuality, poorSignalSeconds, sampleRateHz } = this.config;
    if (minSignalQuality <= 0 || !quality) return;

    if (quality.score >= minSignalQuality) {
      this.poorSignalSamples = 0;
      return;
    }
    this.poorSignalSamples += accepted;
    if (this.poorSignalSamples < poorSignalSeconds * sampleRateHz) return;

    this.poorSignalSamples = 0;
    this.dispatch({
      type: 'deviceFault',
      error: new DeviceError(
        'signal-poor',
        `Signal quality ${quality.score} stayed below ${minSignalQuality} for ${poorSignalSeconds}s`,
      ),
    });
  }

  private onStopRequested(reason: StopReason): void {
    const { recording } = this.state;

    if (recording === RecordingState.COUNTDOWN) {
      this.cancelTimers();
      this.setState({
        recording: RecordingState.IDLE,
        countdown: this.config.countdownSeconds,
        statusMessage: 'Recording cancelled',
      });
      return;
    }
    if (recording !== RecordingState.RECORDING) {
      this.logger.debug(`Stop ignored while ${recording}`);
      return;
    }

    this.logger.debug(`Stopping ECG recording (${reason})...`);
    this.cancelTimers();
    this.setState({ recording: RecordingState.PROCESSING, statusMessage: 'Processing ECG data...' });

    const session = this.seal('completed');
    this.setState({
      recording: RecordingState.COMPLETED,
      activeSessionId: null,
      remainingSeconds: 0,
      lastSession: session,
      statusMessage:
        reason === 'capacity' ? 'ECG recording completed (sample limit reached)' : 'ECG recording completed',
    });
    this.logger.info(`Session ${session.id} completed with ${session.sampleCount} samples`);
    this.notify({ type: 'sessionCompleted', session });
    this.persist(session);
  }

  private onResetRequested(): void {
    if (this.state.recording !== RecordingState.COMPLETED) return;
    this.setState({
      recording: RecordingState.IDLE,
      countdown: this.config.countdownSeconds,
      statusMessage: 'Ready to record',
    });
  }

  // Persistence

  private persist(session: Session): void {
    const store = this.store;
    if (!store) return;

    const task = store.saveSession(session).then(
      (storedId) => this.dispatch({ type: 'sessionPersisted', sessionId: session.id, storedId }),
      (error: unknown) => {
        const failure = toAppError(
          error,
          (message, cause) => new PersistenceError('write-failed', `Failed to save session: ${message}`, cause),
        );
        this.dispatch({ type: 'persistenceFailed', sessionId: session.id, error: failure });
      },
    );
    const tracked: Promise<void> = task.finally(() => {
      this.pendingSaves.delete(tracked);
    });
    this.pendingSaves.add(tracked);
  }

  private onSessionPersisted(sessionId: string, storedId: string): void {
    this.logger.info(`Session ${sessionId} saved`);
    this.setState({ lastSavedSessionId: storedId });
    this.notify({ type: 'sessionSaved', sessionId, storedId });
  }

  private onPersistenceFailed(sessionId: string, error: AppError): void {
    this.logger.error(`Failed to save session ${sessionId}`, error);
    this.setState({ lastError: error });
    this.notify({ type: 'error', error });
  }

  // Helpers

  /**
   * Cancels a countdown or recording in progress. A partial session is either
   * dropped or sealed as aborted and stored, per `partialSessions`.
   */
  private abortActiveRecording(reason: DeviceError): boolean {
    const { recording } = this.state;
    if (recording !== RecordingState.COUNTDOWN && recording !== RecordingState.RECORDING) return false;

    this.cancelTimers();
    const open = this.activeSession;
    if (!open) return true;

    let retained: Session | null = null;
    if (this.config.partialSessions === 'keep') {
      retained = this.seal('aborted');
      this.setState({ lastSession: retained });
      this.persist(retained);
    } else {
      this.activeSession = null;
      this.sessionHeartRates = [];
      this.buffer.reset();
    }
    this.logger.warn(`Session ${open.id} aborted: ${reason.message}`);
    this.setState({ activeSessionId: null, sampleCount: this.buffer.length });
    this.notify({ type: 'sessionAborted', sessionId: open.id, reason, retained });
    return true;
  }

  private seal(status: SessionStatus): Session {
    const open = this.activeSession;
    if (!open) throw new InvalidStateError('seal a session', this.describe(), 'No session is open');
    this.activeSession = null;

    const endedAt = this.now();
    const samples = this.buffer.snapshot();
    const heartRates = Object.freeze([...this.sessionHeartRates]);
    const heartRate = summarizeHeartRates(heartRates);
    const { sampleRateHz } = this.config;

    return Object.freeze({
      id: open.id,
      userId: this.userId,
      deviceId: open.deviceId,
      name: 'ECG Session',
      startedAt: open.startedAt,
      endedAt,
      durationSeconds: Math.round((endedAt - open.startedAt) / 1000),
      sampleRateHz,
      samples,
      sampleCount: samples.length,
      heartRates,
      heartRate,
      rhythm: classifyHeartRate(heartRate.average),
      heartRateVariability: heartRateVariability(samples, sampleRateHz),
      signalQuality: assessSignalQuality(samples),
      status,
      sealed: true as const,
    });
  }

  private resolveDuration(requested: number | undefined): number {
    if (requested === undefined) return this.config.defaultDurationSeconds;
    if (!Number.isFinite(requested)) throw new RangeError(`Invalid recording duration: ${requested}`);
    const { minDurationSeconds, maxDurationSeconds } = this.config;
    return Math.min(maxDurationSeconds, Math.max(minDurationSeconds, Math.round(requested)));
  }

  private cancelTimers(): void {
    this.generation++;
    if (this.countdownTimer) clearInterval(this.countdownTimer);
    if (this.recordingTimer) clearInterval(this.recordingTimer);
    this.countdownTimer = null;
    this.recordingTimer = null;
  }

  private clearScanTimer(): void {
    if (this.scanTimer) clearTimeout(this.scanTimer);
    this.scanTimer = null;
  }

  private describe(): string {
    return `${this.state.connection.toLowerCase()} and ${this.state.recording.toLowerCase()}`;
  }

  private setState(patch: Partial<CoordinatorSnapshot>): void {
    this.state = { ...this.state, ...patch };
    this.notify({ type: 'stateChanged', state: this.state });
  }

  private notify(notice: CoordinatorNotice): void {
    this.outbox.push(notice);
  }

  private flushNotices(): void {
    if (this.flushing) return;
    this.flushing = true;
    try {
      for (let notice = this.outbox.shift(); notice; notice = this.outbox.shift()) {
        for (const listener of [...this.listeners]) {
          try {
            listener(notice);
          } catch (error) {
            this.logger.error(`Coordinator listener failed on ${notice.type}`, error);
          }
        }
      }
    } finally {
      this.flushing = false;
    }
  }
}
