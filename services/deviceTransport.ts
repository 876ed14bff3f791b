import type { Readable } from 'node:stream';
import { DeviceError, toErrorMessage } from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { Device, TransportEvent, TransportListener } from '../types.ts';
import { SerialLineDecoder } from './sampleDecoder.ts';
import type { SampleEncoding } from '../config.ts';

/**
 * Source of device discovery, connection changes and sample batches.
 * Events are delivered asynchronously through `subscribe`.
 */
export interface DeviceTransport {
  startScan(): Promise<void>;
  stopScan(): Promise<void>;
  connect(deviceId: string): Promise<Device>;
  disconnect(): Promise<void>;
  subscribe(listener: TransportListener): () => void;
}

const ECG_NAME_KEYWORDS = ['b869h', 'v5.0', 'hm-10', 'hm10', 'ecg', 'heart', 'bioamp'];

export const isLikelyEcgDevice = (name: string): boolean => {
  const lower = name.toLowerCase();
  return ECG_NAME_KEYWORDS.some((keyword) => lower.includes(keyword));
};

export abstract class BaseDeviceTransport implements DeviceTransport {
  private listeners = new Set<TransportListener>();
  protected readonly logger: Logger;

  protected constructor(logger: Logger) {
    this.logger = logger;
  }

  abstract startScan(): Promise<void>;
  abstract stopScan(): Promise<void>;
  abstract connect(deviceId: string): Promise<Device>;
  abstract disconnect(): Promise<void>;

  subscribe(listener: TransportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected emit(event: TransportEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`Transport listener failed on ${event.type}`, error);
      }
    }
  }
}

export interface StreamDeviceTransportOptions {
  devices: Device[];
  open: (device: Device) => Readable | Promise<Readable>;
  encoding?: SampleEncoding;
  logger: Logger;
}

/**
 * Reads samples from a Node stream per device: a serial port character
 * device, a TCP socket from a BLE bridge, or a pipe.
 */
export class StreamDeviceTransport extends BaseDeviceTransport {
  private readonly options: StreamDeviceTransportOptions;
  private stream: Readable | null = null;
  private device: Device | null = null;

  constructor(options: StreamDeviceTransportOptions) {
    super(options.logger);
    this.options = options;
  }

  async startScan(): Promise<void> {
    const now = Date.now();
    const devices = this.options.devices.map((device) => ({ ...device, discoveredAt: now }));
    this.emit({ type: 'discovered', devices });
  }

  async stopScan(): Promise<void> {
    // Discovery is a single listing; nothing to stop.
  }

  async connect(deviceId: string): Promise<Device> {
    const device = this.options.devices.find((candidate) => candidate.id === deviceId);
    if (!device) {
      throw new DeviceError('not-found', `Device ${deviceId} is not available`);
    }
    if (this.stream) await this.disconnect();

    let stream: Readable;
    try {
      stream = await this.options.open(device);
    } catch (error) {
      throw new DeviceError('connection-failed', `Failed to open ${device.name}: ${toErrorMessage(error)}`, error);
    }

    const decoder = new SerialLineDecoder(this.options.encoding);
    this.stream = stream;
    this.device = device;

    stream.on('data', (chunk: Buffer | string) => {
      const samples = decoder.push(typeof chunk === 'string' ? chunk : new Uint8Array(chunk));
      if (samples.length > 0) this.emit({ type: 'samples', deviceId, samples });
    });
    stream.once('end', () => {
      const samples = decoder.flush();
      if (samples.length > 0) this.emit({ type: 'samples', deviceId, samples });
    });
    stream.once('close', () => this.handleClosed(stream, deviceId));
    stream.on('error', (error: Error) => {
      this.logger.error(`Stream error on ${device.name}`, error);
      this.emit({ type: 'error', error: new DeviceError('connection-lost', error.message, error) });
    });

    this.logger.info(`Connected to ${device.name}`);
    this.emit({ type: 'connectionChanged', deviceId, connected: true });
    return device;
  }

  async disconnect(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    stream.destroy();
    this.handleClosed(stream, this.device?.id ?? '');
  }

  private handleClosed(stream: Readable, deviceId: string): void {
    if (this.stream !== stream) return;
    this.stream = null;
    this.device = null;
    this.logger.info(`Device ${deviceId} is disconnected.`);
    this.emit({ type: 'connectionChanged', deviceId, connected: false });
  }
}
