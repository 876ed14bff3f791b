import type { SampleEncoding } from '../config.ts';

const INT16_FULL_SCALE = 32767;
const REFERENCE_VOLTAGE = 3.3;

// Sensors in int16 mode print unsigned readings; values above 32767 are negative.
export const int16ToVoltage = (raw: number): number => {
  const signed = raw > INT16_FULL_SCALE ? raw - 65536 : raw;
  return (signed / INT16_FULL_SCALE) * REFERENCE_VOLTAGE;
};

/**
 * Decodes the newline-delimited text most DIY ECG modules (HM-10, CC2541,
 * ESP32 serial bridges) stream, e.g. "1.23\n2.45\n". A chunk may end in the
 * middle of a line; the tail is kept until the next chunk completes it.
 */
export class SerialLineDecoder {
  private textDecoder = new TextDecoder();
  private dataBuffer = '';
  private readonly encoding: SampleEncoding;

  constructor(encoding: SampleEncoding = 'voltage') {
    this.encoding = encoding;
  }

  push(chunk: Uint8Array | string): number[] {
    this.dataBuffer += typeof chunk === 'string' ? chunk : this.textDecoder.decode(chunk, { stream: true });

    const lines = this.dataBuffer.split('\n');
    // Keep the last incomplete chunk in the buffer
    this.dataBuffer = lines.pop() ?? '';

    return this.parseLines(lines);
  }

  flush(): number[] {
    const rest = this.dataBuffer + this.textDecoder.decode();
    this.dataBuffer = '';
    return this.parseLines([rest]);
  }

  private parseLines(lines: string[]): number[] {
    const values: number[] = [];
    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) continue;

      const value = this.encoding === 'int16' ? Number.parseInt(trimmed, 10) : Number.parseFloat(trimmed);
      if (!Number.isFinite(value)) continue;

      values.push(this.encoding === 'int16' ? int16ToVoltage(value) : value);
    }
    return values;
  }
}
