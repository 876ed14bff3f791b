export class AppError extends Error {
  readonly code: string;
  readonly suggestion?: string;

  constructor(code: string, message: string, options: { suggestion?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.code = code;
    this.suggestion = options.suggestion;
    this.name = 'AppError';
  }
}

export type DeviceErrorKind =
  | 'not-found'
  | 'connection-failed'
  | 'connection-lost'
  | 'permission-denied'
  | 'bluetooth-disabled'
  | 'signal-poor';

const DEVICE_SUGGESTIONS: Record<DeviceErrorKind, string> = {
  'not-found': 'Make sure the sensor is powered on and within range, then scan again.',
  'connection-failed': 'Move closer to the sensor and try connecting again.',
  'connection-lost': 'Check the sensor battery and reconnect before recording again.',
  'permission-denied': 'Grant Bluetooth access to this application.',
  'bluetooth-disabled': 'Enable Bluetooth and try again.',
  'signal-poor': 'Check electrode contact and keep still while recording.',
};

export class DeviceError extends AppError {
  readonly kind: DeviceErrorKind;

  constructor(kind: DeviceErrorKind, message: string, cause?: unknown) {
    super(`device/${kind}`, message, { suggestion: DEVICE_SUGGESTIONS[kind], cause });
    this.kind = kind;
    this.name = 'DeviceError';
  }
}

export type PersistenceErrorKind = 'write-failed' | 'read-failed' | 'not-found' | 'corrupt-store';

export class PersistenceError extends AppError {
  readonly kind: PersistenceErrorKind;

  constructor(kind: PersistenceErrorKind, message: string, cause?: unknown) {
    super(`persistence/${kind}`, message, { cause });
    this.kind = kind;
    this.name = 'PersistenceError';
  }
}

export type GatewayErrorKind = 'timeout' | 'malformed-response' | 'unavailable' | 'request-failed';

export class GatewayError extends AppError {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string, cause?: unknown) {
    super(`gateway/${kind}`, message, { cause });
    this.kind = kind;
    this.name = 'GatewayError';
  }
}

/**
 * Raised when an operation is requested in a state that does not allow it.
 * This is a caller bug, not a runtime condition to recover from.
 */
export class InvalidStateError extends AppError {
  readonly state: string;
  readonly operation: string;

  constructor(operation: string, state: string, message?: string) {
    super('invalid-state', message ?? `Cannot ${operation} while ${state}`);
    this.operation = operation;
    this.state = state;
    this.name = 'InvalidStateError';
  }
}

export class ConfigError extends AppError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super('invalid-config', `${variable}: ${message}`, {
      suggestion: `Check the value of ${variable} in your environment or .env file.`,
    });
    this.variable = variable;
    this.name = 'ConfigError';
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};

export const toAppError = <T extends AppError>(
  error: unknown,
  wrap: (message: string, cause: unknown) => T,
): T | AppError => {
  if (error instanceof AppError) return error;
  return wrap(toErrorMessage(error), error);
};
