import { z } from 'zod';
import { ConfigError } from './errors.ts';
import type { LogLevel } from './logger.ts';

export type PartialSessionPolicy = 'discard' | 'keep';
export type SampleEncoding = 'voltage' | 'int16';

export interface RecordingConfig {
  sampleRateHz: number;
  countdownSeconds: number;
  defaultDurationSeconds: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  liveWindowSize: number;
  heartRateWindowSize: number;
  maxSessionSamples: number;
  scanTimeoutMs: number;
  partialSessions: PartialSessionPolicy;
  sampleEncoding: SampleEncoding;
  minSignalQuality: number; // 0 disables the poor-signal check
  poorSignalSeconds: number;
}

export interface AiConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface AppConfig {
  environment: 'development' | 'production';
  logLevel: LogLevel;
  userId: string;
  sessionStorePath: string;
  recording: RecordingConfig;
  ai: AiConfig;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ENVIRONMENT: z.enum(['development', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-3-flash-preview'),
  AI_SUMMARY_TIMEOUT_MS: positiveInt(30_000),
  ECG_SAMPLE_RATE_HZ: positiveInt(250),
  ECG_COUNTDOWN_SECONDS: z.coerce.number().int().nonnegative().default(3),
  ECG_DEFAULT_DURATION_SECONDS: positiveInt(30),
  ECG_MIN_DURATION_SECONDS: positiveInt(10),
  ECG_MAX_DURATION_SECONDS: positiveInt(600),
  ECG_LIVE_WINDOW: positiveInt(5000),
  ECG_HEART_RATE_WINDOW_SECONDS: positiveInt(4),
  ECG_MAX_SESSION_SAMPLES: z.coerce.number().int().positive().optional(),
  ECG_SCAN_TIMEOUT_MS: positiveInt(30_000),
  ECG_PARTIAL_SESSIONS: z.enum(['discard', 'keep']).default('discard'),
  ECG_SAMPLE_ENCODING: z.enum(['voltage', 'int16']).default('voltage'),
  ECG_MIN_SIGNAL_QUALITY: z.coerce.number().min(0).max(100).default(30),
  ECG_POOR_SIGNAL_SECONDS: positiveInt(5),
  SESSION_STORE_PATH: z.string().default('data/sessions.json'),
  ECG_USER_ID: z.string().default('local-user'),
});

type Env = Record<string, string | undefined>;

// Empty assignments in .env files mean "not set".
const withoutBlanks = (env: Env): Env =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0] ?? 'environment') : 'environment';
    throw new ConfigError(variable, issue?.message ?? 'invalid value');
  }
  const vars = parsed.data;

  if (vars.ECG_MIN_DURATION_SECONDS > vars.ECG_MAX_DURATION_SECONDS) {
    throw new ConfigError('ECG_MIN_DURATION_SECONDS', 'must not exceed ECG_MAX_DURATION_SECONDS');
  }

  const apiKey = vars.API_KEY ?? vars.GEMINI_API_KEY ?? '';
  if (vars.ENVIRONMENT === 'production' && apiKey === '') {
    throw new ConfigError('API_KEY', 'required in production');
  }

  const sampleRateHz = vars.ECG_SAMPLE_RATE_HZ;
  const defaultDuration = Math.min(
    vars.ECG_MAX_DURATION_SECONDS,
    Math.max(vars.ECG_MIN_DURATION_SECONDS, vars.ECG_DEFAULT_DURATION_SECONDS),
  );

  return {
    environment: vars.ENVIRONMENT,
    logLevel: vars.LOG_LEVEL,
    userId: vars.ECG_USER_ID,
    sessionStorePath: vars.SESSION_STORE_PATH,
    recording: {
      sampleRateHz,
      countdownSeconds: vars.ECG_COUNTDOWN_SECONDS,
      defaultDurationSeconds: defaultDuration,
      minDurationSeconds: vars.ECG_MIN_DURATION_SECONDS,
      maxDurationSeconds: vars.ECG_MAX_DURATION_SECONDS,
      liveWindowSize: vars.ECG_LIVE_WINDOW,
      heartRateWindowSize: vars.ECG_HEART_RATE_WINDOW_SECONDS * sampleRateHz,
      maxSessionSamples: vars.ECG_MAX_SESSION_SAMPLES ?? 2 * vars.ECG_MAX_DURATION_SECONDS * sampleRateHz,
      scanTimeoutMs: vars.ECG_SCAN_TIMEOUT_MS,
      partialSessions: vars.ECG_PARTIAL_SESSIONS,
      sampleEncoding: vars.ECG_SAMPLE_ENCODING,
      minSignalQuality: vars.ECG_MIN_SIGNAL_QUALITY,
      poorSignalSeconds: vars.ECG_POOR_SIGNAL_SECONDS,
    },
    ai: {
      apiKey,
      model: vars.GEMINI_MODEL,
      timeoutMs: vars.AI_SUMMARY_TIMEOUT_MS,
    },
  };
};
