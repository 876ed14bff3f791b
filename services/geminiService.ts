import { GoogleGenAI, Type } from '@google/genai';
import { z } from 'zod';
import type { AiConfig } from '../config.ts';
import { AppError, GatewayError, toErrorMessage } from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { AiSummary, SessionStatistics } from '../types.ts';

/** Produces a structured reading of session statistics in the requested language. */
export interface SummaryGateway {
  summarize(statistics: SessionStatistics, languageCode: string): Promise<AiSummary>;
}

/** Minimal text-generation surface, so the gateway can run against any model client. */
export interface TextModel {
  generateJson(prompt: string, systemInstruction: string, signal?: AbortSignal): Promise<string | undefined>;
}

const SYSTEM_INSTRUCTION =
  'You are a helpful AI assistant specializing in ECG analysis. Always provide medically accurate information but include appropriate disclaimers. Format your response as a JSON object.';

const SUMMARY_SCHEMA = {
  type: Type.OBJECT,
  properties: {
    summary: { type: Type.STRING },
    observations: { type: Type.STRING },
    suggestions: { type: Type.ARRAY, items: { type: Type.STRING } },
  },
  required: ['summary', 'observations', 'suggestions'],
};

const SummaryReplySchema = z.object({
  summary: z.string().min(1),
  observations: z.string(),
  suggestions: z.array(z.string()),
});

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  hi: 'Hindi (हिंदी)',
  ta: 'Tamil (தமிழ்)',
  te: 'Telugu (తెలుగు)',
  ml: 'Malayalam (മലയാളം)',
  kn: 'Kannada (ಕನ್ನಡ)',
  bn: 'Bengali (বাংলা)',
  gu: 'Gujarati (ગુજરાતી)',
  mr: 'Marathi (मराठी)',
  pa: 'Punjabi (ਪੰਜਾਬੀ)',
};

export const resolveLanguageName = (languageCode: string): string =>
  LANGUAGE_NAMES[languageCode.toLowerCase()] ?? 'English';

export const FALLBACK_SUMMARY: AiSummary = {
  summary:
    'Based on the available ECG data, the analysis shows normal sinus rhythm with heart rate within normal parameters.',
  observations:
    'The ECG demonstrates regular cardiac rhythm with consistent intervals. Heart rate variability appears normal for the recorded duration.',
  suggestions: [
    'Maintain regular cardiovascular exercise for 30 minutes daily',
    'Follow a heart-healthy diet rich in omega-3 fatty acids and low in sodium',
    'Practice stress management techniques such as meditation or deep breathing exercises',
  ],
  source: 'fallback',
};

export const describeStatistics = (statistics: SessionStatistics): string => {
  if (statistics.sessionCount === 0) return 'No ECG data available';

  const sessions = statistics.sessions.map(
    (entry) => `Session ${entry.index} (${entry.date}):
- Heart Rate: ${entry.averageBpm} bpm (Range: ${entry.minBpm}-${entry.maxBpm})
- Rhythm: ${entry.rhythm}
- Status: ${entry.status}
- Duration: ${entry.durationSeconds}s
- Data Points: ${entry.sampleCount} samples
- Quality: ${entry.quality}`,
  );

  const trend = statistics.trend
    ? `Overall Trends:
- Heart rate change: ${statistics.trend.changePercent >= 0 ? '+' : ''}${statistics.trend.changePercent.toFixed(1)}%
- Sessions analyzed: ${statistics.sessionCount}
- Time span: ${statistics.trend.from} to ${statistics.trend.to}`
    : 'Trend analysis requires at least 2 ECG sessions for comparison.';

  const plural = statistics.sessionCount > 1 ? 's' : '';
  return `Patient ECG Analysis (${statistics.sessionCount} session${plural}):

${sessions.join('\n\n')}

Historical Trends:
${trend}`;
};

export const buildSummaryPrompt = (statistics: SessionStatistics, languageCode: string): string => {
  const language = resolveLanguageName(languageCode);
  return `Analyze the following ECG data for a patient: ${describeStatistics(statistics)}

IMPORTANT: Respond in ${language} language. If the language is not English, provide the response completely in that language.

Provide a comprehensive analysis including:
1. A concise summary of the ECG findings
2. Any potential observations or areas of interest
3. Three specific, actionable lifestyle suggestions for heart health

Format your response as a JSON object with the following structure:
{
  "summary": "Brief clinical summary of findings in ${language}",
  "observations": "Detailed observations and any notable patterns in ${language}",
  "suggestions": ["suggestion 1 in ${language}", "suggestion 2 in ${language}", "suggestion 3 in ${language}"]
}`;
};

export const createGeminiModel = (apiKey: string, model: string): TextModel => {
  const ai = new GoogleGenAI({ apiKey });
  return {
    async generateJson(prompt, systemInstruction, signal) {
      const response = await ai.models.generateContent({
        model,
        contents: prompt,
        config: {
          systemInstruction,
          responseMimeType: 'application/json',
          responseSchema: SUMMARY_SCHEMA,
          abortSignal: signal,
        },
      });
      return response.text;
    },
  };
};

// The request is aborted when the timeout fires.
const withTimeout = <T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      reject(new GatewayError('timeout', `No reply from the summary model within ${timeoutMs} ms`));
      controller.abort();
    }, timeoutMs);
    run(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });

export const parseSummaryReply = (text: string | undefined): AiSummary => {
  if (!text) throw new GatewayError('malformed-response', 'Empty reply from the summary model');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new GatewayError('malformed-response', 'Summary reply is not JSON', error);
  }
  const parsed = SummaryReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new GatewayError('malformed-response', 'Summary reply does not match the expected shape', parsed.error);
  }
  return { ...parsed.data, source: 'model' };
};

export class GeminiSummaryGateway implements SummaryGateway {
  private readonly model: TextModel | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(model: TextModel | null, options: { timeoutMs: number; logger: Logger }) {
    this.model = model;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /** Asks the model for a summary; failures surface as GatewayError. */
  async requestSummary(statistics: SessionStatistics, languageCode: string): Promise<AiSummary> {
    if (!this.model) throw new GatewayError('unavailable', 'No API key configured for the summary model');

    const prompt = buildSummaryPrompt(statistics, languageCode);
    let text: string | undefined;
    try {
      const model = this.model;
      text = await withTimeout((signal) => model.generateJson(prompt, SYSTEM_INSTRUCTION, signal), this.timeoutMs);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new GatewayError('request-failed', `Summary request failed: ${toErrorMessage(error)}`, error);
    }
    return parseSummaryReply(text);
  }

  /** Same as requestSummary, but any failure yields the static fallback summary. */
  async summarize(statistics: SessionStatistics, languageCode: string): Promise<AiSummary> {
    try {
      return await this.requestSummary(statistics, languageCode);
    } catch (error) {
      this.logger.warn(`AI summary unavailable, using fallback: ${toErrorMessage(error)}`);
      return { ...FALLBACK_SUMMARY, suggestions: [...FALLBACK_SUMMARY.suggestions] };
    }
  }
}

export const createSummaryGateway = (config: AiConfig, logger: Logger): GeminiSummaryGateway => {
  const model = config.apiKey ? createGeminiModel(config.apiKey, config.model) : null;
  return new GeminiSummaryGateway(model, { timeoutMs: config.timeoutMs, logger });
};
