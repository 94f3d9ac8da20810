import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors';
import { DEFAULT_MAX_CHUNK_SIZE } from './utils/chunking';
import { DEFAULT_PUNCTUATION_PAUSES } from './utils/timing';

export type EngineName = 'gemini' | 'piper';

export interface AppConfig {
  readonly ttsEngine: EngineName;
  readonly gemini: {
    readonly apiKey: string | null;
    readonly ttsModel: string;
    readonly voice: string;
    readonly llmModel: string;
  };
  readonly piper: {
    readonly modelPath: string | null;
    readonly lengthScale: number;
  };
  readonly audioFolder: string;
  readonly maxChunkSize: number;
  readonly llmMaxChunkSize: number;
  readonly maxConcurrentRequests: number;
  readonly enableParallel: boolean;
  readonly forceParallel: boolean | null; // null lets the engine decide
  readonly enableTextCleaning: boolean;
  readonly enableSsml: boolean;
  readonly wordsPerMinute: number;
  readonly punctuationPauses: Readonly<Record<string, number>>;
  readonly audio: {
    readonly bitrate: string;
    readonly sampleRate: number;
  };
  readonly ffmpegPath: string;
  readonly ffmpegTimeoutSeconds: number;
}

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true' || value === '1'));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : null));

const pausesSchema = z.record(z.number().nonnegative());

const envSchema = z.object({
  TTS_ENGINE: z.enum(['gemini', 'piper']).default('gemini'),
  GEMINI_API_KEY: optionalString,
  API_KEY: optionalString,
  GEMINI_TTS_MODEL: z.string().default('gemini-2.5-flash-preview-tts'),
  GEMINI_VOICE: z.string().default('Kore'),
  GEMINI_LLM_MODEL: z.string().default('gemini-2.5-flash'),
  PIPER_MODEL_PATH: optionalString,
  PIPER_LENGTH_SCALE: z.coerce.number().positive().max(5).default(1),
  AUDIO_FOLDER: z.string().default('audio_outputs'),
  MAX_CHUNK_SIZE: z.coerce.number().int().min(100).max(10_000).default(DEFAULT_MAX_CHUNK_SIZE),
  LLM_MAX_CHUNK_SIZE: z.coerce.number().int().min(1_000).max(500_000).default(100_000),
  MAX_CONCURRENT_TTS_REQUESTS: z.coerce.number().int().min(1).max(32).default(4),
  ENABLE_ASYNC_AUDIO: flag(true),
  FORCE_ASYNC: z
    .enum(['true', 'false'])
    .optional()
    .transform(value => (value === undefined ? null : value === 'true')),
  ENABLE_TEXT_CLEANING: flag(true),
  ENABLE_SSML: flag(false),
  WORDS_PER_MINUTE: z.coerce.number().positive().max(1_000).default(150),
  PUNCTUATION_PAUSES: z.string().optional(),
  AUDIO_BITRATE: z
    .string()
    .regex(/^\d+k$/, 'expected a bitrate such as "128k"')
    .default('128k'),
  AUDIO_SAMPLE_RATE: z.coerce.number().int().min(8_000).max(96_000).default(22_050),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFMPEG_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('; ');

const parsePauses = (raw: string | undefined): Readonly<Record<string, number>> => {
  if (raw === undefined || !raw.trim()) return DEFAULT_PUNCTUATION_PAUSES;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`PUNCTUATION_PAUSES is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = pausesSchema.safeParse(json);
  if (!parsed.success) throw new ConfigurationError(`PUNCTUATION_PAUSES: ${describeIssues(parsed.error)}`);
  return parsed.data;
};

/**
 * Reads configuration from environment variables.
 * Throws ConfigurationError on the first invalid or missing value.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigurationError(describeIssues(parsed.error));

  const vars = parsed.data;
  const apiKey = vars.GEMINI_API_KEY ?? vars.API_KEY;

  if (vars.TTS_ENGINE === 'gemini' && !apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY (or API_KEY) is required for the gemini engine');
  }
  if (vars.TTS_ENGINE === 'piper' && !vars.PIPER_MODEL_PATH) {
    throw new ConfigurationError('PIPER_MODEL_PATH is required for the piper engine');
  }

  return {
    ttsEngine: vars.TTS_ENGINE,
    gemini: {
      apiKey,
      ttsModel: vars.GEMINI_TTS_MODEL,
      voice: vars.GEMINI_VOICE,
      llmModel: vars.GEMINI_LLM_MODEL,
    },
    piper: {
      modelPath: vars.PIPER_MODEL_PATH,
      lengthScale: vars.PIPER_LENGTH_SCALE,
    },
    audioFolder: vars.AUDIO_FOLDER,
    maxChunkSize: vars.MAX_CHUNK_SIZE,
    llmMaxChunkSize: vars.LLM_MAX_CHUNK_SIZE,
    maxConcurrentRequests: vars.MAX_CONCURRENT_TTS_REQUESTS,
    enableParallel: vars.ENABLE_ASYNC_AUDIO,
    forceParallel: vars.FORCE_ASYNC,
    enableTextCleaning: vars.ENABLE_TEXT_CLEANING,
    enableSsml: vars.ENABLE_SSML,
    wordsPerMinute: vars.WORDS_PER_MINUTE,
    punctuationPauses: parsePauses(vars.PUNCTUATION_PAUSES),
    audio: {
      bitrate: vars.AUDIO_BITRATE,
      sampleRate: vars.AUDIO_SAMPLE_RATE,
    },
    ffmpegPath: vars.FFMPEG_PATH,
    ffmpegTimeoutSeconds: vars.FFMPEG_TIMEOUT_SECONDS,
  };
};
