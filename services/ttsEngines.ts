import type { AppConfig } from '../config';
import { ConfigurationError } from '../errors';
import type { EngineCategory, SsmlCapability, TTSEngine } from '../types';
import { runProcess } from '../utils/process';
import { GeminiTtsEngine } from './geminiService';
import type { GenerateContentFn } from './geminiService';

const PIPER_TIMEOUT_MS = 60_000;

export interface PiperOptions {
  modelPath: string;
  lengthScale?: number; // >1 speaks slower
  executable?: string;
}

/** Local neural TTS through the piper command line tool, WAV on stdout. */
export class PiperTtsEngine implements TTSEngine {
  readonly name = 'piper';
  readonly category: EngineCategory = 'local';
  readonly outputFormat = 'wav';
  readonly ssmlCapability: SsmlCapability = 'none';

  constructor(private readonly options: PiperOptions) {}

  prefersSyncProcessing(): boolean {
    return true;
  }

  buildArgs(): string[] {
    return [
      '--model',
      this.options.modelPath,
      '--length_scale',
      (this.options.lengthScale ?? 1).toFixed(2),
      '--output_file',
      '-',
    ];
  }

  async generateAudioData(text: string): Promise<Uint8Array> {
    const executable = this.options.executable ?? 'piper';
    const outcome = await runProcess(executable, this.buildArgs(), { timeoutMs: PIPER_TIMEOUT_MS, input: text });

    if (outcome.kind === 'spawn-error') throw new Error(`Failed to start Piper: ${outcome.message}`);
    if (outcome.kind === 'timeout') throw new Error(`Piper timed out after ${PIPER_TIMEOUT_MS / 1000}s`);
    if (outcome.code !== 0) throw new Error(`Piper exited with code ${outcome.code}: ${outcome.stderr.trim()}`);
    if (outcome.stdout.length === 0) throw new Error('Piper produced no audio');

    return outcome.stdout;
  }
}

export const createTtsEngine = (config: AppConfig, generate?: GenerateContentFn): TTSEngine => {
  switch (config.ttsEngine) {
    case 'gemini': {
      const apiKey = config.gemini.apiKey;
      if (!apiKey && !generate) throw new ConfigurationError('GEMINI_API_KEY is required for the gemini engine');
      return new GeminiTtsEngine({
        apiKey: apiKey ?? '',
        model: config.gemini.ttsModel,
        voice: config.gemini.voice,
        generate,
      });
    }
    case 'piper': {
      const modelPath = config.piper.modelPath;
      if (!modelPath) throw new ConfigurationError('PIPER_MODEL_PATH is required for the piper engine');
      return new PiperTtsEngine({ modelPath, lengthScale: config.piper.lengthScale });
    }
  }
};
