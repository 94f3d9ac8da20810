import { GoogleGenAI, Modality } from '@google/genai';
import type { GenerateContentParameters, GenerateContentResponse } from '@google/genai';
import type { EngineCategory, LLMProvider, SsmlCapability, TTSEngine } from '../types';
import { GEMINI_PCM_SAMPLE_RATE, pcmToWav } from '../utils/wav';

export type GenerateContentFn = (params: GenerateContentParameters) => Promise<GenerateContentResponse>;

export interface GeminiOptions {
  apiKey: string;
  model: string;
  generate?: GenerateContentFn; // replaces the SDK client, e.g. in tests
}

export interface GeminiTtsOptions extends GeminiOptions {
  voice: string;
}

const clientFor = (options: GeminiOptions): GenerateContentFn => {
  if (options.generate) return options.generate;
  if (!options.apiKey) throw new Error('API Key is missing');

  const ai = new GoogleGenAI({ apiKey: options.apiKey });
  return params => ai.models.generateContent(params);
};

export class GeminiLlmProvider implements LLMProvider {
  readonly name = 'gemini';
  private readonly generate: GenerateContentFn;
  private readonly model: string;

  constructor(options: GeminiOptions) {
    this.generate = clientFor(options);
    this.model = options.model;
  }

  async generateContent(prompt: string): Promise<string> {
    const response = await this.generate({
      model: this.model,
      contents: prompt,
      config: { temperature: 0.2 },
    });

    const text = response.text;
    if (!text) throw new Error(`Gemini (${this.model}) returned an empty response`);
    return text;
  }
}

/**
 * Gemini speech generation. The API answers with base64 PCM
 * (24 kHz, 16-bit, mono), which is wrapped into a WAV file here.
 */
export class GeminiTtsEngine implements TTSEngine {
  readonly name = 'gemini-tts';
  readonly category: EngineCategory = 'gemini';
  readonly outputFormat = 'wav';
  readonly ssmlCapability: SsmlCapability = 'none';
  private readonly generate: GenerateContentFn;
  private readonly model: string;
  private readonly voice: string;

  constructor(options: GeminiTtsOptions) {
    this.generate = clientFor(options);
    this.model = options.model;
    this.voice = options.voice;
  }

  prefersSyncProcessing(): boolean {
    return false;
  }

  async generateAudioData(text: string): Promise<Uint8Array> {
    const response = await this.generate({
      model: this.model,
      contents: [{ role: 'user', parts: [{ text }] }],
      config: {
        responseModalities: [Modality.AUDIO],
        speechConfig: {
          voiceConfig: { prebuiltVoiceConfig: { voiceName: this.voice } },
        },
      },
    });

    const data = response.candidates?.[0]?.content?.parts?.[0]?.inlineData?.data;
    if (!data) {
      const reason = response.candidates?.[0]?.finishReason ?? 'no candidates';
      throw new Error(`Gemini TTS returned no audio (${reason})`);
    }

    return pcmToWav(Buffer.from(data, 'base64'), GEMINI_PCM_SAMPLE_RATE);
  }
}
