import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { AudioEncoder, EncoderRunResult, EngineCategory, SsmlCapability, TTSEngine } from '../types';
import { countWords } from '../utils/timing';
import { pcmToWav } from '../utils/wav';

export const makeTempDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix));

export interface FakeEngineOptions {
  category?: EngineCategory;
  prefersSync?: boolean;
  ssmlCapability?: SsmlCapability;
  fail?: (text: string) => Error | null;
  audio?: (text: string) => Uint8Array;
}

// Half a second of 24 kHz 16-bit mono silence per word.
export const wavForWords = (text: string): Uint8Array => pcmToWav(new Uint8Array(countWords(text) * 24000));

export class FakeEngine implements TTSEngine {
  readonly name = 'fake-tts';
  readonly outputFormat = 'wav';
  readonly category: EngineCategory;
  readonly ssmlCapability: SsmlCapability;
  readonly calls: string[] = [];

  constructor(private readonly options: FakeEngineOptions = {}) {
    this.category = options.category ?? 'local';
    this.ssmlCapability = options.ssmlCapability ?? 'none';
  }

  prefersSyncProcessing(): boolean {
    return this.options.prefersSync ?? false;
  }

  async generateAudioData(text: string): Promise<Uint8Array> {
    this.calls.push(text);
    const failure = this.options.fail?.(text) ?? null;
    if (failure) throw failure;
    return this.options.audio ? this.options.audio(text) : new TextEncoder().encode(`audio:${text}`);
  }
}

export interface FakeEncoderOptions {
  available?: boolean;
  outcomes?: EncoderRunResult[]; // consumed in order, then { ok: true }
  writeOutput?: boolean;
  duration?: number | null;
}

/** Records ffmpeg argument lists; successful runs write a small file at the output path. */
export class FakeEncoder implements AudioEncoder {
  readonly runs: string[][] = [];
  readonly manifests: string[] = [];
  private readonly outcomes: EncoderRunResult[];

  constructor(private readonly options: FakeEncoderOptions = {}) {
    this.outcomes = [...(options.outcomes ?? [])];
  }

  async isAvailable(): Promise<boolean> {
    return this.options.available ?? true;
  }

  async run(args: readonly string[], _timeoutMs: number): Promise<EncoderRunResult> {
    this.runs.push([...args]);

    const concatAt = args.indexOf('concat');
    if (concatAt > 0 && args[concatAt - 1] === '-f') {
      this.manifests.push(await fs.readFile(args[args.indexOf('-i') + 1], 'utf8'));
    }

    const outcome = this.outcomes.shift() ?? { ok: true };
    if (outcome.ok && (this.options.writeOutput ?? true)) {
      await fs.writeFile(args[args.length - 1], 'encoded');
    }
    return outcome;
  }

  async probeDuration(_filePath: string): Promise<number | null> {
    return this.options.duration ?? null;
  }
}
