import { promises as fs } from 'node:fs';
import path from 'node:path';
import { errorMessage, isRateLimitMessage, isUpstreamErrorText } from '../errors';
import type { EngineCategory, SynthesisStrategy, TTSEngine } from '../types';
import { mapWithConcurrency, sleep as defaultSleep } from '../utils/workerPool';

export const DEFAULT_MAX_CONCURRENT_REQUESTS = 4;
export const MAX_BACKOFF_MS = 30_000;
const INITIAL_BACKOFF_MS = 1_000;

// Sync-preferring engines still go parallel past this many chunks.
const SYNC_PARALLEL_THRESHOLD = 10;

const BASE_DELAY_MS: Record<EngineCategory, number> = {
  gemini: 2_000,
  openai: 1_000,
  elevenlabs: 1_500,
  local: 0,
};

export interface SynthesisOptions {
  enableParallel?: boolean;
  forceStrategy?: SynthesisStrategy;
  maxConcurrentRequests?: number;
  sleep?: (ms: number) => Promise<void>;
  onSegmentDone?: (completed: number, total: number) => void;
}

export interface SynthesisOutcome {
  audioFiles: string[]; // file names relative to outputDir, in chunk order
  errorCount: number;
  strategy: SynthesisStrategy;
}

export const baseDelayFor = (category: EngineCategory): number => BASE_DELAY_MS[category];

/** Delay to use after a rate-limit error, doubling up to MAX_BACKOFF_MS. */
export const nextBackoffDelay = (currentMs: number): number =>
  Math.min(currentMs > 0 ? currentMs * 2 : INITIAL_BACKOFF_MS, MAX_BACKOFF_MS);

export const partFileName = (baseName: string, position: number, extension: string): string =>
  `${baseName}_part${String(position).padStart(2, '0')}.${extension}`;

export const selectSynthesisStrategy = (
  chunkCount: number,
  engine: TTSEngine,
  options: SynthesisOptions = {},
): SynthesisStrategy => {
  if (options.enableParallel === false) return 'sequential';
  if (options.forceStrategy) return options.forceStrategy;
  if (chunkCount <= 1) return 'sequential';
  if (engine.prefersSyncProcessing()) return chunkCount > SYNC_PARALLEL_THRESHOLD ? 'parallel' : 'sequential';
  return 'parallel';
};

const isSynthesizable = (segment: string): boolean => segment.trim().length > 0 && !isUpstreamErrorText(segment);

type SegmentResult = { kind: 'written'; fileName: string } | { kind: 'skipped' } | { kind: 'failed'; message: string };

const synthesizeOne = async (
  segment: string,
  index: number,
  baseName: string,
  outputDir: string,
  engine: TTSEngine,
): Promise<SegmentResult> => {
  if (!isSynthesizable(segment)) {
    console.warn(`[Synthesizer] Skipping chunk ${index + 1}: no speakable text`);
    return { kind: 'skipped' };
  }

  try {
    const audio = await engine.generateAudioData(segment);
    if (audio.length === 0) throw new Error('engine returned no audio');

    const fileName = partFileName(baseName, index + 1, engine.outputFormat);
    await fs.writeFile(path.join(outputDir, fileName), audio);
    return { kind: 'written', fileName };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[Synthesizer] Chunk ${index + 1} failed with ${engine.name}:`, message);
    return { kind: 'failed', message };
  }
};

/**
 * Turns text chunks into audio files named `{baseName}_partNN.{ext}`, where NN
 * is the chunk's 1-based position. Failed or skipped chunks leave a hole in the
 * numbering rather than shifting later files.
 */
export const synthesizeSegments = async (
  segments: readonly string[],
  baseName: string,
  outputDir: string,
  engine: TTSEngine,
  options: SynthesisOptions = {},
): Promise<SynthesisOutcome> => {
  const strategy = selectSynthesisStrategy(segments.length, engine, options);
  const sleep = options.sleep ?? defaultSleep;
  let completed = 0;

  const report = (): void => {
    completed++;
    options.onSegmentDone?.(completed, segments.length);
  };

  console.log(`[Synthesizer] ${segments.length} chunks, ${strategy} strategy, engine ${engine.name}`);
  await fs.mkdir(outputDir, { recursive: true });

  let results: SegmentResult[];

  if (strategy === 'parallel') {
    const width = options.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS;
    results = await mapWithConcurrency(segments, width, async (segment, index) => {
      const result = await synthesizeOne(segment, index, baseName, outputDir, engine);
      report();
      return result;
    });
  } else {
    results = [];
    let delay = baseDelayFor(engine.category);
    let requests = 0;

    for (const [index, segment] of segments.entries()) {
      if (isSynthesizable(segment)) {
        if (requests > 0 && delay > 0) await sleep(delay);
        requests++;
      }

      const result = await synthesizeOne(segment, index, baseName, outputDir, engine);
      if (result.kind === 'failed' && isRateLimitMessage(result.message)) {
        delay = nextBackoffDelay(delay);
        console.warn(`[Synthesizer] Rate limited, waiting ${delay / 1000}s between requests`);
      }

      results.push(result);
      report();
    }
  }

  const audioFiles: string[] = [];
  let errorCount = 0;
  for (const result of results) {
    if (result.kind === 'written') audioFiles.push(result.fileName);
    if (result.kind === 'failed') errorCount++;
  }

  console.log(`[Synthesizer] ${audioFiles.length}/${segments.length} chunks synthesized, ${errorCount} errors`);
  return { audioFiles, errorCount, strategy };
};
