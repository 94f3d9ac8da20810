import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { errorMessage } from '../errors';
import type { AudioEncoder, TextSegment, TimedAudioResult, TimingMetadata, TTSEngine } from '../types';
import { splitIntoSentences } from '../utils/chunking';
import { stripSsml } from '../utils/ssml';
import { createTimingMetadata, estimateFromWordCount, parseTimingFile, timingFileName, toTimingFile } from '../utils/timing';
import { readWavDuration } from '../utils/wav';
import { sleep as defaultSleep } from '../utils/workerPool';
import type { AudioStitcher } from './audioStitcher';
import { baseDelayFor, partFileName } from './segmentSynthesizer';

const SENTENCES_PER_CHUNK = 10;

export interface TimingReconstructorOptions {
  stitcher?: AudioStitcher | null;
  encoder?: AudioEncoder | null; // used to probe durations of non-WAV audio
  sleep?: (ms: number) => Promise<void>;
  tempRoot?: string;
}

interface SentenceAudio {
  readonly tempPath: string;
  readonly segment: TextSegment;
}

/**
 * Builds read-along audio: every sentence is synthesized on its own so that
 * its start time and duration are known exactly, then the pieces are joined.
 */
export class TimingReconstructor {
  private readonly stitcher: AudioStitcher | null;
  private readonly encoder: AudioEncoder | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly tempRoot: string;

  constructor(
    private readonly engine: TTSEngine,
    options: TimingReconstructorOptions = {},
  ) {
    this.stitcher = options.stitcher ?? null;
    this.encoder = options.encoder ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  async generateWithTiming(textChunks: readonly string[], outputName: string, outputDir: string): Promise<TimedAudioResult> {
    const sentences = splitIntoSentences(stripSsml(textChunks.join(' ')));
    if (sentences.length === 0) {
      return { audioFiles: [], combinedFile: null, timingData: null };
    }

    const tempDir = await fs.mkdtemp(path.join(this.tempRoot, 'narration-'));
    try {
      const pieces = await this.synthesizeSentences(sentences, tempDir);
      if (pieces.length === 0) {
        console.warn('[Timing] No sentence could be synthesized');
        return { audioFiles: [], combinedFile: null, timingData: null };
      }

      await fs.mkdir(outputDir, { recursive: true });
      const { audioFiles, combinedFile } = await this.assemble(
        pieces.map(piece => piece.tempPath),
        outputName,
        outputDir,
      );

      const timingData = createTimingMetadata(
        pieces.map(piece => piece.segment),
        audioFiles,
      );
      console.log(`[Timing] ${pieces.length}/${sentences.length} sentences, ${timingData.totalDuration.toFixed(2)}s total`);

      return { audioFiles, combinedFile, timingData };
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  private async synthesizeSentences(sentences: readonly string[], tempDir: string): Promise<SentenceAudio[]> {
    const pieces: SentenceAudio[] = [];
    const delay = baseDelayFor(this.engine.category);
    let cursor = 0;

    for (const [index, sentence] of sentences.entries()) {
      if (index > 0 && delay > 0) await this.sleep(delay);

      let audio: Uint8Array;
      try {
        audio = await this.engine.generateAudioData(sentence);
      } catch (error) {
        console.warn(`[Timing] Sentence ${index} skipped:`, errorMessage(error));
        continue;
      }
      if (audio.length === 0) {
        console.warn(`[Timing] Sentence ${index} skipped: engine returned no audio`);
        continue;
      }

      const tempPath = path.join(tempDir, `sentence_${String(index).padStart(5, '0')}.${this.engine.outputFormat}`);
      await fs.writeFile(tempPath, audio);

      const duration = await this.measureDuration(audio, tempPath, sentence);
      pieces.push({
        tempPath,
        segment: {
          text: sentence,
          startTime: cursor,
          duration,
          segmentType: 'sentence',
          chunkIndex: Math.floor(index / SENTENCES_PER_CHUNK),
          sentenceIndex: index,
        },
      });
      cursor += duration;
    }

    return pieces;
  }

  private async measureDuration(audio: Uint8Array, filePath: string, text: string): Promise<number> {
    const fromHeader = readWavDuration(audio);
    if (fromHeader !== null && fromHeader > 0) return fromHeader;

    const probed = this.encoder ? await this.encoder.probeDuration(filePath) : null;
    if (probed !== null && probed > 0) return probed;

    return estimateFromWordCount(text);
  }

  private async assemble(
    tempPaths: readonly string[],
    outputName: string,
    outputDir: string,
  ): Promise<{ audioFiles: string[]; combinedFile: string | null }> {
    if (tempPaths.length >= 2 && this.stitcher && (await this.stitcher.isAvailable())) {
      const combined = await this.stitcher.combineAudioFiles(tempPaths, outputName, outputDir);
      if (combined) return { audioFiles: [combined], combinedFile: combined };
    }

    const extension = this.engine.outputFormat;
    if (tempPaths.length === 1) {
      const fileName = `${outputName}.${extension}`;
      await fs.copyFile(tempPaths[0], path.join(outputDir, fileName));
      return { audioFiles: [fileName], combinedFile: null };
    }

    const audioFiles: string[] = [];
    for (const [index, tempPath] of tempPaths.entries()) {
      const fileName = partFileName(outputName, index + 1, extension);
      await fs.copyFile(tempPath, path.join(outputDir, fileName));
      audioFiles.push(fileName);
    }
    return { audioFiles, combinedFile: null };
  }
}

/** Writes `{baseName}_timing.json` and returns its file name. */
export const saveTimingMetadata = async (metadata: TimingMetadata, outputDir: string, baseName: string): Promise<string> => {
  const fileName = timingFileName(baseName);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(path.join(outputDir, fileName), JSON.stringify(toTimingFile(metadata), null, 2), 'utf8');
  return fileName;
};

export const loadTimingMetadata = async (filePath: string): Promise<TimingMetadata> => {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
  return parseTimingFile(raw);
};
