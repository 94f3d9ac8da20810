import { promises as fs } from 'node:fs';
import {
  errorMessage,
  fileNotFoundError,
  invalidPageRangeError,
  isExtractionError,
  isUpstreamErrorText,
  PipelineError,
  synthesisError,
  textCleaningError,
  textExtractionError,
  toApplicationError,
} from '../errors';
import type {
  DebugInfo,
  PageRange,
  PdfInfo,
  ProcessingRequest,
  ProcessingResult,
  ProcessingStats,
  TextCleaner,
  TextExtractor,
  TTSEngine,
} from '../types';
import { DEFAULT_MAX_CHUNK_SIZE, splitIntoChunks } from '../utils/chunking';
import { isFullDocument, validatePageRange } from '../utils/pageRange';
import type { PageRangeValidation } from '../utils/pageRange';
import { annotateChunk, stripSsml } from '../utils/ssml';
import { DEFAULT_PUNCTUATION_PAUSES, estimateDuration } from '../utils/timing';
import type { AudioStitcher } from './audioStitcher';
import { synthesizeSegments } from './segmentSynthesizer';
import type { SynthesisOptions } from './segmentSynthesizer';
import { saveTimingMetadata, TimingReconstructor } from './timingReconstructor';

export interface PipelineDependencies {
  extractor: TextExtractor;
  cleaner: TextCleaner;
  engine: TTSEngine;
  stitcher: AudioStitcher;
  timing?: TimingReconstructor;
}

export interface PipelineOptions {
  outputDir: string;
  audioChunkSize?: number;
  enableSsml?: boolean;
  wordsPerMinute?: number;
  punctuationPauses?: Readonly<Record<string, number>>;
  synthesis?: Omit<SynthesisOptions, 'onSegmentDone'>;
  onProgress?: (stats: ProcessingStats) => void;
}

type SuccessResult = Extract<ProcessingResult, { success: true }>;

const DEFAULT_WORDS_PER_MINUTE = 150;

const fileExists = (filePath: string): Promise<boolean> =>
  fs.stat(filePath).then(
    stats => stats.isFile(),
    () => false,
  );

/**
 * Runs one PDF through extraction, cleaning, chunking, synthesis and
 * stitching (or sentence-timed synthesis when timing is requested).
 * Never throws: every failure becomes `{ success: false, error }`.
 */
export class PipelineOrchestrator {
  private readonly timing: TimingReconstructor;
  private readonly audioChunkSize: number;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions,
  ) {
    this.timing =
      deps.timing ?? new TimingReconstructor(deps.engine, { stitcher: deps.stitcher, sleep: options.synthesis?.sleep });
    this.audioChunkSize = options.audioChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
  }

  getPdfInfo(pdfPath: string): Promise<PdfInfo> {
    return this.deps.extractor.getPdfInfo(pdfPath);
  }

  async validatePageRange(pdfPath: string, pageRange: PageRange): Promise<PageRangeValidation> {
    const info = await this.deps.extractor.getPdfInfo(pdfPath);
    return validatePageRange(pageRange, info.totalPages);
  }

  async processPdf(request: ProcessingRequest): Promise<ProcessingResult> {
    const { engine } = this.deps;
    let debugInfo: DebugInfo = { engine: engine.name, engineCategory: engine.category };

    try {
      const result = await this.run(request, update => {
        debugInfo = { ...debugInfo, ...update };
      });
      this.report({ status: 'complete', totalUnits: 0, processedUnits: 0, statusMessage: 'Audio ready' });
      return { ...result, debugInfo };
    } catch (error) {
      const appError = toApplicationError(error);
      console.error(`[Pipeline] ${request.pdfPath} failed:`, errorMessage(error));
      this.report({ status: 'error', totalUnits: 0, processedUnits: 0, errorMessage: appError.message });
      return { success: false, error: appError, debugInfo };
    }
  }

  private estimateSeconds(chunks: readonly string[]): number {
    const wordsPerMinute = this.options.wordsPerMinute ?? DEFAULT_WORDS_PER_MINUTE;
    const pauses = this.options.punctuationPauses ?? DEFAULT_PUNCTUATION_PAUSES;
    return chunks.reduce((total, chunk) => total + estimateDuration(stripSsml(chunk), wordsPerMinute, pauses), 0);
  }

  private report(stats: ProcessingStats): void {
    this.options.onProgress?.(stats);
  }

  private async run(
    request: ProcessingRequest,
    record: (update: Partial<DebugInfo>) => void,
  ): Promise<Omit<SuccessResult, 'debugInfo'>> {
    const { extractor, cleaner, engine, stitcher } = this.deps;
    const { outputDir } = this.options;

    // Validate
    if (!(await fileExists(request.pdfPath))) throw new PipelineError(fileNotFoundError(request.pdfPath));
    if (!isFullDocument(request.pageRange)) {
      const validation = await this.validatePageRange(request.pdfPath, request.pageRange);
      if (!validation.valid) throw new PipelineError(invalidPageRangeError(validation.error));
    }

    // Extract
    this.report({ status: 'extracting', totalUnits: 0, processedUnits: 0, statusMessage: 'Extracting text' });
    const text = await extractor.extractText(request.pdfPath, request.pageRange);
    record({ extractedChars: text.length });
    if (isExtractionError(text)) throw new PipelineError(textExtractionError(text));

    // Clean
    this.report({ status: 'cleaning', totalUnits: 0, processedUnits: 0, statusMessage: 'Cleaning text' });
    const cleaned = await cleaner.cleanText(text);
    record({ cleanedChunks: cleaned.length });
    const usable = cleaned.filter(chunk => chunk.trim().length > 0 && !isUpstreamErrorText(chunk));
    if (usable.length === 0) {
      throw new PipelineError(textCleaningError(cleaned.find(isUpstreamErrorText)));
    }

    // Chunk. Sentinel chunks stay in place so that part numbers follow chunk positions.
    const plain = cleaned.flatMap(chunk => (isUpstreamErrorText(chunk) ? [chunk] : splitIntoChunks(chunk, this.audioChunkSize)));
    const spoken = plain.filter(chunk => !isUpstreamErrorText(chunk));
    record({ audioChunks: plain.length, estimatedSeconds: this.estimateSeconds(spoken) });

    // Sentence timing synthesizes display text, never markup.
    if (request.withTiming) {
      return this.runWithTiming(spoken, request.outputName, record);
    }

    // Annotate
    const annotate = this.options.enableSsml === true && engine.ssmlCapability !== 'none';
    const chunks = annotate
      ? plain.map(chunk => (isUpstreamErrorText(chunk) ? chunk : annotateChunk(chunk, engine.ssmlCapability)))
      : plain;

    // Synthesize
    this.report({ status: 'synthesizing', totalUnits: chunks.length, processedUnits: 0, statusMessage: 'Synthesizing audio' });
    const synthesis = await synthesizeSegments(chunks, request.outputName, outputDir, engine, {
      ...this.options.synthesis,
      onSegmentDone: (completed, total) =>
        this.report({ status: 'synthesizing', totalUnits: total, processedUnits: completed, statusMessage: 'Synthesizing audio' }),
    });
    record({ synthesisErrors: synthesis.errorCount, strategy: synthesis.strategy });
    if (synthesis.audioFiles.length === 0) {
      throw new PipelineError(synthesisError(`all ${synthesis.errorCount} synthesis requests failed`));
    }

    // Stitch
    this.report({ status: 'stitching', totalUnits: 0, processedUnits: 0, statusMessage: 'Combining audio' });
    const combinedFile = await stitcher.combineAudioFiles(synthesis.audioFiles, request.outputName, outputDir);
    record({ combinedCreated: combinedFile !== null, timingAvailable: false });

    return { success: true, audioFiles: synthesis.audioFiles, combinedFile, timingFile: null };
  }

  private async runWithTiming(
    chunks: readonly string[],
    outputName: string,
    record: (update: Partial<DebugInfo>) => void,
  ): Promise<Omit<SuccessResult, 'debugInfo'>> {
    const { outputDir } = this.options;

    this.report({ status: 'timing', totalUnits: 0, processedUnits: 0, statusMessage: 'Synthesizing sentences with timing' });
    const timed = await this.timing.generateWithTiming(chunks, outputName, outputDir);
    if (timed.audioFiles.length === 0) {
      throw new PipelineError(synthesisError('no sentence could be synthesized'));
    }

    const timingFile = timed.timingData ? await saveTimingMetadata(timed.timingData, outputDir, outputName) : null;
    record({ combinedCreated: timed.combinedFile !== null, timingAvailable: timingFile !== null });

    return { success: true, audioFiles: timed.audioFiles, combinedFile: timed.combinedFile, timingFile };
  }
}
