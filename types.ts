import type { ApplicationError } from './errors';

export type SegmentType = 'sentence' | 'chunk';

export interface TextSegment {
  readonly text: string;
  readonly startTime: number; // seconds from the start of the audio file
  readonly duration: number; // seconds, always > 0
  readonly segmentType: SegmentType;
  readonly chunkIndex: number;
  readonly sentenceIndex: number;
}

/**
 * Sentence-to-time mapping for read-along playback.
 * Built once after synthesis, then treated as immutable.
 */
export interface TimingMetadata {
  readonly totalDuration: number;
  readonly textSegments: readonly TextSegment[];
  readonly audioFiles: readonly string[];
}

export interface PageRange {
  readonly startPage?: number; // 1-based, inclusive
  readonly endPage?: number;
}

export interface PdfInfo {
  readonly totalPages: number;
  readonly title: string;
  readonly author: string;
}

export interface ProcessingRequest {
  readonly pdfPath: string;
  readonly outputName: string;
  readonly pageRange: PageRange;
  readonly withTiming?: boolean;
}

export type SynthesisStrategy = 'sequential' | 'parallel';

export interface DebugInfo {
  readonly engine: string;
  readonly engineCategory: EngineCategory;
  readonly extractedChars?: number;
  readonly cleanedChunks?: number;
  readonly audioChunks?: number;
  readonly estimatedSeconds?: number; // narration length estimated from the text
  readonly synthesisErrors?: number;
  readonly strategy?: SynthesisStrategy;
  readonly combinedCreated?: boolean;
  readonly timingAvailable?: boolean;
}

export type ProcessingResult =
  | {
      readonly success: true;
      readonly audioFiles: readonly string[];
      readonly combinedFile: string | null;
      readonly timingFile: string | null;
      readonly debugInfo: DebugInfo;
    }
  | {
      readonly success: false;
      readonly error: ApplicationError;
      readonly debugInfo?: DebugInfo;
    };

export interface TimedAudioResult {
  readonly audioFiles: readonly string[];
  readonly combinedFile: string | null;
  readonly timingData: TimingMetadata | null;
}

export type ProcessingStatus =
  | 'idle'
  | 'extracting'
  | 'cleaning'
  | 'synthesizing'
  | 'stitching'
  | 'timing'
  | 'complete'
  | 'error';

export interface ProcessingStats {
  totalUnits: number; // Audio chunks (or sentences in read-along mode)
  processedUnits: number;
  status: ProcessingStatus;
  statusMessage?: string;
  errorMessage?: string;
}

// --- Collaborator contracts ---

export interface TextExtractor {
  /** Never rejects; failures come back as an upstream-error sentinel string. */
  extractText(pdfPath: string, pageRange: PageRange): Promise<string>;
  getPdfInfo(pdfPath: string): Promise<PdfInfo>;
}

export interface OcrProvider {
  recognizePages(pdfPath: string, firstPage: number, lastPage: number): Promise<string>;
}

export interface LLMProvider {
  readonly name: string;
  generateContent(prompt: string): Promise<string>;
}

export interface TextCleaner {
  cleanText(rawText: string): Promise<string[]>;
}

export type EngineCategory = 'gemini' | 'openai' | 'elevenlabs' | 'local';

export type SsmlCapability = 'none' | 'basic';

export interface TTSEngine {
  readonly name: string;
  readonly category: EngineCategory;
  readonly outputFormat: string; // file extension, e.g. "wav"
  readonly ssmlCapability: SsmlCapability;
  generateAudioData(text: string): Promise<Uint8Array>;
  prefersSyncProcessing(): boolean;
}

export type EncoderRunResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: 'exit' | 'timeout' | 'spawn'; readonly message: string };

export interface AudioEncoder {
  isAvailable(): Promise<boolean>;
  run(args: readonly string[], timeoutMs: number): Promise<EncoderRunResult>;
  /** Container-reported duration in seconds, or null when it cannot be read. */
  probeDuration(filePath: string): Promise<number | null>;
}

export interface AudioProfile {
  readonly codec: string;
  readonly bitrate: string;
  readonly sampleRate: number;
}
