import { z } from 'zod';
import type { TextSegment, TimedAudioResult, TimingMetadata } from '../types';

export const DEFAULT_WORDS_PER_SECOND = 2.5;
export const MIN_SEGMENT_DURATION = 0.5;

export const DEFAULT_PUNCTUATION_PAUSES: Readonly<Record<string, number>> = {
  '.': 0.4,
  '!': 0.4,
  '?': 0.4,
  ',': 0.2,
  ';': 0.3,
  ':': 0.3,
  '—': 0.3,
};

export const segmentEndTime = (segment: TextSegment): number => segment.startTime + segment.duration;

export const hasTimingData = (result: TimedAudioResult): boolean => result.timingData !== null;

export const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length;

/** Fallback when an audio file cannot be measured. */
export const estimateFromWordCount = (text: string): number =>
  Math.max(countWords(text) / DEFAULT_WORDS_PER_SECOND, MIN_SEGMENT_DURATION);

/**
 * Estimates how long `text` takes to narrate: words at the given rate plus a
 * pause for every configured punctuation mark.
 */
export const estimateDuration = (
  text: string,
  wordsPerMinute: number,
  punctuationPauses: Readonly<Record<string, number>> = DEFAULT_PUNCTUATION_PAUSES,
): number => {
  if (!text.trim()) return MIN_SEGMENT_DURATION;

  const speech = (countWords(text) / wordsPerMinute) * 60;
  const pauses = Object.entries(punctuationPauses).reduce(
    (total, [mark, pause]) => total + (text.split(mark).length - 1) * pause,
    0,
  );

  return Math.max(speech + pauses, MIN_SEGMENT_DURATION);
};

export const createTimingMetadata = (
  textSegments: readonly TextSegment[],
  audioFiles: readonly string[],
): TimingMetadata => {
  const last = textSegments[textSegments.length - 1];
  return {
    totalDuration: last ? segmentEndTime(last) : 0,
    textSegments: [...textSegments],
    audioFiles: [...audioFiles],
  };
};

// Binary search, O(log n). Intervals are half-open: [start, end).
export const getSegmentAtTime = (metadata: TimingMetadata, time: number): TextSegment | null => {
  const segments = metadata.textSegments;
  let left = 0;
  let right = segments.length - 1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const segment = segments[mid];

    if (time >= segment.startTime && time < segmentEndTime(segment)) {
      return segment;
    }

    if (time < segment.startTime) {
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return null;
};

export interface TimelineIssue {
  readonly sentenceIndex: number;
  readonly kind: 'overlap' | 'gap' | 'order';
  readonly amount: number;
}

/** Reports where consecutive segments overlap, leave gaps or are out of order. */
export const validateTimeline = (segments: readonly TextSegment[], tolerance = 1e-6): TimelineIssue[] => {
  const issues: TimelineIssue[] = [];

  for (let i = 0; i < segments.length - 1; i++) {
    const current = segments[i];
    const next = segments[i + 1];

    if (next.sentenceIndex <= current.sentenceIndex) {
      issues.push({ sentenceIndex: next.sentenceIndex, kind: 'order', amount: 0 });
    }

    const delta = next.startTime - segmentEndTime(current);
    if (delta < -tolerance) {
      issues.push({ sentenceIndex: next.sentenceIndex, kind: 'overlap', amount: -delta });
    } else if (delta > tolerance) {
      issues.push({ sentenceIndex: next.sentenceIndex, kind: 'gap', amount: delta });
    }
  }

  return issues;
};

// --- Sidecar file ({base}_timing.json) ---

const timingFileSchema = z.object({
  total_duration: z.number().nonnegative(),
  audio_files: z.array(z.string()),
  text_segments: z.array(
    z.object({
      text: z.string(),
      start_time: z.number().nonnegative(),
      duration: z.number().positive(),
      segment_type: z.enum(['sentence', 'chunk']),
      chunk_index: z.number().int().nonnegative(),
      sentence_index: z.number().int().nonnegative(),
    }),
  ),
});

export type TimingFile = z.infer<typeof timingFileSchema>;

export const toTimingFile = (metadata: TimingMetadata): TimingFile => ({
  total_duration: metadata.totalDuration,
  audio_files: [...metadata.audioFiles],
  text_segments: metadata.textSegments.map(segment => ({
    text: segment.text,
    start_time: segment.startTime,
    duration: segment.duration,
    segment_type: segment.segmentType,
    chunk_index: segment.chunkIndex,
    sentence_index: segment.sentenceIndex,
  })),
});

export const parseTimingFile = (raw: unknown): TimingMetadata => {
  const parsed = timingFileSchema.parse(raw);
  return {
    totalDuration: parsed.total_duration,
    audioFiles: parsed.audio_files,
    textSegments: parsed.text_segments.map(segment => ({
      text: segment.text,
      startTime: segment.start_time,
      duration: segment.duration,
      segmentType: segment.segment_type,
      chunkIndex: segment.chunk_index,
      sentenceIndex: segment.sentence_index,
    })),
  };
};

export const timingFileName = (baseName: string): string => `${baseName}_timing.json`;
