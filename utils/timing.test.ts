import { describe, expect, it } from 'vitest';
import type { TextSegment } from '../types';
import {
  createTimingMetadata,
  estimateDuration,
  estimateFromWordCount,
  getSegmentAtTime,
  hasTimingData,
  parseTimingFile,
  toTimingFile,
  validateTimeline,
} from './timing';

const segment = (sentenceIndex: number, startTime: number, duration: number): TextSegment => ({
  text: `Sentence ${sentenceIndex}.`,
  startTime,
  duration,
  segmentType: 'sentence',
  chunkIndex: 0,
  sentenceIndex,
});

describe('duration estimates', () => {
  it('uses 2.5 words per second with a half-second floor', () => {
    expect(estimateFromWordCount('one two three four five')).toBe(2);
    expect(estimateFromWordCount('one')).toBe(0.5);
  });

  it('adds punctuation pauses to the spoken time', () => {
    expect(estimateDuration('Hello world.', 150, { '.': 0.4 })).toBeCloseTo(1.2);
    expect(estimateDuration('One, two, three.', 120, { ',': 0.2, '.': 0.4 })).toBeCloseTo(2.3);
  });

  it('returns the floor for blank text', () => {
    expect(estimateDuration('  ', 150)).toBe(0.5);
  });
});

describe('timing metadata', () => {
  const segments = [segment(0, 0, 2), segment(1, 2, 1.5), segment(2, 3.5, 0.5)];
  const metadata = createTimingMetadata(segments, ['book_combined.mp3']);

  it('takes the total duration from the last segment', () => {
    expect(metadata.totalDuration).toBe(4);
    expect(createTimingMetadata([], []).totalDuration).toBe(0);
  });

  it('finds the segment covering a time with half-open intervals', () => {
    expect(getSegmentAtTime(metadata, 0)?.sentenceIndex).toBe(0);
    expect(getSegmentAtTime(metadata, 2)?.sentenceIndex).toBe(1);
    expect(getSegmentAtTime(metadata, 3.9)?.sentenceIndex).toBe(2);
    expect(getSegmentAtTime(metadata, 4)).toBeNull();
    expect(getSegmentAtTime(metadata, -1)).toBeNull();
  });

  it('tells timed results from untimed ones', () => {
    expect(hasTimingData({ audioFiles: ['book_combined.mp3'], combinedFile: 'book_combined.mp3', timingData: metadata })).toBe(
      true,
    );
    expect(hasTimingData({ audioFiles: [], combinedFile: null, timingData: null })).toBe(false);
  });

  it('accepts a contiguous timeline', () => {
    expect(validateTimeline(segments)).toEqual([]);
  });

  it('reports gaps, overlaps and ordering problems', () => {
    expect(validateTimeline([segment(0, 0, 1), segment(1, 1.5, 1)])).toEqual([
      { sentenceIndex: 1, kind: 'gap', amount: 0.5 },
    ]);
    expect(validateTimeline([segment(0, 0, 1), segment(1, 0.75, 1)])).toEqual([
      { sentenceIndex: 1, kind: 'overlap', amount: 0.25 },
    ]);
    expect(validateTimeline([segment(3, 0, 1), segment(2, 1, 1)])).toEqual([
      { sentenceIndex: 2, kind: 'order', amount: 0 },
    ]);
  });
});

describe('timing sidecar schema', () => {
  it('writes snake_case fields', () => {
    const file = toTimingFile(createTimingMetadata([segment(0, 0, 1.25)], ['a.wav']));
    expect(file).toEqual({
      total_duration: 1.25,
      audio_files: ['a.wav'],
      text_segments: [
        {
          text: 'Sentence 0.',
          start_time: 0,
          duration: 1.25,
          segment_type: 'sentence',
          chunk_index: 0,
          sentence_index: 0,
        },
      ],
    });
  });

  it('reads a sidecar back into metadata', () => {
    const metadata = parseTimingFile({
      total_duration: 1,
      audio_files: ['x.mp3'],
      text_segments: [
        { text: 'Hi.', start_time: 0, duration: 1, segment_type: 'sentence', chunk_index: 0, sentence_index: 0 },
      ],
    });
    expect(metadata.textSegments[0]).toEqual({
      text: 'Hi.',
      startTime: 0,
      duration: 1,
      segmentType: 'sentence',
      chunkIndex: 0,
      sentenceIndex: 0,
    });
  });

  it('rejects segments without a positive duration', () => {
    expect(() =>
      parseTimingFile({
        total_duration: 0,
        audio_files: [],
        text_segments: [
          { text: 'Hi.', start_time: 0, duration: 0, segment_type: 'sentence', chunk_index: 0, sentence_index: 0 },
        ],
      }),
    ).toThrow();
  });
});
