import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeEncoder, FakeEngine, makeTempDir, wavForWords } from '../testing/fakes';
import { validateTimeline } from '../utils/timing';
import { AudioStitcher } from './audioStitcher';
import { loadTimingMetadata, saveTimingMetadata, TimingReconstructor } from './timingReconstructor';

describe('TimingReconstructor', () => {
  let outputDir: string;
  let tempRoot: string;

  beforeEach(async () => {
    outputDir = await makeTempDir('timing-out-');
    tempRoot = await makeTempDir('timing-tmp-');
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  it('builds a contiguous sentence timeline from measured WAV durations', async () => {
    const engine = new FakeEngine({ audio: wavForWords });
    const reconstructor = new TimingReconstructor(engine, { tempRoot });

    const result = await reconstructor.generateWithTiming(['One. Two two.', 'Three.'], 'out', outputDir);

    expect(engine.calls).toEqual(['One.', 'Two two.', 'Three.']);
    expect(result.audioFiles).toEqual(['out_part01.wav', 'out_part02.wav', 'out_part03.wav']);
    expect(result.combinedFile).toBeNull();
    expect(result.timingData?.textSegments.map(s => [s.startTime, s.duration])).toEqual([
      [0, 0.5],
      [0.5, 1],
      [1.5, 0.5],
    ]);
    expect(result.timingData?.totalDuration).toBe(2);
    expect(validateTimeline(result.timingData?.textSegments ?? [])).toEqual([]);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('reports the stitched file as the only audio file', async () => {
    const engine = new FakeEngine({ audio: wavForWords });
    const encoder = new FakeEncoder();
    const reconstructor = new TimingReconstructor(engine, { stitcher: new AudioStitcher(encoder), tempRoot });

    const result = await reconstructor.generateWithTiming(['First one. Second one.'], 'out', outputDir);

    expect(result.audioFiles).toEqual(['out_combined.mp3']);
    expect(result.combinedFile).toBe('out_combined.mp3');
    expect(result.timingData?.audioFiles).toEqual(['out_combined.mp3']);
    expect(encoder.runs).toHaveLength(1);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('copies a lone sentence to the output name', async () => {
    const engine = new FakeEngine({ audio: wavForWords });
    const result = await new TimingReconstructor(engine, { tempRoot }).generateWithTiming(['Just one.'], 'solo', outputDir);

    expect(result.audioFiles).toEqual(['solo.wav']);
    expect((await fs.stat(path.join(outputDir, 'solo.wav'))).size).toBe(44 + 2 * 24000);
  });

  it('returns no timing for text without sentences', async () => {
    const engine = new FakeEngine();
    const result = await new TimingReconstructor(engine, { tempRoot }).generateWithTiming(['  ', ''], 'out', outputDir);

    expect(result).toEqual({ audioFiles: [], combinedFile: null, timingData: null });
    expect(engine.calls).toEqual([]);
  });

  it('strips SSML before splitting sentences', async () => {
    const engine = new FakeEngine({ audio: wavForWords });
    await new TimingReconstructor(engine, { tempRoot }).generateWithTiming(
      ['<speak>Hello <break time="500ms"/> there.</speak>'],
      'out',
      outputDir,
    );
    expect(engine.calls).toEqual(['Hello there.']);
  });

  it('estimates durations when the audio cannot be measured', async () => {
    const engine = new FakeEngine();
    const result = await new TimingReconstructor(engine, { tempRoot }).generateWithTiming(
      ['Hello there friend.'],
      'out',
      outputDir,
    );
    expect(result.timingData?.textSegments[0].duration).toBeCloseTo(1.2);
  });

  it('prefers the encoder probe over estimation', async () => {
    const engine = new FakeEngine();
    const reconstructor = new TimingReconstructor(engine, { encoder: new FakeEncoder({ duration: 2.5 }), tempRoot });

    const result = await reconstructor.generateWithTiming(['Hello there friend.'], 'out', outputDir);

    expect(result.timingData?.textSegments[0].duration).toBe(2.5);
  });

  it('skips failed sentences and keeps the timeline contiguous', async () => {
    const engine = new FakeEngine({
      audio: wavForWords,
      fail: text => (text === 'Two two.' ? new Error('engine down') : null),
    });

    const result = await new TimingReconstructor(engine, { tempRoot }).generateWithTiming(
      ['One. Two two. Three.'],
      'out',
      outputDir,
    );

    const segments = result.timingData?.textSegments ?? [];
    expect(segments.map(s => [s.sentenceIndex, s.startTime])).toEqual([
      [0, 0],
      [2, 0.5],
    ]);
    expect(result.audioFiles).toEqual(['out_part01.wav', 'out_part02.wav']);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('groups ten sentences per chunk index', async () => {
    const engine = new FakeEngine({ audio: wavForWords });
    const text = Array.from({ length: 12 }, (_, i) => `Sentence ${i}.`).join(' ');

    const result = await new TimingReconstructor(engine, { tempRoot }).generateWithTiming([text], 'out', outputDir);

    const chunkIndexes = result.timingData?.textSegments.map(s => s.chunkIndex);
    expect(chunkIndexes).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1, 1]);
  });
});

describe('timing sidecar', () => {
  it('saves and loads timing metadata', async () => {
    const dir = await makeTempDir('sidecar-');
    try {
      const metadata = {
        totalDuration: 1.5,
        audioFiles: ['book_combined.mp3'],
        textSegments: [
          { text: 'Hi.', startTime: 0, duration: 1.5, segmentType: 'sentence' as const, chunkIndex: 0, sentenceIndex: 0 },
        ],
      };

      const fileName = await saveTimingMetadata(metadata, dir, 'book');
      expect(fileName).toBe('book_timing.json');

      const raw: unknown = JSON.parse(await fs.readFile(path.join(dir, fileName), 'utf8'));
      expect(raw).toMatchObject({ total_duration: 1.5, audio_files: ['book_combined.mp3'] });
      expect(await loadTimingMetadata(path.join(dir, fileName))).toEqual(metadata);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
