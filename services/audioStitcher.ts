import { promises as fs } from 'node:fs';
import path from 'node:path';
import { encoderTimeoutError, errorMessage, formatError, stitchUnavailableError } from '../errors';
import type { AudioEncoder, AudioProfile } from '../types';

export const DEFAULT_AUDIO_PROFILE: AudioProfile = {
  codec: 'libmp3lame',
  bitrate: '128k',
  sampleRate: 22050,
};

export const DEFAULT_ENCODER_TIMEOUT_MS = 300_000;

export interface StitcherOptions {
  profile?: AudioProfile;
  timeoutMs?: number;
}

export const combinedFileName = (baseName: string): string => `${baseName}_combined.mp3`;

// Quoting rules of ffmpeg's concat demuxer: close the quote, escape, reopen.
const quoteManifestPath = (filePath: string): string => `'${filePath.replace(/'/g, "'\\''")}'`;

export const buildConcatManifest = (absolutePaths: readonly string[]): string =>
  absolutePaths.map(filePath => `file ${quoteManifestPath(filePath)}\n`).join('');

export const buildConcatFilter = (inputCount: number): string =>
  `${Array.from({ length: inputCount }, (_, i) => `[${i}:a]`).join('')}concat=n=${inputCount}:v=0:a=1[out]`;

interface StitchStrategy {
  readonly name: string;
  attempt(inputs: readonly string[], outputPath: string): Promise<boolean>;
}

/**
 * Combines per-chunk audio files into one MP3. Tries the concat demuxer first
 * and falls back to a concat filter graph; both keep input order.
 */
export class AudioStitcher {
  private readonly profile: AudioProfile;
  private readonly timeoutMs: number;

  constructor(
    private readonly encoder: AudioEncoder,
    options: StitcherOptions = {},
  ) {
    this.profile = options.profile ?? DEFAULT_AUDIO_PROFILE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ENCODER_TIMEOUT_MS;
  }

  isAvailable(): Promise<boolean> {
    return this.encoder.isAvailable();
  }

  /** Returns the combined file name (inside outputDir), or null when no file could be produced. */
  async combineAudioFiles(audioFiles: readonly string[], baseName: string, outputDir: string): Promise<string | null> {
    if (audioFiles.length === 0) return null;

    try {
      if (!(await this.encoder.isAvailable())) {
        console.warn(`[Stitcher] ${formatError(stitchUnavailableError('ffmpeg not found'))}`);
        return null;
      }

      const inputs = audioFiles.map(file => path.resolve(outputDir, file));
      const fileName = combinedFileName(baseName);
      const outputPath = path.resolve(outputDir, fileName);

      const strategies: StitchStrategy[] =
        inputs.length === 1
          ? [this.reencode()]
          : [this.concatDemuxer(path.resolve(outputDir, `${baseName}_concat.txt`)), this.concatFilter()];

      for (const strategy of strategies) {
        if (await strategy.attempt(inputs, outputPath)) {
          console.log(`[Stitcher] Combined ${inputs.length} files into ${fileName} (${strategy.name})`);
          return fileName;
        }
        await fs.rm(outputPath, { force: true });
      }

      console.warn(`[Stitcher] ${formatError(stitchUnavailableError('all strategies failed'))}`);
      return null;
    } catch (error) {
      console.error('[Stitcher] Unexpected failure:', errorMessage(error));
      return null;
    }
  }

  private profileArgs(): string[] {
    return ['-c:a', this.profile.codec, '-b:a', this.profile.bitrate, '-ar', String(this.profile.sampleRate)];
  }

  private async encode(strategy: string, args: readonly string[], outputPath: string): Promise<boolean> {
    const result = await this.encoder.run(args, this.timeoutMs);
    if (!result.ok) {
      const reason =
        result.reason === 'timeout' ? formatError(encoderTimeoutError(this.timeoutMs / 1000)) : result.message;
      console.warn(`[Stitcher] ${strategy} failed: ${reason}`);
      return false;
    }

    const size = await fs.stat(outputPath).then(
      stats => stats.size,
      () => 0,
    );
    if (size === 0) {
      console.warn(`[Stitcher] ${strategy} produced no output`);
      return false;
    }
    return true;
  }

  private reencode(): StitchStrategy {
    return {
      name: 're-encode',
      attempt: (inputs, outputPath) =>
        this.encode('re-encode', ['-y', '-i', inputs[0], ...this.profileArgs(), outputPath], outputPath),
    };
  }

  private concatDemuxer(manifestPath: string): StitchStrategy {
    return {
      name: 'concat demuxer',
      attempt: async (inputs, outputPath) => {
        try {
          await fs.writeFile(manifestPath, buildConcatManifest(inputs), 'utf8');
          return await this.encode(
            'concat demuxer',
            ['-y', '-f', 'concat', '-safe', '0', '-i', manifestPath, ...this.profileArgs(), outputPath],
            outputPath,
          );
        } finally {
          await fs.rm(manifestPath, { force: true });
        }
      },
    };
  }

  private concatFilter(): StitchStrategy {
    return {
      name: 'concat filter',
      attempt: (inputs, outputPath) =>
        this.encode(
          'concat filter',
          [
            '-y',
            ...inputs.flatMap(input => ['-i', input]),
            '-filter_complex',
            buildConcatFilter(inputs.length),
            '-map',
            '[out]',
            ...this.profileArgs(),
            outputPath,
          ],
          outputPath,
        ),
    };
  }
}
