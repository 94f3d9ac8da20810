import path from 'node:path';
import type { AudioEncoder, EncoderRunResult } from '../types';
import { runProcess } from './process';

const PROBE_TIMEOUT_MS = 10_000;

const ffprobeFor = (ffmpegPath: string): string => {
  const dir = path.dirname(ffmpegPath);
  const probe = path.basename(ffmpegPath).replace(/ffmpeg/i, 'ffprobe');
  return dir === '.' ? probe : path.join(dir, probe);
};

/** `AudioEncoder` backed by the ffmpeg and ffprobe binaries. */
export class FfmpegEncoder implements AudioEncoder {
  private available: Promise<boolean> | null = null;
  private readonly ffprobePath: string;

  constructor(private readonly ffmpegPath = 'ffmpeg') {
    this.ffprobePath = ffprobeFor(ffmpegPath);
  }

  isAvailable(): Promise<boolean> {
    if (!this.available) {
      this.available = runProcess(this.ffmpegPath, ['-version'], { timeoutMs: PROBE_TIMEOUT_MS }).then(outcome => {
        const ok = outcome.kind === 'exited' && outcome.code === 0;
        if (!ok) console.warn(`[Encoder] ${this.ffmpegPath} not available`);
        return ok;
      });
    }
    return this.available;
  }

  async run(args: readonly string[], timeoutMs: number): Promise<EncoderRunResult> {
    const outcome = await runProcess(this.ffmpegPath, ['-hide_banner', '-loglevel', 'error', ...args], { timeoutMs });

    switch (outcome.kind) {
      case 'timeout':
        return { ok: false, reason: 'timeout', message: `ffmpeg timed out after ${timeoutMs / 1000}s` };
      case 'spawn-error':
        return { ok: false, reason: 'spawn', message: outcome.message };
      case 'exited':
        return outcome.code === 0
          ? { ok: true }
          : { ok: false, reason: 'exit', message: `ffmpeg exited with code ${outcome.code}: ${outcome.stderr.trim()}` };
    }
  }

  async probeDuration(filePath: string): Promise<number | null> {
    const outcome = await runProcess(
      this.ffprobePath,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { timeoutMs: PROBE_TIMEOUT_MS },
    );
    if (outcome.kind !== 'exited' || outcome.code !== 0) return null;

    const seconds = Number.parseFloat(outcome.stdout.toString().trim());
    return Number.isFinite(seconds) && seconds > 0 ? seconds : null;
  }
}
