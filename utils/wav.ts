// Gemini TTS returns raw little-endian PCM at this rate.
export const GEMINI_PCM_SAMPLE_RATE = 24000;

const WAV_HEADER_SIZE = 44;

/** Wraps raw PCM samples in a canonical 44-byte RIFF/WAVE header. */
export const pcmToWav = (
  pcm: Uint8Array,
  sampleRate: number = GEMINI_PCM_SAMPLE_RATE,
  channels = 1,
  bitsPerSample = 16,
): Buffer => {
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRate * blockAlign;
  const header = Buffer.alloc(WAV_HEADER_SIZE);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
};

/**
 * Reads the playing time of a WAV file from its header: frames / sample rate.
 * Walks the RIFF chunk list, so files with LIST or fact chunks before the data
 * are handled. Returns null for anything that is not a readable WAV.
 */
export const readWavDuration = (data: Uint8Array): number | null => {
  const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (buffer.length < 12) return null;
  if (buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') return null;

  let byteRate = 0;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ' && body + 16 <= buffer.length) {
      byteRate = buffer.readUInt32LE(body + 8);
    } else if (id === 'data') {
      if (byteRate <= 0) return null;
      // Streamed WAVs (e.g. piper writing to stdout) leave the size unset.
      const dataSize = size === 0 || size === 0xffffffff ? buffer.length - body : Math.min(size, buffer.length - body);
      return dataSize / byteRate;
    }

    offset = body + size + (size % 2);
  }

  return null;
};
