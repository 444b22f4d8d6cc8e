/**
 * RIFF/WAVE framing for raw PCM.
 */

const HEADER_BYTES = 44;

export interface PcmFormat {
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitsPerSample: number;
}

export const PCM16_MONO_16K: PcmFormat = {
  sampleRate: 16_000,
  channels: 1,
  bitsPerSample: 16,
};

/** Bytes per sample frame (all channels). */
export function blockAlign(format: PcmFormat): number {
  return format.channels * (format.bitsPerSample / 8);
}

/** Whole sample frames covering `durationMs`, in bytes. */
export function bytesForDuration(format: PcmFormat, durationMs: number): number {
  const frames = Math.floor((format.sampleRate * durationMs) / 1000);
  return Math.max(1, frames) * blockAlign(format);
}

/** Prefix PCM bytes with a 44-byte WAV header. */
export function encodeWav(pcm: Buffer, format: PcmFormat = PCM16_MONO_16K): Buffer {
  const align = blockAlign(format);
  const header = Buffer.alloc(HEADER_BYTES);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(HEADER_BYTES - 8 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");

  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // linear PCM
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * align, 28);
  header.writeUInt16LE(align, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);

  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
