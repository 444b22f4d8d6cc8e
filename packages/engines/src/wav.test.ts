import { describe, it, expect } from "vitest";
import { encodeWav, bytesForDuration, PCM16_MONO_16K } from "./wav.js";

describe("encodeWav", () => {
  it("writes a PCM header in front of the samples", () => {
    const pcm = Buffer.from([1, 2, 3, 4]);
    const wav = encodeWav(pcm, PCM16_MONO_16K);

    expect(wav.length).toBe(48);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(40);
    expect(wav.toString("ascii", 8, 16)).toBe("WAVEfmt ");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16_000);
    expect(wav.readUInt32LE(28)).toBe(32_000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString("ascii", 36, 40)).toBe("data");
    expect(wav.readUInt32LE(40)).toBe(4);
    expect(wav.subarray(44)).toEqual(pcm);
  });
});

describe("bytesForDuration", () => {
  it("covers whole sample frames", () => {
    expect(bytesForDuration(PCM16_MONO_16K, 5000)).toBe(160_000);
    expect(bytesForDuration({ sampleRate: 1000, channels: 1, bitsPerSample: 16 }, 10)).toBe(20);
  });

  it("never returns less than one frame", () => {
    expect(bytesForDuration(PCM16_MONO_16K, 0)).toBe(2);
  });
});
