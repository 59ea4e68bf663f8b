import { describe, expect, it } from 'vitest';
import { encodeWav } from './wav.js';

describe('encodeWav', () => {
  it('writes a 16-bit mono PCM header', () => {
    const buf = encodeWav(new Float32Array(3), 22050);
    expect(buf.length).toBe(44 + 6);
    expect(buf.toString('ascii', 0, 4)).toBe('RIFF');
    expect(buf.readUInt32LE(4)).toBe(36 + 6);
    expect(buf.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(buf.readUInt32LE(16)).toBe(16);
    expect(buf.readUInt16LE(20)).toBe(1);
    expect(buf.readUInt16LE(22)).toBe(1);
    expect(buf.readUInt32LE(24)).toBe(22050);
    expect(buf.readUInt32LE(28)).toBe(44100);
    expect(buf.readUInt16LE(32)).toBe(2);
    expect(buf.readUInt16LE(34)).toBe(16);
    expect(buf.toString('ascii', 36, 40)).toBe('data');
    expect(buf.readUInt32LE(40)).toBe(6);
  });

  it('scales and clamps samples', () => {
    const buf = encodeWav(Float32Array.from([1, -1, 0.5, 2, -3, 0]), 8000);
    expect([0, 1, 2, 3, 4, 5].map((i) => buf.readInt16LE(44 + i * 2))).toEqual([32767, -32767, 16384, 32767, -32767, 0]);
  });
});
