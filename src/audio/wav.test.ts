import { describe, it, expect } from 'vitest';
import { encodeWav, readWavLayout, type ByteReader } from './wav.js';
import { AudioSourceError } from '../types/errors.js';

function readerFor(file: Buffer): ByteReader {
  return async (position, length) => file.subarray(position, position + length);
}

const stereo16 = { sampleRate: 44100, channels: 2, bitsPerSample: 16 };

describe('encodeWav', () => {
  it('should write a canonical 44-byte PCM header', () => {
    const data = Buffer.alloc(8, 1);
    const wav = encodeWav({ data, format: stereo16 });

    expect(wav.length).toBe(52);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(44);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(2);
    expect(wav.readUInt32LE(24)).toBe(44100);
    expect(wav.readUInt32LE(28)).toBe(176400);
    expect(wav.readUInt16LE(32)).toBe(4);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(8);
    expect(wav.subarray(44).equals(data)).toBe(true);
  });
});

describe('readWavLayout', () => {
  it('should locate the format and data of an encoded file', async () => {
    const wav = encodeWav({ data: Buffer.alloc(400), format: stereo16 });

    expect(await readWavLayout(readerFor(wav), wav.length)).toEqual({
      format: stereo16,
      blockAlign: 4,
      dataOffset: 44,
      dataLength: 400,
    });
  });

  it('should skip chunks between fmt and data, including padding', async () => {
    const wav = encodeWav({ data: Buffer.alloc(16), format: stereo16 });
    const list = Buffer.alloc(12);
    list.write('LIST', 0, 'ascii');
    list.writeUInt32LE(3, 4);
    list.write('abc', 8, 'ascii');

    const file = Buffer.concat([wav.subarray(0, 36), list, wav.subarray(36)]);
    const layout = await readWavLayout(readerFor(file), file.length);

    expect(layout.dataOffset).toBe(56);
    expect(layout.dataLength).toBe(16);
  });

  it('should use the rest of the file when the data size is unset', async () => {
    const wav = encodeWav({ data: Buffer.alloc(10), format: stereo16 });
    wav.writeUInt32LE(0, 40);

    const layout = await readWavLayout(readerFor(wav), wav.length);
    expect(layout.dataLength).toBe(8);
  });

  it('should clamp a data size larger than the file', async () => {
    const wav = encodeWav({ data: Buffer.alloc(12), format: stereo16 });
    wav.writeUInt32LE(0xffffffff, 40);

    const layout = await readWavLayout(readerFor(wav), wav.length);
    expect(layout.dataLength).toBe(12);
  });

  it('should reject files that are not RIFF/WAVE', async () => {
    const file = Buffer.from('ID3 definitely not a wav file');
    await expect(readWavLayout(readerFor(file), file.length)).rejects.toThrow(AudioSourceError);
  });

  it('should reject compressed formats', async () => {
    const wav = encodeWav({ data: Buffer.alloc(8), format: stereo16 });
    wav.writeUInt16LE(3, 20);

    await expect(readWavLayout(readerFor(wav), wav.length)).rejects.toThrow(
      'Only PCM WAV files are supported'
    );
  });

  it('should reject files without a data chunk', async () => {
    const wav = encodeWav({ data: Buffer.alloc(0), format: stereo16 }).subarray(0, 36);
    await expect(readWavLayout(readerFor(wav), wav.length)).rejects.toThrow('No data chunk found');
  });
});
