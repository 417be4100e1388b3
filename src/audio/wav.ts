import { AudioSourceError } from '../types/errors.js';
import type { AudioBuffer, PcmFormat } from '../types/audio.js';

export interface WavLayout {
  format: PcmFormat;
  blockAlign: number;
  dataOffset: number;
  dataLength: number;
}

export type ByteReader = (position: number, length: number) => Promise<Buffer>;

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const MAX_CHUNKS = 64;

/**
 * Walks the RIFF chunks of a WAV file until both `fmt ` and `data` are found.
 * Only integer PCM is accepted; anything else must be converted upstream.
 */
export async function readWavLayout(read: ByteReader, fileSize: number): Promise<WavLayout> {
  const riff = await read(0, 12);
  if (riff.length < 12 || riff.toString('ascii', 0, 4) !== 'RIFF' || riff.toString('ascii', 8, 12) !== 'WAVE') {
    throw new AudioSourceError('Not a RIFF/WAVE file');
  }

  let position = 12;
  let format: PcmFormat | undefined;
  let blockAlign = 0;

  for (let chunkCount = 0; chunkCount < MAX_CHUNKS && position + 8 <= fileSize; chunkCount++) {
    const header = await read(position, 8);
    if (header.length < 8) break;

    const chunkId = header.toString('ascii', 0, 4);
    const chunkSize = header.readUInt32LE(4);
    const bodyOffset = position + 8;

    if (chunkId === 'fmt ') {
      const body = await read(bodyOffset, Math.min(chunkSize, 40));
      if (body.length < 16) {
        throw new AudioSourceError('Truncated fmt chunk');
      }
      const audioFormat = body.readUInt16LE(0);
      if (audioFormat !== WAVE_FORMAT_PCM && audioFormat !== WAVE_FORMAT_EXTENSIBLE) {
        throw new AudioSourceError('Only PCM WAV files are supported', { audioFormat });
      }
      format = {
        channels: body.readUInt16LE(2),
        sampleRate: body.readUInt32LE(4),
        bitsPerSample: body.readUInt16LE(14),
      };
      blockAlign = body.readUInt16LE(12);
    } else if (chunkId === 'data') {
      if (!format) {
        throw new AudioSourceError('data chunk precedes fmt chunk');
      }
      if (format.sampleRate === 0 || blockAlign === 0) {
        throw new AudioSourceError('Invalid PCM format', { ...format, blockAlign });
      }
      // Streamed WAVs often leave the size at 0 or 0xFFFFFFFF
      const available = fileSize - bodyOffset;
      const dataLength = chunkSize === 0 || chunkSize > available ? available : chunkSize;
      return {
        format,
        blockAlign,
        dataOffset: bodyOffset,
        dataLength: dataLength - (dataLength % blockAlign),
      };
    }

    // Chunks are word aligned
    position = bodyOffset + chunkSize + (chunkSize % 2);
  }

  throw new AudioSourceError('No data chunk found');
}

/**
 * Wraps raw PCM in a canonical 44-byte WAV header, which is what the
 * recognition services expect as an upload.
 */
export function encodeWav(audio: AudioBuffer): Buffer {
  const { sampleRate, channels, bitsPerSample } = audio.format;
  const blockAlign = channels * (bitsPerSample / 8);
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + audio.data.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(audio.data.length, 40);

  return Buffer.concat([header, audio.data]);
}
