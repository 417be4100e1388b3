import { open, type FileHandle } from 'node:fs/promises';
import { readWavLayout, type WavLayout } from './wav.js';
import { AudioSourceError } from '../types/errors.js';
import type { AudioBuffer, AudioSource } from '../types/audio.js';

/**
 * Audio source over a normalized PCM WAV file on disk. Ranges are read on
 * demand, so a multi-hour mix is never held in memory at once.
 */
export class WavFileAudioSource implements AudioSource {
  private constructor(
    readonly id: string,
    private readonly handle: FileHandle,
    private readonly layout: WavLayout
  ) {}

  static async open(path: string): Promise<WavFileAudioSource> {
    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AudioSourceError(`Cannot open ${path}: ${message}`, { path });
    }

    try {
      const { size } = await handle.stat();
      const layout = await readWavLayout(async (position, length) => {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, position);
        return buffer.subarray(0, bytesRead);
      }, size);
      return new WavFileAudioSource(path, handle, layout);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async duration(): Promise<number> {
    const { format, blockAlign, dataLength } = this.layout;
    return dataLength / blockAlign / format.sampleRate;
  }

  async readRange(startSeconds: number, durationSeconds: number): Promise<AudioBuffer> {
    const { format, blockAlign, dataOffset, dataLength } = this.layout;
    const startFrame = Math.floor(startSeconds * format.sampleRate);
    const frameCount = Math.floor(durationSeconds * format.sampleRate);

    const start = Math.min(startFrame * blockAlign, dataLength);
    const length = Math.min(frameCount * blockAlign, dataLength - start);
    const data = Buffer.alloc(length);

    if (length > 0) {
      await this.handle.read(data, 0, length, dataOffset + start);
    }

    return { data, format };
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
