import { createHash } from 'node:crypto';
import type { AudioSegment } from '../types/audio.js';

/**
 * Cache key for a segment. Hashes the PCM content so the same audio hits the
 * cache across runs and files; falls back to source position when the
 * segment carries no samples.
 */
export function segmentFingerprint(segment: AudioSegment): string {
  const hash = createHash('sha256');
  const { data, format } = segment.audio;

  if (data.length > 0) {
    hash.update(`${format.sampleRate}:${format.channels}:${format.bitsPerSample}:`);
    hash.update(data);
  } else {
    hash.update(`${segment.sourceId}:${segment.startOffsetSeconds}:${segment.durationSeconds}`);
  }

  return hash.digest('hex');
}
