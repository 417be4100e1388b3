import { ConfigurationError } from '../types/errors.js';
import type { AudioSegment, AudioSource } from '../types/audio.js';

// Offsets are float seconds; anything closer than this counts as the same instant
const EPSILON = 1e-9;

export interface SegmentBoundary {
  index: number;
  startOffsetSeconds: number;
  durationSeconds: number;
}

export class Segmenter {
  /**
   * Validates segmentation parameters, throwing a ConfigurationError.
   */
  static validate(segmentLengthSeconds: number, overlapSeconds: number): void {
    if (!Number.isFinite(segmentLengthSeconds) || segmentLengthSeconds <= 0) {
      throw new ConfigurationError('Segment length must be a positive number of seconds', {
        segmentLengthSeconds,
      });
    }
    if (!Number.isFinite(overlapSeconds) || overlapSeconds < 0) {
      throw new ConfigurationError('Overlap must be zero or more seconds', { overlapSeconds });
    }
    if (overlapSeconds >= segmentLengthSeconds) {
      throw new ConfigurationError('Overlap must be shorter than the segment length', {
        segmentLengthSeconds,
        overlapSeconds,
      });
    }
  }

  /**
   * Segment boundaries for a source of the given length. Segment i starts at
   * i * (length - overlap); the last one is truncated to the end of the source
   * and nothing is emitted past the first segment that reaches the end.
   */
  static *boundaries(
    totalSeconds: number,
    segmentLengthSeconds: number,
    overlapSeconds: number
  ): Generator<SegmentBoundary> {
    Segmenter.validate(segmentLengthSeconds, overlapSeconds);

    const step = segmentLengthSeconds - overlapSeconds;

    for (let index = 0; ; index++) {
      const startOffsetSeconds = index * step;
      if (startOffsetSeconds >= totalSeconds - EPSILON) return;

      const durationSeconds = Math.min(segmentLengthSeconds, totalSeconds - startOffsetSeconds);
      yield { index, startOffsetSeconds, durationSeconds };

      if (startOffsetSeconds + durationSeconds >= totalSeconds - EPSILON) return;
    }
  }

  /**
   * Lazily slices a source into segments. Parameters are checked before the
   * iterable is returned; every iteration starts over from the beginning.
   */
  static segment(
    source: AudioSource,
    segmentLengthSeconds: number,
    overlapSeconds: number
  ): AsyncIterable<AudioSegment> {
    Segmenter.validate(segmentLengthSeconds, overlapSeconds);

    return {
      async *[Symbol.asyncIterator]() {
        const totalSeconds = await source.duration();

        for (const boundary of Segmenter.boundaries(
          totalSeconds,
          segmentLengthSeconds,
          overlapSeconds
        )) {
          const audio = await source.readRange(boundary.startOffsetSeconds, boundary.durationSeconds);
          yield Object.freeze({ ...boundary, sourceId: source.id, audio });
        }
      },
    };
  }
}
